/**
 * Decoding error types for JSON parse and schema validation failures.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";

/** One reason a body was rejected, with the location of the offending field. */
export interface DecodingIssue {
  readonly message: string;
  /** Keys from the body root to the field, e.g. `["rates", "USD"]`. Absent for the root. */
  readonly path?: readonly PropertyKey[];
}

/** A body that could not be parsed as JSON or did not have the expected shape. */
export interface DecodingError {
  readonly type: "decoding";
  readonly message: string;
  readonly issues: readonly DecodingIssue[];
  readonly cause?: unknown;
}

const pathKeys = (
  path: StandardSchemaV1.Issue["path"],
): readonly PropertyKey[] =>
  (path ?? []).map((segment) =>
    typeof segment === "object" ? segment.key : segment,
  );

const describeIssue = (issue: DecodingIssue): string =>
  issue.path ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message;

/**
 * Creates a DecodingError from the issues a schema reported.
 *
 * Path segments are flattened to plain keys and each message is prefixed
 * with its dotted path, so `{ rates: { USD: "1.4" } }` against a number
 * record reads `Decoding failed: rates.USD: Expected number, received string`.
 */
export const createDecodingError = (
  issues: ReadonlyArray<StandardSchemaV1.Issue>,
): DecodingError => {
  const decoded = issues.map((issue): DecodingIssue => {
    const path = pathKeys(issue.path);
    return Object.freeze(
      path.length > 0
        ? { message: issue.message, path: Object.freeze(path) }
        : { message: issue.message },
    );
  });
  return Object.freeze({
    type: "decoding" as const,
    message: `Decoding failed: ${decoded.map(describeIssue).join("; ")}`,
    issues: Object.freeze(decoded),
  });
};

/** Creates a DecodingError for a body that is not valid JSON. */
export const createSyntaxDecodingError = (cause: unknown): DecodingError => {
  const message = cause instanceof Error ? cause.message : "Invalid JSON";
  return Object.freeze({
    type: "decoding" as const,
    message: `Decoding failed: ${message}`,
    issues: Object.freeze([Object.freeze({ message })]),
    cause,
  });
};

/**
 * Thrown by the throwing decode helpers. Wraps the DecodingError so callers
 * using try/catch still get an `Error` with a stack.
 */
export class DecodingFailure extends Error {
  readonly decodingError: DecodingError;

  constructor(decodingError: DecodingError) {
    super(decodingError.message, { cause: decodingError.cause });
    this.name = "DecodingFailure";
    this.decodingError = decodingError;
  }
}
