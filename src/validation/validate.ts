/**
 * Schema validation of decoded bodies and configuration.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { type Result, ok, err } from "../types/common.js";
import { type DecodingError, createDecodingError } from "./errors.js";

/**
 * Checks a decoded body against the schema it is expected to match.
 *
 * The schema may answer synchronously or with a promise; both settle into
 * the same Result.
 *
 * @returns The schema's output, or a DecodingError listing every issue
 *
 * @example
 * ```ts
 * const result = await validate(exchangeRatesSchema, JSON.parse(text));
 * if (!result.success) {
 *   for (const issue of result.error.issues) console.error(issue.path, issue.message);
 * }
 * ```
 */
export const validate = async <Output>(
  schema: StandardSchemaV1<unknown, Output>,
  value: unknown,
): Promise<Result<Output, DecodingError>> => {
  const outcome = await schema["~standard"].validate(value);
  return outcome.issues === undefined
    ? ok(outcome.value)
    : err(createDecodingError(outcome.issues));
};
