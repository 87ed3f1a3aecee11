/**
 * JSON decoding against a Standard Schema, in Result-returning and throwing
 * flavors.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { type Result, err, getResult, tryResult } from "../types/common.js";
import {
  type DecodingError,
  DecodingFailure,
  createSyntaxDecodingError,
} from "./errors.js";
import { validate } from "./validate.js";

const utf8 = new TextDecoder("utf-8");

/** A response body: raw bytes or an already decoded string. */
export type Body = string | Uint8Array;

/** Converts a body to text, decoding bytes as UTF-8. */
export const bodyText = (body: Body): string =>
  typeof body === "string" ? body : utf8.decode(body);

/**
 * Parses `body` as JSON and validates it against `schema`.
 *
 * @param schema - A StandardSchemaV1 compatible schema
 * @param body - JSON text or UTF-8 bytes
 * @returns The validated value, or a DecodingError for bad JSON or a schema mismatch
 *
 * @example
 * ```ts
 * const result = await decodeJson(catFactSchema, '{ "text": "Cats own you." }');
 * ```
 */
export const decodeJson = async <Output>(
  schema: StandardSchemaV1<unknown, Output>,
  body: Body,
): Promise<Result<Output, DecodingError>> => {
  const parsed = tryResult((): unknown => JSON.parse(bodyText(body)));
  if (!parsed.success) {
    return err(createSyntaxDecodingError(parsed.error));
  }
  return validate(schema, parsed.data);
};

/**
 * Unwraps a Result holding a body and decodes it, throwing on either step.
 *
 * The failure of `result` is rethrown unchanged; a decoding failure is thrown
 * as a {@link DecodingFailure}.
 *
 * @example
 * ```ts
 * try {
 *   const fact = await decodeData(ok(bytes), catFactSchema);
 * } catch (error) {
 *   console.error(error);
 * }
 * ```
 */
export const decodeData = async <Output, E>(
  result: Result<Body, E>,
  schema: StandardSchemaV1<unknown, Output>,
): Promise<Output> => {
  const body = getResult(result);
  const decoded = await decodeJson(schema, body);
  if (!decoded.success) {
    throw new DecodingFailure(decoded.error);
  }
  return decoded.data;
};
