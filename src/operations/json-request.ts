/**
 * JSON request operation: sends a request, checks the status and decodes the
 * body against a Standard Schema.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { HttpAdapter, HttpRequest } from "../adapters/adapter.js";
import type { Logger } from "../types/logger.js";
import type { FetchError } from "../types/errors.js";
import { type Result, err } from "../types/common.js";
import { createInvalidResponseError } from "../types/errors.js";
import { decodeJson } from "../validation/decode.js";
import { executeRequest } from "./data-task.js";

/** Whether `status` is in the 2xx range. */
export const isSuccessStatus = (status: number): boolean =>
  status >= 200 && status < 300;

/**
 * Executes a request and decodes a 2xx body.
 *
 * @param adapter - The HTTP adapter
 * @param request - The request to send
 * @param schema - Schema the JSON body must satisfy
 * @param logger - Optional logger
 * @returns The decoded body, or a request, invalidResponse or decoding error
 */
export const executeJsonRequest = async <Output>(
  adapter: HttpAdapter,
  request: HttpRequest,
  schema: StandardSchemaV1<unknown, Output>,
  logger?: Logger,
): Promise<Result<Output, FetchError>> => {
  const response = await executeRequest(adapter, request, logger);
  if (!response.success) return response;

  const { status, body } = response.data;
  if (!isSuccessStatus(status)) {
    return err(createInvalidResponseError(status));
  }

  return decodeJson(schema, body);
};
