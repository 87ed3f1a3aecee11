/**
 * Adaptive request: prefers the full resource but falls back to a lighter
 * one when the network is in low data mode.
 */

import type { HttpAdapter } from "../adapters/adapter.js";
import type { Logger } from "../types/logger.js";
import type { FetchError, InvalidResponseError } from "../types/errors.js";
import { isNetworkUnavailable } from "../adapters/adapter.js";
import { type Result, ok, err, flatMapResult } from "../types/common.js";
import { createInvalidResponseError } from "../types/errors.js";
import { noopLogger } from "../utils/logger.js";
import { executeRequest } from "./data-task.js";

/**
 * Fetches `url` without using a constrained network. If the adapter refuses
 * because the network is constrained, fetches `lowDataUrl` instead.
 *
 * Only HTTP 200 is accepted; any other status is an invalidResponse error.
 * Failures other than a constrained network are returned as-is.
 *
 * @returns The body bytes of whichever request answered
 */
export const executeAdaptiveRequest = async (
  adapter: HttpAdapter,
  url: string,
  lowDataUrl: string,
  logger: Logger = noopLogger,
): Promise<Result<Uint8Array, FetchError>> => {
  const first = await executeRequest(
    adapter,
    { url, allowConstrainedNetwork: false },
    logger,
  );

  let outcome = first;
  if (!first.success && isNetworkUnavailable(first.error.cause, "constrained")) {
    logger.info("network constrained, using low data resource", { url, lowDataUrl });
    outcome = await executeRequest(adapter, { url: lowDataUrl }, logger);
  }

  return flatMapResult(
    outcome,
    (response): Result<Uint8Array, InvalidResponseError> =>
      response.status === 200
        ? ok(response.body)
        : err(createInvalidResponseError(response.status)),
  );
};
