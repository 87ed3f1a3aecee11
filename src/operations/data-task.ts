/**
 * Data task operation: sends one request and reports the outcome as a Result,
 * either as a Promise or through a completion handler.
 */

import type { HttpAdapter, HttpRequest, HttpResponse } from "../adapters/adapter.js";
import type { Logger } from "../types/logger.js";
import { type Result, ok, err } from "../types/common.js";
import { type RequestError, createRequestError } from "../types/errors.js";
import { noopLogger } from "../utils/logger.js";

/** Completion handler invoked once with the outcome of a data task. */
export type DataTaskCompletion = (
  result: Result<HttpResponse, RequestError>,
) => void;

/** Lifecycle of a data task. */
export type DataTaskState = "suspended" | "running" | "completed";

/** A request that is sent only when resumed. */
export interface DataTask {
  readonly request: HttpRequest;
  /** Sends the request. Calling it again after the first time does nothing. */
  readonly resume: () => void;
  readonly state: () => DataTaskState;
}

/**
 * Sends a request through the adapter.
 *
 * Any HTTP status counts as success here; only a missing response (the
 * adapter rejected) is a failure.
 *
 * @param adapter - The HTTP adapter
 * @param request - The request to send
 * @param logger - Optional logger for request tracing
 * @returns A Result with the response or a RequestError. Never rejects.
 */
export const executeRequest = async (
  adapter: HttpAdapter,
  request: HttpRequest,
  logger: Logger = noopLogger,
): Promise<Result<HttpResponse, RequestError>> => {
  logger.debug("request started", { url: request.url, method: request.method ?? "GET" });

  try {
    const response = await adapter.send(request);
    logger.debug("request finished", { url: request.url, status: response.status });
    return ok(response);
  } catch (cause) {
    const error = createRequestError(cause);
    logger.warn("request failed", { url: request.url, message: error.message });
    return err(error);
  }
};

/**
 * Creates a data task that delivers its outcome to `completion`.
 *
 * Nothing is sent until {@link DataTask.resume} is called. The completion is
 * called exactly once. If it throws, the exception is logged at `error`.
 *
 * @example
 * ```ts
 * createDataTask(adapter, { url }, (result) => {
 *   if (result.success) handleData(result.data.body);
 *   else handleError(result.error);
 * }).resume();
 * ```
 */
export const createDataTask = (
  adapter: HttpAdapter,
  request: HttpRequest,
  completion: DataTaskCompletion,
  logger: Logger = noopLogger,
): DataTask => {
  let state: DataTaskState = "suspended";

  const run = async (): Promise<void> => {
    const result = await executeRequest(adapter, request, logger);
    state = "completed";
    completion(result);
  };

  return Object.freeze({
    request,
    resume: () => {
      if (state !== "suspended") return;
      state = "running";
      run().catch((cause: unknown) => {
        logger.error("data task completion handler threw", cause, { url: request.url });
      });
    },
    state: () => state,
  });
};
