/**
 * The closed set of failures produced by request operations.
 */

import type { DecodingError } from "../validation/errors.js";

/** The adapter could not complete the exchange (DNS, socket, offline...). */
export interface RequestError {
  readonly type: "request";
  readonly message: string;
  readonly cause?: unknown;
}

/** The server answered with a status outside the accepted range. */
export interface InvalidResponseError {
  readonly type: "invalidResponse";
  readonly message: string;
  readonly statusCode: number;
}

/** The requested exchange-rate date is not served. */
export interface UnsupportedDateError {
  readonly type: "unsupportedDate";
  readonly message: string;
  readonly date: string;
}

/** Any failure of a request whose body is decoded. */
export type FetchError = RequestError | InvalidResponseError | DecodingError;

/** Failures of the exchange-rates operation. */
export type ExchangeRatesError = FetchError | UnsupportedDateError;

/** Creates a RequestError from whatever the adapter rejected with. */
export const createRequestError = (
  cause: unknown,
  fallbackMessage = "Request failed",
): RequestError =>
  Object.freeze({
    type: "request" as const,
    message: cause instanceof Error ? cause.message : fallbackMessage,
    cause,
  });

/** Creates an InvalidResponseError. */
export const createInvalidResponseError = (
  statusCode: number,
): InvalidResponseError =>
  Object.freeze({
    type: "invalidResponse" as const,
    message: `Unexpected HTTP status ${statusCode}`,
    statusCode,
  });

/** Creates an UnsupportedDateError. */
export const createUnsupportedDateError = (
  date: string,
  reason?: string,
): UnsupportedDateError =>
  Object.freeze({
    type: "unsupportedDate" as const,
    message: reason
      ? `Unsupported date "${date}": ${reason}`
      : `Unsupported date "${date}"`,
    date,
  });
