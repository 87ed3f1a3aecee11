/**
 * HTTP adapter interface for abstracting over the transport that performs
 * requests.
 *
 * Each adapter is a record of functions (not a class), so tests and callers
 * can supply a plain object.
 */

/** Supported HTTP methods. */
export type HttpMethod = "GET" | "HEAD";

/** A single outgoing request. */
export interface HttpRequest {
  readonly url: string;
  readonly method?: HttpMethod | undefined;
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /**
   * When `false`, the request must not use a constrained (low data mode)
   * network. Adapters reject such requests with a
   * {@link NetworkUnavailableError} instead of sending them. Default: `true`.
   */
  readonly allowConstrainedNetwork?: boolean | undefined;
}

/** The response to a request, with the body fully read. */
export interface HttpResponse {
  readonly url: string;
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Uint8Array;
}

/**
 * The adapter interface that all transports must implement.
 *
 * `send` resolves for every HTTP status and rejects only when no response
 * was received.
 */
export interface HttpAdapter {
  readonly send: (request: HttpRequest) => Promise<HttpResponse>;
}

/** Why a network path refused a request. */
export type NetworkUnavailableReason = "constrained" | "expensive";

/** Rejection raised by adapters when the network policy forbids a request. */
export class NetworkUnavailableError extends Error {
  readonly reason: NetworkUnavailableReason;

  constructor(reason: NetworkUnavailableReason, url: string) {
    super(`Network unavailable (${reason}) for ${url}`);
    this.name = "NetworkUnavailableError";
    this.reason = reason;
  }
}

/** Whether `cause` is a {@link NetworkUnavailableError} for the given reason. */
export const isNetworkUnavailable = (
  cause: unknown,
  reason?: NetworkUnavailableReason,
): cause is NetworkUnavailableError =>
  cause instanceof NetworkUnavailableError &&
  (reason === undefined || cause.reason === reason);
