/**
 * Adapter over the WHATWG `fetch` function available in Node.js 20.
 */

import type { HttpAdapter, HttpRequest, HttpResponse } from "./adapter.js";
import { NetworkUnavailableError } from "./adapter.js";

/** Minimal shape of the `Response` returned by `fetch`. */
interface FetchResponse {
  readonly url: string;
  readonly status: number;
  readonly headers: { forEach(fn: (value: string, key: string) => void): void };
  arrayBuffer(): Promise<ArrayBuffer>;
}

/** Minimal `fetch` signature the adapter depends on. */
export type FetchFunction = (
  url: string,
  init: { method: string; headers?: Record<string, string> },
) => Promise<FetchResponse>;

/** Options for {@link createFetchAdapter}. */
export interface FetchAdapterOptions {
  /** Defaults to the global `fetch`. */
  readonly fetch?: FetchFunction | undefined;
  /**
   * Whether the current network is constrained. A function is read on every
   * request. Default: `false`.
   */
  readonly lowDataMode?: boolean | (() => boolean) | undefined;
}

const readHeaders = (response: FetchResponse): Record<string, string> => {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
};

/**
 * Creates an {@link HttpAdapter} backed by `fetch`.
 *
 * @param options - Optional fetch implementation and low data mode flag
 * @returns A frozen {@link HttpAdapter}
 *
 * @example
 * ```ts
 * const adapter = createFetchAdapter({ lowDataMode: () => settings.lowData });
 * const client = createClient({ adapter });
 * ```
 */
export const createFetchAdapter = (
  options?: FetchAdapterOptions,
): HttpAdapter => {
  const fetchFn: FetchFunction = options?.fetch ?? globalThis.fetch;
  const lowDataMode = options?.lowDataMode ?? false;

  const isConstrained = (): boolean =>
    typeof lowDataMode === "function" ? lowDataMode() : lowDataMode;

  return Object.freeze({
    send: async (request: HttpRequest): Promise<HttpResponse> => {
      if (request.allowConstrainedNetwork === false && isConstrained()) {
        throw new NetworkUnavailableError("constrained", request.url);
      }

      const response = await fetchFn(request.url, {
        method: request.method ?? "GET",
        ...(request.headers ? { headers: { ...request.headers } } : {}),
      });

      return {
        url: response.url || request.url,
        status: response.status,
        headers: readHeaders(response),
        body: new Uint8Array(await response.arrayBuffer()),
      };
    },
  });
};
