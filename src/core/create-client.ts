/**
 * Client factory: binds the request operations to one adapter, logger and
 * set of endpoints.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { HttpAdapter, HttpRequest, HttpResponse } from "../adapters/adapter.js";
import type { Logger } from "../types/logger.js";
import type { ExchangeRatesError, FetchError, RequestError } from "../types/errors.js";
import type { Result } from "../types/common.js";
import { noopLogger } from "../utils/logger.js";
import {
  type DataTask,
  type DataTaskCompletion,
  createDataTask,
  executeRequest,
} from "../operations/data-task.js";
import { executeJsonRequest } from "../operations/json-request.js";
import { DEFAULT_CAT_FACT_URL, executeCatFact } from "../operations/cat-fact.js";
import {
  DEFAULT_EXCHANGE_RATES_URL,
  type ExchangeRates,
  type ExchangeRatesQuery,
  executeExchangeRates,
} from "../operations/exchange-rates.js";
import { executeAdaptiveRequest } from "../operations/adaptive.js";

/** Endpoints used by the built-in operations. */
export interface Endpoints {
  readonly catFact: string;
  readonly exchangeRates: string;
}

/** Configuration for creating a client. */
export interface ClientConfig {
  readonly adapter: HttpAdapter;
  readonly logger?: Logger | undefined;
  readonly endpoints?: Partial<Endpoints> | undefined;
  /** Clock for date checks. Defaults to the system clock. */
  readonly now?: (() => Date) | undefined;
}

/** A request target: a URL or a full request. */
export type RequestTarget = string | HttpRequest;

/** The client returned by {@link createClient}. */
export interface Client {
  readonly endpoints: Endpoints;

  /** Sends a request; any HTTP status is a success. */
  readonly send: (
    target: RequestTarget,
  ) => Promise<Result<HttpResponse, RequestError>>;

  /** Creates a suspended data task that reports to `completion`. */
  readonly dataTask: (
    target: RequestTarget,
    completion: DataTaskCompletion,
  ) => DataTask;

  /** Sends a request and decodes a 2xx JSON body against `schema`. */
  readonly fetchJson: <Output>(
    target: RequestTarget,
    schema: StandardSchemaV1<unknown, Output>,
  ) => Promise<Result<Output, FetchError>>;

  /** Fetches the text of a random cat fact. */
  readonly fetchCatFact: () => Promise<Result<string, FetchError>>;

  /** Fetches exchange rates for a date (`YYYY-MM-DD` or `"latest"`). */
  readonly fetchExchangeRates: (
    query: string | ExchangeRatesQuery,
  ) => Promise<Result<ExchangeRates, ExchangeRatesError>>;

  /** Fetches `url`, or `lowDataUrl` when the network is constrained. */
  readonly fetchAdaptive: (
    url: string,
    lowDataUrl: string,
  ) => Promise<Result<Uint8Array, FetchError>>;
}

const toRequest = (target: RequestTarget): HttpRequest =>
  typeof target === "string" ? { url: target } : target;

/**
 * Creates a client.
 *
 * @param config - Adapter, optional logger, endpoints and clock
 * @returns A frozen {@link Client}
 *
 * @example
 * ```ts
 * import { createClient, createFetchAdapter } from "result-intl";
 *
 * const client = createClient({ adapter: createFetchAdapter() });
 *
 * client.dataTask("https://example.com/data.json", (result) => {
 *   if (result.success) handleData(result.data.body);
 *   else handleError(result.error);
 * }).resume();
 *
 * const fact = await client.fetchCatFact();
 * ```
 */
export const createClient = (config: ClientConfig): Client => {
  const { adapter, now } = config;
  const logger = config.logger ?? noopLogger;
  const endpoints: Endpoints = Object.freeze({
    catFact: config.endpoints?.catFact ?? DEFAULT_CAT_FACT_URL,
    exchangeRates: config.endpoints?.exchangeRates ?? DEFAULT_EXCHANGE_RATES_URL,
  });

  return Object.freeze({
    endpoints,

    send: (target: RequestTarget) =>
      executeRequest(adapter, toRequest(target), logger),

    dataTask: (target: RequestTarget, completion: DataTaskCompletion) =>
      createDataTask(adapter, toRequest(target), completion, logger),

    fetchJson: <Output>(
      target: RequestTarget,
      schema: StandardSchemaV1<unknown, Output>,
    ) => executeJsonRequest(adapter, toRequest(target), schema, logger),

    fetchCatFact: () => executeCatFact(adapter, endpoints.catFact, logger),

    fetchExchangeRates: (query: string | ExchangeRatesQuery) =>
      executeExchangeRates(
        adapter,
        typeof query === "string" ? { date: query } : query,
        { baseUrl: endpoints.exchangeRates, now, logger },
      ),

    fetchAdaptive: (url: string, lowDataUrl: string) =>
      executeAdaptiveRequest(adapter, url, lowDataUrl, logger),
  });
};
