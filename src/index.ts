/**
 * result-intl: Result-typed completion handlers, JSON clients and
 * locale-aware formatting.
 *
 * Every fallible step returns a `Result` instead of throwing, and every
 * user-facing string goes through the platform's `Intl` formatters.
 *
 * @example
 * ```ts
 * import { createClient, createFetchAdapter, createLocalizer, formatRates } from "result-intl";
 *
 * const client = createClient({ adapter: createFetchAdapter() });
 * const rates = await client.fetchExchangeRates("2010-01-12");
 *
 * if (rates.success) {
 *   formatRates(rates.data, "de-DE").forEach((line) => console.log(line));
 * } else if (rates.error.type === "unsupportedDate") {
 *   console.log(createLocalizer({ locale: "de-DE" }).t("exchange_rates_unsupported_date"));
 * }
 * ```
 */

// Result type and helpers
export {
  type Result,
  type Ok,
  type Err,
  type ResultCases,
  ok,
  err,
  isOk,
  isErr,
  mapResult,
  flatMapResult,
  mapErrorResult,
  getResult,
  tryResult,
  matchResult,
} from "./types/common.js";
export {
  type Completion,
  type NodeCallback,
  tryResultAsync,
  toResultCallback,
  withCompletion,
} from "./utils/callback.js";

// Errors
export type {
  RequestError,
  InvalidResponseError,
  UnsupportedDateError,
  FetchError,
  ExchangeRatesError,
} from "./types/errors.js";
export { type DecodingError, type DecodingIssue, DecodingFailure } from "./validation/errors.js";

// Client
export { createClient } from "./core/create-client.js";
export type { Client, ClientConfig, Endpoints, RequestTarget } from "./core/create-client.js";
export { loadConfig, type AppConfig } from "./core/config.js";
export {
  createRatesReporter,
  describeExchangeRatesError,
  type RatesReporter,
  type RatesReporterConfig,
} from "./core/report.js";

// Transport
export type { HttpAdapter, HttpRequest, HttpResponse, HttpMethod, NetworkUnavailableReason } from "./adapters/adapter.js";
export { NetworkUnavailableError, isNetworkUnavailable } from "./adapters/adapter.js";
export { createFetchAdapter, type FetchAdapterOptions, type FetchFunction } from "./adapters/fetch.js";

// Operations
export { executeRequest, createDataTask } from "./operations/data-task.js";
export type { DataTask, DataTaskState, DataTaskCompletion } from "./operations/data-task.js";
export { executeJsonRequest } from "./operations/json-request.js";
export { executeCatFact, catFactSchema, type CatFact } from "./operations/cat-fact.js";
export {
  executeExchangeRates,
  exchangeRatesSchema,
  checkRatesDate,
  type ExchangeRates,
  type ExchangeRatesQuery,
  type ExchangeRatesOptions,
} from "./operations/exchange-rates.js";
export { executeAdaptiveRequest } from "./operations/adaptive.js";

// Decoding
export { validate } from "./validation/validate.js";
export { decodeJson, decodeData, type Body } from "./validation/decode.js";

// Logging
export type { Logger, LogLevel } from "./types/logger.js";
export { createConsoleLogger, noopLogger, type ConsoleLoggerOptions, type LogSink } from "./utils/logger.js";

// Formatting and localization
export { formatCurrency, formatRates, formatNumber } from "./intl/currency.js";
export { localizedStatusText } from "./intl/status-text.js";
export {
  createLocalizer,
  loadBundledCatalogs,
  type Catalog,
  type Catalogs,
  type CatalogEntry,
  type Localizer,
  type LocalizerOptions,
  type MessageValues,
} from "./intl/messages.js";
export {
  formatDate,
  formatDateFromTemplate,
  formatISO8601,
  formatDuration,
  formatDateInterval,
  formatRelativeTime,
} from "./intl/dates.js";
export {
  defineUnit,
  measurement,
  convertMeasurement,
  formatMeasurement,
  UnitLength,
  UnitTemperature,
  UnitMass,
  UnitBeauty,
  type Unit,
  type Measurement,
} from "./intl/measurement.js";
export { formatList } from "./intl/list.js";
export { formatPersonName, type PersonNameComponents, type PersonNameStyle } from "./intl/person-name.js";
export { weekdaySymbols, monthSymbols } from "./intl/calendar.js";
export { quotationDelimiters, quote, type QuotationDelimiters } from "./intl/quotation.js";
export {
  characterDirection,
  resolveEdge,
  shouldMirror,
  type CharacterDirection,
  type MirrorableContent,
} from "./intl/direction.js";
