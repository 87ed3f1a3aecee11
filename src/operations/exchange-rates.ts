/**
 * Exchange rates operation: fetches the reference rates published for a day.
 *
 * Maps HTTP statuses onto the closed {@link ExchangeRatesError} set:
 * 400 means the server does not serve the requested date; any other non-2xx
 * status is an invalidResponse error.
 */

import { z } from "zod";
import type { HttpAdapter } from "../adapters/adapter.js";
import type { Logger } from "../types/logger.js";
import type { ExchangeRatesError, UnsupportedDateError } from "../types/errors.js";
import { type Result, ok, err, mapResult } from "../types/common.js";
import {
  createInvalidResponseError,
  createUnsupportedDateError,
} from "../types/errors.js";
import { decodeJson } from "../validation/decode.js";
import { executeRequest } from "./data-task.js";

export const DEFAULT_EXCHANGE_RATES_URL = "https://api.exchangeratesapi.io";

/** The first day reference rates were published. */
export const FIRST_RATES_DATE = "1999-01-04";

/** Body of a rates response. Only `rates` is required. */
export const exchangeRatesSchema = z.object({
  base: z.string().optional(),
  date: z.string().optional(),
  rates: z.record(z.string(), z.number()),
});

export type ExchangeRates = Readonly<Record<string, number>>;

/** Input for {@link executeExchangeRates}. */
export interface ExchangeRatesQuery {
  /** `YYYY-MM-DD`, or `"latest"`. */
  readonly date: string;
  /** Base currency code. The service default (EUR) applies when omitted. */
  readonly base?: string | undefined;
  /** Restricts the response to these currency codes. */
  readonly symbols?: readonly string[] | undefined;
}

/** Options for {@link executeExchangeRates}. */
export interface ExchangeRatesOptions {
  readonly baseUrl?: string | undefined;
  /** Clock used to reject future dates. Defaults to the system clock. */
  readonly now?: (() => Date) | undefined;
  readonly logger?: Logger | undefined;
}

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Checks that `date` names a real calendar day between {@link FIRST_RATES_DATE}
 * and today (UTC).
 */
export const checkRatesDate = (
  date: string,
  now: Date,
): Result<string, UnsupportedDateError> => {
  if (date === "latest") return ok(date);

  const match = ISO_DAY.exec(date);
  if (!match) {
    return err(createUnsupportedDateError(date, "expected YYYY-MM-DD"));
  }

  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return err(createUnsupportedDateError(date, "expected YYYY-MM-DD"));
  }
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    return err(createUnsupportedDateError(date, "not a calendar day"));
  }

  if (date < FIRST_RATES_DATE) {
    return err(
      createUnsupportedDateError(date, `rates start on ${FIRST_RATES_DATE}`),
    );
  }
  if (date > now.toISOString().slice(0, 10)) {
    return err(createUnsupportedDateError(date, "date is in the future"));
  }

  return ok(date);
};

/** Builds the request URL for a rates query. */
export const buildExchangeRatesUrl = (
  baseUrl: string,
  query: ExchangeRatesQuery,
): string => {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}/${query.date}`);
  if (query.base) url.searchParams.set("base", query.base);
  if (query.symbols && query.symbols.length > 0) {
    url.searchParams.set("symbols", query.symbols.join(","));
  }
  return url.toString();
};

/**
 * Fetches exchange rates for a date.
 *
 * @param adapter - The HTTP adapter
 * @param query - Date and optional base/symbols
 * @param options - Base URL, clock and logger
 * @returns Rates keyed by currency code, or an ExchangeRatesError
 *
 * @example
 * ```ts
 * const result = await executeExchangeRates(adapter, { date: "2010-01-12" });
 * if (!result.success && result.error.type === "unsupportedDate") {
 *   // pick another day
 * }
 * ```
 */
export const executeExchangeRates = async (
  adapter: HttpAdapter,
  query: ExchangeRatesQuery,
  options?: ExchangeRatesOptions,
): Promise<Result<ExchangeRates, ExchangeRatesError>> => {
  const now = options?.now ?? (() => new Date());
  const checked = checkRatesDate(query.date, now());
  if (!checked.success) return checked;

  const url = buildExchangeRatesUrl(
    options?.baseUrl ?? DEFAULT_EXCHANGE_RATES_URL,
    query,
  );
  const response = await executeRequest(adapter, { url }, options?.logger);
  if (!response.success) return response;

  const { status, body } = response.data;

  if (status < 200) return err(createInvalidResponseError(status));
  if (status < 300) {
    return mapResult(
      await decodeJson(exchangeRatesSchema, body),
      (decoded) => Object.freeze({ ...decoded.rates }),
    );
  }
  if (status === 400) {
    return err(createUnsupportedDateError(query.date, "rejected by the server"));
  }
  return err(createInvalidResponseError(status));
};
