/**
 * Turns exchange-rate outcomes into printable, localized lines.
 */

import type { ExchangeRatesError } from "../types/errors.js";
import type { Localizer } from "../intl/messages.js";
import type { Client } from "./create-client.js";
import { matchResult } from "../types/common.js";
import { formatRates } from "../intl/currency.js";
import { localizedStatusText } from "../intl/status-text.js";

/**
 * Returns the user-facing text for an exchange-rates failure.
 *
 * Transport and decoding failures show their own message, unexpected
 * statuses their reason phrase, and an unsupported date the localized
 * `exchange_rates_unsupported_date` message.
 */
export const describeExchangeRatesError = (
  error: ExchangeRatesError,
  localizer: Localizer,
): string => {
  switch (error.type) {
    case "request":
    case "decoding":
      return error.message;
    case "invalidResponse":
      return localizedStatusText(error.statusCode);
    case "unsupportedDate":
      return localizer.t("exchange_rates_unsupported_date");
  }
};

/** Dependencies of {@link createRatesReporter}. */
export interface RatesReporterConfig {
  readonly client: Client;
  readonly localizer: Localizer;
  /** Locale used for currency amounts. Defaults to the localizer's locale. */
  readonly locale?: string | undefined;
  readonly write: (line: string) => void;
}

export interface RatesReporter {
  /**
   * Fetches rates for `date` and writes one formatted amount per currency,
   * or one line describing the failure. Resolves to whether it succeeded.
   */
  readonly printExchangeRates: (date: string) => Promise<boolean>;
}

/**
 * Creates a reporter that prints exchange rates or their failure.
 *
 * @example
 * ```ts
 * const reporter = createRatesReporter({
 *   client,
 *   localizer: createLocalizer({ locale: "de-DE" }),
 *   write: (line) => console.log(line),
 * });
 * await reporter.printExchangeRates("2010-01-12");
 * ```
 */
export const createRatesReporter = (config: RatesReporterConfig): RatesReporter => {
  const { client, localizer, write } = config;
  const locale = config.locale ?? localizer.locale;

  return Object.freeze({
    printExchangeRates: async (date: string) =>
      matchResult(await client.fetchExchangeRates(date), {
        success: (rates) => {
          for (const line of formatRates(rates, locale)) write(line);
          return true;
        },
        failure: (error) => {
          write(describeExchangeRatesError(error, localizer));
          return false;
        },
      }),
  });
};
