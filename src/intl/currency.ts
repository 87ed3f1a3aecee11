/**
 * Currency formatting through `Intl.NumberFormat`.
 */

/**
 * Formats an amount in `currency` using the conventions of `locale`.
 *
 * @example
 * ```ts
 * formatCurrency(1.4, "USD", "de-DE"); // "1,40 $"
 * formatCurrency(12, "USD", "en-US");  // "$12.00"
 * ```
 */
export const formatCurrency = (
  value: number,
  currency: string,
  locale: string,
): string =>
  new Intl.NumberFormat(locale, { style: "currency", currency }).format(value);

/**
 * Formats every rate as an amount of its own currency, one line per currency,
 * ordered by currency code.
 */
export const formatRates = (
  rates: Readonly<Record<string, number>>,
  locale: string,
): readonly string[] =>
  Object.entries(rates)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([currency, value]) => formatCurrency(value, currency, locale));

/**
 * Formats a plain decimal number.
 *
 * @example
 * ```ts
 * formatNumber(1234.56, "en-US"); // "1,234.56"
 * ```
 */
export const formatNumber = (
  value: number,
  locale: string,
  options?: Intl.NumberFormatOptions,
): string => new Intl.NumberFormat(locale, options).format(value);
