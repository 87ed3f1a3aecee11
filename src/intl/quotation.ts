/**
 * Quotation marks as each language writes them.
 */

/** Opening and closing delimiters. */
export interface QuotationDelimiters {
  readonly begin: string;
  readonly end: string;
}

const delimiters = (begin: string, end: string): QuotationDelimiters =>
  Object.freeze({ begin, end });

const ENGLISH = delimiters("“", "”");
const GUILLEMETS = delimiters("«", "»");

/** Primary delimiters by language subtag. */
const QUOTATION_DELIMITERS: Readonly<Record<string, QuotationDelimiters>> = {
  ar: delimiters("”", "“"),
  cs: delimiters("„", "“"),
  da: delimiters("„", "“"),
  de: delimiters("„", "“"),
  en: ENGLISH,
  es: GUILLEMETS,
  fi: delimiters("”", "”"),
  fr: GUILLEMETS,
  he: delimiters("”", "”"),
  it: GUILLEMETS,
  ja: delimiters("「", "」"),
  ko: ENGLISH,
  nl: ENGLISH,
  pl: delimiters("„", "”"),
  pt: ENGLISH,
  ru: GUILLEMETS,
  sv: delimiters("”", "”"),
  zh: ENGLISH,
};

/**
 * Returns the quotation delimiters for `locale`, by its language.
 * Unknown languages get English quotes.
 *
 * @example
 * ```ts
 * quotationDelimiters("ja"); // { begin: "「", end: "」" }
 * ```
 */
export const quotationDelimiters = (locale: string): QuotationDelimiters =>
  QUOTATION_DELIMITERS[new Intl.Locale(locale).language] ?? ENGLISH;

/**
 * Wraps text in the locale's quotation marks.
 *
 * @example
 * ```ts
 * quote("Hallo", "de-DE"); // "„Hallo“"
 * ```
 */
export const quote = (text: string, locale: string): string => {
  const { begin, end } = quotationDelimiters(locale);
  return `${begin}${text}${end}`;
};
