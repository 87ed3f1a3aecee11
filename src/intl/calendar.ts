/**
 * Calendar symbols taken from the locale instead of a translation table.
 */

export type SymbolWidth = "long" | "short" | "narrow";

/** 2017-01-01 was a Sunday. */
const FIRST_SUNDAY = Date.UTC(2017, 0, 1);
const DAY_MS = 86_400_000;

/**
 * Weekday names in `locale`, Sunday first.
 *
 * @example
 * ```ts
 * weekdaySymbols("sv")[1]; // "måndag"
 * ```
 */
export const weekdaySymbols = (
  locale: string,
  width: SymbolWidth = "long",
): readonly string[] => {
  const format = new Intl.DateTimeFormat(locale, { weekday: width, timeZone: "UTC" });
  return Object.freeze(
    Array.from({ length: 7 }, (_, day) => format.format(new Date(FIRST_SUNDAY + day * DAY_MS))),
  );
};

/**
 * Month names in `locale`, January first.
 *
 * @example
 * ```ts
 * monthSymbols("de")[2]; // "März"
 * ```
 */
export const monthSymbols = (
  locale: string,
  width: SymbolWidth = "long",
): readonly string[] => {
  const format = new Intl.DateTimeFormat(locale, { month: width, timeZone: "UTC" });
  return Object.freeze(
    Array.from({ length: 12 }, (_, month) => format.format(new Date(Date.UTC(2017, month, 15)))),
  );
};
