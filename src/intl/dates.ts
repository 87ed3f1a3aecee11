/**
 * Date, duration, interval and relative-time formatting on top of `Intl`.
 *
 * Every function takes an explicit time zone (default `"UTC"`) so output
 * does not depend on the machine it runs on.
 */

import { formatList } from "./list.js";

/** Options shared by the date formatters. */
export interface DateFormatOptions {
  readonly timeZone?: string | undefined;
}

/** Styles accepted by {@link formatDate}. */
export interface DateStyleOptions extends DateFormatOptions {
  readonly dateStyle?: Intl.DateTimeFormatOptions["dateStyle"];
  readonly timeStyle?: Intl.DateTimeFormatOptions["timeStyle"];
}

/**
 * Formats a date with a date and/or time style.
 *
 * @example
 * ```ts
 * formatDate(new Date(Date.UTC(2019, 6, 15)), "en-US", { dateStyle: "long" });
 * // "July 15, 2019"
 * ```
 */
export const formatDate = (
  date: Date,
  locale: string,
  options?: DateStyleOptions,
): string => {
  const dateStyle = options?.dateStyle;
  const timeStyle = options?.timeStyle;
  return new Intl.DateTimeFormat(locale, {
    timeZone: options?.timeZone ?? "UTC",
    ...(dateStyle === undefined && timeStyle === undefined
      ? { dateStyle: "medium" as const }
      : {}),
    ...(dateStyle !== undefined ? { dateStyle } : {}),
    ...(timeStyle !== undefined ? { timeStyle } : {}),
  }).format(date);
};

type TemplateField = Pick<
  Intl.DateTimeFormatOptions,
  "year" | "month" | "day" | "weekday" | "hour" | "minute" | "second"
>;

const TEMPLATE_SYMBOLS: Readonly<Record<string, (length: number) => TemplateField>> = {
  y: (n) => ({ year: n === 2 ? "2-digit" : "numeric" }),
  M: (n) => ({
    month: n >= 5 ? "narrow" : n === 4 ? "long" : n === 3 ? "short" : n === 2 ? "2-digit" : "numeric",
  }),
  L: (n) => ({
    month: n >= 5 ? "narrow" : n === 4 ? "long" : n === 3 ? "short" : n === 2 ? "2-digit" : "numeric",
  }),
  d: (n) => ({ day: n === 2 ? "2-digit" : "numeric" }),
  E: (n) => ({ weekday: n >= 5 ? "narrow" : n === 4 ? "long" : "short" }),
  h: (n) => ({ hour: n === 2 ? "2-digit" : "numeric" }),
  H: (n) => ({ hour: n === 2 ? "2-digit" : "numeric" }),
  j: (n) => ({ hour: n === 2 ? "2-digit" : "numeric" }),
  m: (n) => ({ minute: n === 2 ? "2-digit" : "numeric" }),
  s: (n) => ({ second: n === 2 ? "2-digit" : "numeric" }),
};

/**
 * Translates a date template (a skeleton such as `"MMMMd"` or `"yMMMd"`)
 * into `Intl.DateTimeFormat` fields. Field order and punctuation are left to
 * the locale. Unknown symbols throw a `RangeError`.
 */
export const parseDateTemplate = (template: string): Intl.DateTimeFormatOptions => {
  const options: Intl.DateTimeFormatOptions = {};
  const runs = template.match(/(.)\1*/g) ?? [];
  for (const run of runs) {
    const symbol = run.charAt(0);
    const field = TEMPLATE_SYMBOLS[symbol];
    if (!field) {
      throw new RangeError(`Unsupported date template symbol "${symbol}"`);
    }
    Object.assign(options, field(run.length));
    if (symbol === "h") options.hour12 = true;
    if (symbol === "H") options.hour12 = false;
  }
  return options;
};

/**
 * Formats a date from a localized template.
 *
 * @example
 * ```ts
 * formatDateFromTemplate(new Date(Date.UTC(2019, 11, 31)), "MMMMd", "en-US");
 * // "December 31"
 * ```
 */
export const formatDateFromTemplate = (
  date: Date,
  template: string,
  locale: string,
  options?: DateFormatOptions,
): string =>
  new Intl.DateTimeFormat(locale, {
    ...parseDateTemplate(template),
    timeZone: options?.timeZone ?? "UTC",
  }).format(date);

/**
 * Formats a date as ISO 8601 in UTC.
 *
 * @param fractionalSeconds - Keep milliseconds. Default: `false`.
 *
 * @example
 * ```ts
 * formatISO8601(new Date(Date.UTC(2019, 6, 15))); // "2019-07-15T00:00:00Z"
 * ```
 */
export const formatISO8601 = (date: Date, fractionalSeconds = false): string => {
  const iso = date.toISOString();
  return fractionalSeconds ? iso : `${iso.slice(0, 19)}Z`;
};

const DURATION_UNITS = [
  ["day", 86_400],
  ["hour", 3_600],
  ["minute", 60],
  ["second", 1],
] as const;

/** Options for {@link formatDuration}. */
export interface DurationFormatOptions {
  readonly unitDisplay?: "long" | "short" | "narrow" | undefined;
  /** Largest number of components shown, from the largest unit. Default: 2. */
  readonly maximumUnitCount?: number | undefined;
}

/**
 * Formats a number of seconds as its non-zero components.
 *
 * @example
 * ```ts
 * formatDuration(600, "en");  // "10 minutes"
 * formatDuration(4200, "en"); // "1 hour, 10 minutes"
 * ```
 */
export const formatDuration = (
  seconds: number,
  locale: string,
  options?: DurationFormatOptions,
): string => {
  const unitDisplay = options?.unitDisplay ?? "long";
  const maximumUnitCount = options?.maximumUnitCount ?? 2;

  let remaining = Math.round(Math.abs(seconds));
  const parts: string[] = [];
  for (const [unit, size] of DURATION_UNITS) {
    const amount = Math.floor(remaining / size);
    remaining -= amount * size;
    if (amount > 0 && parts.length < maximumUnitCount) {
      parts.push(
        new Intl.NumberFormat(locale, { style: "unit", unit, unitDisplay }).format(amount),
      );
    }
  }

  if (parts.length === 0) {
    return new Intl.NumberFormat(locale, {
      style: "unit",
      unit: "second",
      unitDisplay,
    }).format(0);
  }

  return formatList(parts, locale, { type: "unit", style: unitDisplay });
};

/**
 * Formats the range between two dates, collapsing the parts they share.
 *
 * @example
 * ```ts
 * formatDateInterval(start, end, "en-US"); // "6/3/19 – 6/7/19"
 * ```
 */
export const formatDateInterval = (
  start: Date,
  end: Date,
  locale: string,
  options?: DateStyleOptions,
): string =>
  new Intl.DateTimeFormat(locale, {
    timeZone: options?.timeZone ?? "UTC",
    dateStyle: options?.dateStyle ?? "short",
    ...(options?.timeStyle !== undefined ? { timeStyle: options.timeStyle } : {}),
  }).formatRange(start, end);

const RELATIVE_UNITS: readonly (readonly [Intl.RelativeTimeFormatUnit, number])[] = [
  ["year", 31_557_600],
  ["month", 2_629_800],
  ["week", 604_800],
  ["day", 86_400],
  ["hour", 3_600],
  ["minute", 60],
  ["second", 1],
];

/**
 * Describes `date` relative to `now` in the largest whole unit.
 *
 * @example
 * ```ts
 * formatRelativeTime(threeWeeksAgo, now, "en"); // "3 weeks ago"
 * ```
 */
export const formatRelativeTime = (
  date: Date,
  now: Date,
  locale: string,
  numeric: "always" | "auto" = "always",
): string => {
  const deltaSeconds = (date.getTime() - now.getTime()) / 1000;
  const format = new Intl.RelativeTimeFormat(locale, { numeric });

  for (const [unit, size] of RELATIVE_UNITS) {
    if (Math.abs(deltaSeconds) >= size) {
      return format.format(Math.trunc(deltaSeconds / size), unit);
    }
  }
  return format.format(0, "second");
};
