/**
 * Sample output of every formatter for one locale, used by `result-intl formats`.
 */

import type { Localizer } from "../intl/messages.js";
import { formatCurrency, formatNumber } from "../intl/currency.js";
import {
  formatDate,
  formatDateFromTemplate,
  formatDateInterval,
  formatDuration,
  formatISO8601,
  formatRelativeTime,
} from "../intl/dates.js";
import {
  UnitBeauty,
  UnitLength,
  UnitTemperature,
  convertMeasurement,
  formatMeasurement,
  measurement,
} from "../intl/measurement.js";
import { formatList } from "../intl/list.js";
import { formatPersonName } from "../intl/person-name.js";
import { weekdaySymbols } from "../intl/calendar.js";
import { quote } from "../intl/quotation.js";
import { characterDirection, resolveEdge } from "../intl/direction.js";

const DAY_MS = 86_400_000;

/** Returns `label: value` lines demonstrating each formatter. */
export const formatShowcase = (
  locale: string,
  timeZone: string,
  now: Date,
  localizer: Localizer,
): readonly string[] => {
  const direction = characterDirection(locale);
  const temperature = measurement(72, UnitTemperature.fahrenheit);

  const rows: readonly (readonly [string, string])[] = [
    ["date", formatDate(now, locale, { dateStyle: "long", timeZone })],
    ["date (MMMMd)", formatDateFromTemplate(now, "MMMMd", locale, { timeZone })],
    ["number", formatNumber(1234.56, locale)],
    ["currency", formatCurrency(12, "USD", locale)],
    ["iso8601", formatISO8601(now)],
    ["duration", formatDuration(600, locale)],
    ["interval", formatDateInterval(new Date(now.getTime() - 4 * DAY_MS), now, locale, { timeZone })],
    ["relative", formatRelativeTime(new Date(now.getTime() - 21 * DAY_MS), now, locale)],
    ["temperature", formatMeasurement(convertMeasurement(temperature, UnitTemperature.celsius), locale, { maximumFractionDigits: 1 })],
    ["length", formatMeasurement(measurement(52000, UnitLength.meters), locale)],
    ["beard-seconds", formatMeasurement(convertMeasurement(measurement(5, UnitLength.millimeters), UnitLength.beardSecond), locale)],
    ["beauty", formatMeasurement(measurement(1, UnitBeauty.helen), locale)],
    ["list", formatList(["Cats", "Dogs", "Birds"], locale)],
    ["name", formatPersonName({ givenName: "John", familyName: "Appleseed" }, "initialGiven", locale)],
    ["weekday", weekdaySymbols(locale)[1] ?? ""],
    ["quote", quote("Cats own you.", locale)],
    ["direction", `${direction} (leading edge: ${resolveEdge("leading", direction)})`],
    ["message", localizer.t("correct_number_employees_selected", { count: 500 })],
  ];

  return rows.map(([label, value]) => `${label}: ${value}`);
};
