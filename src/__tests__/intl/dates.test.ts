import { describe, it, expect } from "vitest";
import {
  formatDate,
  formatDateFromTemplate,
  formatDateInterval,
  formatDuration,
  formatISO8601,
  formatRelativeTime,
  parseDateTemplate,
} from "../../intl/dates.js";

const DAY_MS = 86_400_000;
const july15 = new Date(Date.UTC(2019, 6, 15));

describe("formatDate()", () => {
  it("formats a long date", () => {
    expect(formatDate(july15, "en-US", { dateStyle: "long" })).toBe("July 15, 2019");
  });

  it("defaults to a medium date", () => {
    expect(formatDate(july15, "en-US")).toBe("Jul 15, 2019");
  });

  it("formats in the given time zone", () => {
    expect(formatDate(july15, "en-US", { dateStyle: "long", timeZone: "America/New_York" })).toBe(
      "July 14, 2019",
    );
  });
});

describe("parseDateTemplate()", () => {
  it("maps symbols to fields", () => {
    expect(parseDateTemplate("yMMMd")).toEqual({ year: "numeric", month: "short", day: "numeric" });
  });

  it("sets the hour cycle", () => {
    expect(parseDateTemplate("HHmm")).toEqual({ hour: "2-digit", hour12: false, minute: "2-digit" });
  });

  it("rejects unknown symbols", () => {
    expect(() => parseDateTemplate("QQQ")).toThrow(RangeError);
  });
});

describe("formatDateFromTemplate()", () => {
  it("lets the locale order the fields", () => {
    const date = new Date(Date.UTC(2019, 11, 31));
    expect(formatDateFromTemplate(date, "MMMMd", "en-US")).toBe("December 31");
    expect(formatDateFromTemplate(date, "MMMMd", "de-DE")).toBe("31. Dezember");
  });
});

describe("formatISO8601()", () => {
  it("drops fractional seconds by default", () => {
    expect(formatISO8601(july15)).toBe("2019-07-15T00:00:00Z");
  });

  it("keeps them when asked", () => {
    expect(formatISO8601(new Date(july15.getTime() + 123), true)).toBe("2019-07-15T00:00:00.123Z");
  });
});

describe("formatDuration()", () => {
  it("formats a single unit", () => {
    expect(formatDuration(600, "en")).toBe("10 minutes");
  });

  it("formats zero as seconds", () => {
    expect(formatDuration(0, "en")).toBe("0 seconds");
  });

  it("limits the number of units", () => {
    expect(formatDuration(3661, "en", { maximumUnitCount: 1 })).toBe("1 hour");
  });
});

describe("formatDateInterval()", () => {
  it("includes both ends", () => {
    const text = formatDateInterval(
      new Date(Date.UTC(2019, 5, 3)),
      new Date(Date.UTC(2019, 5, 7)),
      "en-US",
    );
    expect(text.startsWith("6/3/19")).toBe(true);
    expect(text.endsWith("6/7/19")).toBe(true);
  });
});

describe("formatRelativeTime()", () => {
  const now = new Date(Date.UTC(2024, 4, 1));

  it("uses the largest whole unit", () => {
    expect(formatRelativeTime(new Date(now.getTime() - 21 * DAY_MS), now, "en")).toBe("3 weeks ago");
  });

  it("describes the future", () => {
    expect(formatRelativeTime(new Date(now.getTime() + 2 * 3_600_000), now, "en")).toBe("in 2 hours");
  });

  it("uses words in auto mode", () => {
    expect(formatRelativeTime(new Date(now.getTime() - DAY_MS), now, "en", "auto")).toBe("yesterday");
  });
});
