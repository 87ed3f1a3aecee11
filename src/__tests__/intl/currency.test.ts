import { describe, it, expect } from "vitest";
import { formatCurrency, formatNumber, formatRates } from "../../intl/currency.js";

describe("formatCurrency()", () => {
  it("formats for en-US", () => {
    expect(formatCurrency(12, "USD", "en-US")).toBe("$12.00");
  });

  it("formats for de-DE", () => {
    expect(formatCurrency(1.4, "USD", "de-DE")).toBe("1,40\u00a0$");
  });
});

describe("formatRates()", () => {
  it("formats each rate in its currency, ordered by code", () => {
    expect(formatRates({ USD: 1.4, EUR: 1 }, "en-US")).toEqual(["€1.00", "$1.40"]);
  });

  it("returns nothing for no rates", () => {
    expect(formatRates({}, "en-US")).toEqual([]);
  });
});

describe("formatNumber()", () => {
  it("groups digits for the locale", () => {
    expect(formatNumber(1234.56, "en-US")).toBe("1,234.56");
    expect(formatNumber(1234.56, "de-DE")).toBe("1.234,56");
  });
});
