import { describe, it, expect } from "vitest";
import { loadConfig } from "../../core/config.js";
import { DEFAULT_CAT_FACT_URL } from "../../operations/cat-fact.js";
import { DEFAULT_EXCHANGE_RATES_URL } from "../../operations/exchange-rates.js";

describe("loadConfig()", () => {
  it("applies defaults to an empty environment", async () => {
    expect(await loadConfig({})).toEqual({
      success: true,
      data: {
        locale: "en-US",
        timeZone: "UTC",
        endpoints: {
          catFact: DEFAULT_CAT_FACT_URL,
          exchangeRates: DEFAULT_EXCHANGE_RATES_URL,
        },
        logLevel: "warn",
        lowDataMode: false,
      },
    });
  });

  it("reads every variable", async () => {
    const result = await loadConfig({
      RESULT_INTL_LOCALE: "de-DE",
      RESULT_INTL_TIME_ZONE: "Europe/Berlin",
      CAT_FACT_URL: "https://facts.test/random",
      EXCHANGE_RATES_URL: "https://rates.test",
      LOG_LEVEL: "debug",
      LOW_DATA_MODE: "1",
    });
    expect(result).toEqual({
      success: true,
      data: {
        locale: "de-DE",
        timeZone: "Europe/Berlin",
        endpoints: { catFact: "https://facts.test/random", exchangeRates: "https://rates.test" },
        logLevel: "debug",
        lowDataMode: true,
      },
    });
  });

  it.each([
    ["true", true],
    ["false", false],
    ["0", false],
  ])("reads LOW_DATA_MODE=%s", async (value, expected) => {
    const result = await loadConfig({ LOW_DATA_MODE: value });
    expect(result.success && result.data.lowDataMode).toBe(expected);
  });

  it("reports the variable that is invalid", async () => {
    const result = await loadConfig({ LOG_LEVEL: "loud" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("decoding");
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]?.path).toEqual(["LOG_LEVEL"]);
    }
  });

  it("rejects an unknown time zone", async () => {
    const result = await loadConfig({ RESULT_INTL_TIME_ZONE: "Mars/Olympus_Mons" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Unknown time zone");
    }
  });

  it("rejects a malformed locale", async () => {
    const result = await loadConfig({ RESULT_INTL_LOCALE: "not a locale" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Unsupported locale");
    }
  });

  it("rejects an endpoint that is not a URL", async () => {
    const result = await loadConfig({ CAT_FACT_URL: "facts" });
    expect(result.success).toBe(false);
  });
});
