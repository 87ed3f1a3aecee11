import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";
import { createClient } from "../../core/create-client.js";
import { NetworkUnavailableError } from "../../adapters/adapter.js";
import type { HttpResponse } from "../../adapters/adapter.js";
import type { Result } from "../../types/common.js";
import type { RequestError } from "../../types/errors.js";
import type { Logger } from "../../types/logger.js";
import { DEFAULT_CAT_FACT_URL } from "../../operations/cat-fact.js";
import { DEFAULT_EXCHANGE_RATES_URL } from "../../operations/exchange-rates.js";
import {
  catFactBody,
  createMockAdapter,
  fixedNow,
  jsonResponse,
  ratesBody,
  textResponse,
} from "../fixtures.js";

const createSpyLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe("createClient()", () => {
  let adapter: ReturnType<typeof createMockAdapter>;

  beforeEach(() => {
    adapter = createMockAdapter(jsonResponse(200, catFactBody));
  });

  it("returns a frozen client", () => {
    expect(Object.isFrozen(createClient({ adapter }))).toBe(true);
  });

  it("uses the default endpoints", () => {
    expect(createClient({ adapter }).endpoints).toEqual({
      catFact: DEFAULT_CAT_FACT_URL,
      exchangeRates: DEFAULT_EXCHANGE_RATES_URL,
    });
  });

  it("overrides endpoints one at a time", () => {
    const client = createClient({ adapter, endpoints: { catFact: "https://facts.test/random" } });
    expect(client.endpoints).toEqual({
      catFact: "https://facts.test/random",
      exchangeRates: DEFAULT_EXCHANGE_RATES_URL,
    });
  });

  describe("send", () => {
    it("accepts a URL string", async () => {
      const client = createClient({ adapter });
      const result = await client.send("https://api.test/a");
      expect(result.success).toBe(true);
      expect(adapter.send).toHaveBeenCalledWith({ url: "https://api.test/a" });
    });

    it("accepts a full request", async () => {
      const client = createClient({ adapter });
      await client.send({ url: "https://api.test/a", method: "HEAD" });
      expect(adapter.send).toHaveBeenCalledWith({ url: "https://api.test/a", method: "HEAD" });
    });

    it("logs failures through the configured logger", async () => {
      const logger = createSpyLogger();
      vi.mocked(adapter.send).mockRejectedValueOnce(new Error("offline"));
      const client = createClient({ adapter, logger });

      await client.send("https://api.test/a");

      expect(logger.warn).toHaveBeenCalledWith("request failed", {
        url: "https://api.test/a",
        message: "offline",
      });
    });
  });

  describe("dataTask", () => {
    it("delivers the response to the completion after resume", async () => {
      const client = createClient({ adapter });
      const delivered = new Promise<Result<HttpResponse, RequestError>>((resolve) => {
        const task = client.dataTask("https://api.test/a", resolve);
        expect(task.state()).toBe("suspended");
        task.resume();
      });

      const result = await delivered;
      expect(result.success).toBe(true);
      if (result.success) expect(result.data.status).toBe(200);
    });
  });

  describe("fetchJson", () => {
    it("decodes the body with the schema", async () => {
      const client = createClient({ adapter });
      const result = await client.fetchJson("https://api.test/a", z.object({ used: z.boolean() }));
      expect(result).toEqual({ success: true, data: { used: false } });
    });
  });

  describe("fetchCatFact", () => {
    it("requests the configured endpoint", async () => {
      const client = createClient({ adapter, endpoints: { catFact: "https://facts.test/random" } });
      const result = await client.fetchCatFact();
      expect(result).toEqual({ success: true, data: "Cats own you." });
      expect(adapter.send).toHaveBeenCalledWith({ url: "https://facts.test/random" });
    });
  });

  describe("fetchExchangeRates", () => {
    it("accepts a date string", async () => {
      vi.mocked(adapter.send).mockResolvedValueOnce(jsonResponse(200, ratesBody));
      const client = createClient({
        adapter,
        endpoints: { exchangeRates: "https://rates.test" },
        now: fixedNow,
      });

      const result = await client.fetchExchangeRates("2010-01-12");

      expect(result.success).toBe(true);
      expect(adapter.send).toHaveBeenCalledWith({ url: "https://rates.test/2010-01-12" });
    });

    it("accepts a query", async () => {
      vi.mocked(adapter.send).mockResolvedValueOnce(jsonResponse(200, ratesBody));
      const client = createClient({ adapter, endpoints: { exchangeRates: "https://rates.test" } });

      await client.fetchExchangeRates({ date: "latest", base: "USD" });

      expect(adapter.send).toHaveBeenCalledWith({ url: "https://rates.test/latest?base=USD" });
    });

    it("checks dates against the configured clock", async () => {
      const client = createClient({ adapter, now: fixedNow });
      const result = await client.fetchExchangeRates("2030-01-01");
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.type).toBe("unsupportedDate");
      expect(adapter.send).not.toHaveBeenCalled();
    });
  });

  describe("fetchAdaptive", () => {
    it("falls back to the low data resource and logs it", async () => {
      const logger = createSpyLogger();
      vi.mocked(adapter.send)
        .mockRejectedValueOnce(new NetworkUnavailableError("constrained", "https://media.test/hd"))
        .mockResolvedValueOnce(textResponse(200, "sd"));
      const client = createClient({ adapter, logger });

      const result = await client.fetchAdaptive("https://media.test/hd", "https://media.test/sd");

      expect(result.success).toBe(true);
      expect(logger.info).toHaveBeenCalledWith("network constrained, using low data resource", {
        url: "https://media.test/hd",
        lowDataUrl: "https://media.test/sd",
      });
    });
  });
});
