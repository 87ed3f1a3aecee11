import { describe, it, expect, vi } from "vitest";
import { DEFAULT_CAT_FACT_URL, executeCatFact } from "../../operations/cat-fact.js";
import { catFactBody, createMockAdapter, jsonResponse, textResponse } from "../fixtures.js";

describe("executeCatFact()", () => {
  it("returns the text of the fact", async () => {
    const adapter = createMockAdapter(jsonResponse(200, catFactBody));
    const result = await executeCatFact(adapter);
    expect(result).toEqual({ success: true, data: "Cats own you." });
  });

  it("requests the default endpoint", async () => {
    const adapter = createMockAdapter(jsonResponse(200, catFactBody));
    await executeCatFact(adapter);
    expect(vi.mocked(adapter.send).mock.calls[0]?.[0]).toEqual({ url: DEFAULT_CAT_FACT_URL });
  });

  it("requests a custom endpoint", async () => {
    const adapter = createMockAdapter(jsonResponse(200, catFactBody));
    await executeCatFact(adapter, "https://facts.test/random");
    expect(vi.mocked(adapter.send).mock.calls[0]?.[0]).toEqual({ url: "https://facts.test/random" });
  });

  it("returns a decoding error when text is missing", async () => {
    const adapter = createMockAdapter(jsonResponse(200, { fact: "Cats own you." }));
    const result = await executeCatFact(adapter);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.type).toBe("decoding");
  });

  it("returns invalidResponse for a server error", async () => {
    const adapter = createMockAdapter(textResponse(500, "oops"));
    const result = await executeCatFact(adapter);
    expect(result.success).toBe(false);
    if (!result.success && result.error.type === "invalidResponse") {
      expect(result.error.statusCode).toBe(500);
    }
  });
});
