import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ok, err } from "../../types/common.js";
import { bodyText, decodeData, decodeJson } from "../../validation/decode.js";
import { DecodingFailure } from "../../validation/errors.js";

const catFactSchema = z.object({ text: z.string() });
const bytes = new TextEncoder().encode('{ "text": "Cats own you." }');

describe("bodyText()", () => {
  it("decodes UTF-8 bytes", () => {
    expect(bodyText(new TextEncoder().encode("Grüße"))).toBe("Grüße");
  });

  it("returns strings unchanged", () => {
    expect(bodyText("plain")).toBe("plain");
  });
});

describe("decodeJson()", () => {
  it("decodes bytes that match the schema", async () => {
    const result = await decodeJson(catFactSchema, bytes);
    expect(result).toEqual(ok({ text: "Cats own you." }));
  });

  it("decodes a string body", async () => {
    const result = await decodeJson(catFactSchema, '{"text":"Purr."}');
    expect(result).toEqual(ok({ text: "Purr." }));
  });

  it("returns a decoding error for malformed JSON", async () => {
    const result = await decodeJson(catFactSchema, "{ not json");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("decoding");
      expect(result.error.cause).toBeInstanceOf(SyntaxError);
    }
  });

  it("returns a decoding error when the schema rejects the value", async () => {
    const result = await decodeJson(catFactSchema, '{"fact":"wrong key"}');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["text"]);
    }
  });
});

describe("decodeData()", () => {
  it("returns the decoded value of a successful body", async () => {
    const fact = await decodeData(ok(bytes), catFactSchema);
    expect(fact.text).toBe("Cats own you.");
  });

  it("rethrows the failure of the result unchanged", async () => {
    const failure = { type: "request", message: "offline" };
    await expect(decodeData(err(failure), catFactSchema)).rejects.toBe(failure);
  });

  it("throws a DecodingFailure when decoding fails", async () => {
    await expect(decodeData(ok("[]"), catFactSchema)).rejects.toBeInstanceOf(
      DecodingFailure,
    );
  });
});
