/**
 * Shared test fixtures used across all test files.
 */

import { vi } from "vitest";
import type { HttpAdapter, HttpResponse } from "../adapters/adapter.js";
import type { Catalogs } from "../intl/messages.js";

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

const encoder = new TextEncoder();

export const textResponse = (
  status: number,
  text: string,
  url = "https://api.test/resource",
): HttpResponse => ({
  url,
  status,
  headers: { "content-type": "application/json" },
  body: encoder.encode(text),
});

export const jsonResponse = (
  status: number,
  value: unknown,
  url?: string,
): HttpResponse => textResponse(status, JSON.stringify(value), url);

// ---------------------------------------------------------------------------
// Mock adapter factory
// ---------------------------------------------------------------------------

export const createMockAdapter = (
  response: HttpResponse = jsonResponse(200, {}),
): HttpAdapter => ({
  send: vi.fn().mockResolvedValue(response),
});

// ---------------------------------------------------------------------------
// Sample data
// ---------------------------------------------------------------------------

export const catFactBody = { text: "Cats own you.", type: "cat", used: false };

export const ratesBody = {
  base: "EUR",
  date: "2010-01-12",
  rates: { USD: 1.4515, JPY: 132.39, GBP: 0.8993 },
};

/** A fixed "today" after every date used in tests. */
export const fixedNow = (): Date => new Date(Date.UTC(2024, 4, 1, 12));

export const testCatalogs: Catalogs = {
  en: {
    greeting: "Hello, {name}!",
    exchange_rates_unsupported_date: "The selected date is not supported.",
    items: { one: "{count} item", other: "{count} items" },
    only_english: "English only",
  },
  de: {
    greeting: "Hallo, {name}!",
    exchange_rates_unsupported_date: "Das gewählte Datum wird nicht unterstützt.",
    items: { one: "{count} Eintrag", other: "{count} Einträge" },
  },
  "de-AT": {
    greeting: "Servus, {name}!",
  },
};
