/**
 * Human-readable reason phrases for HTTP status codes.
 */

import { z } from "zod";
import { loadDataFile } from "./data.js";

const statusCodesSchema = z.record(z.string().regex(/^\d{3}$/), z.string());

let statusTexts: Readonly<Record<string, string>> | undefined;

const table = (): Readonly<Record<string, string>> => {
  statusTexts ??= Object.freeze(
    loadDataFile("status-codes.json", statusCodesSchema),
  );
  return statusTexts;
};

/**
 * Returns the lower-case reason phrase for `statusCode`.
 *
 * Codes without a phrase of their own fall back to the name of their class,
 * e.g. `"client error"` for 499.
 */
export const localizedStatusText = (statusCode: number): string => {
  const known = table()[String(statusCode)];
  if (known !== undefined) return known;

  if (statusCode >= 100 && statusCode < 200) return "informational";
  if (statusCode >= 200 && statusCode < 300) return "success";
  if (statusCode >= 300 && statusCode < 400) return "redirected";
  if (statusCode >= 400 && statusCode < 500) return "client error";
  return "server error";
};
