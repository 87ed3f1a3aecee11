/**
 * Environment configuration for the command-line entry point.
 */

import { z } from "zod";
import type { Result } from "../types/common.js";
import type { DecodingError } from "../validation/errors.js";
import type { LogLevel } from "../types/logger.js";
import type { Endpoints } from "./create-client.js";
import { mapResult } from "../types/common.js";
import { validate } from "../validation/validate.js";
import { DEFAULT_CAT_FACT_URL } from "../operations/cat-fact.js";
import { DEFAULT_EXCHANGE_RATES_URL } from "../operations/exchange-rates.js";

const isSupportedLocale = (tag: string): boolean => {
  try {
    return Intl.NumberFormat.supportedLocalesOf([tag]).length > 0;
  } catch {
    return false;
  }
};

const isTimeZone = (zone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
};

/** Environment variables read by {@link loadConfig}. */
export const envSchema = z.object({
  RESULT_INTL_LOCALE: z
    .string()
    .default("en-US")
    .refine(isSupportedLocale, { message: "Unsupported locale" }),
  RESULT_INTL_TIME_ZONE: z
    .string()
    .default("UTC")
    .refine(isTimeZone, { message: "Unknown time zone" }),
  CAT_FACT_URL: z.string().url().default(DEFAULT_CAT_FACT_URL),
  EXCHANGE_RATES_URL: z.string().url().default(DEFAULT_EXCHANGE_RATES_URL),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  LOW_DATA_MODE: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1"),
});

/** Resolved configuration. */
export interface AppConfig {
  readonly locale: string;
  readonly timeZone: string;
  readonly endpoints: Endpoints;
  readonly logLevel: LogLevel;
  readonly lowDataMode: boolean;
}

/**
 * Reads configuration from environment variables.
 *
 * @param env - Usually `process.env`
 * @returns The resolved configuration, or a DecodingError naming each bad variable
 */
export const loadConfig = async (
  env: Readonly<Record<string, string | undefined>>,
): Promise<Result<AppConfig, DecodingError>> =>
  mapResult(await validate(envSchema, env), (parsed) =>
    Object.freeze({
      locale: parsed.RESULT_INTL_LOCALE,
      timeZone: parsed.RESULT_INTL_TIME_ZONE,
      endpoints: Object.freeze({
        catFact: parsed.CAT_FACT_URL,
        exchangeRates: parsed.EXCHANGE_RATES_URL,
      }),
      logLevel: parsed.LOG_LEVEL,
      lowDataMode: parsed.LOW_DATA_MODE,
    }),
  );
