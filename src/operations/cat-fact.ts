/**
 * Cat fact operation: fetches one random fact and returns its text.
 */

import { z } from "zod";
import type { HttpAdapter } from "../adapters/adapter.js";
import type { Logger } from "../types/logger.js";
import type { FetchError } from "../types/errors.js";
import { type Result, mapResult } from "../types/common.js";
import { executeJsonRequest } from "./json-request.js";

export const DEFAULT_CAT_FACT_URL = "https://cat-fact.herokuapp.com/facts/random";

/** Shape of a cat fact body. Extra fields are ignored. */
export const catFactSchema = z.object({
  text: z.string(),
});

export type CatFact = z.output<typeof catFactSchema>;

/**
 * Fetches a random cat fact.
 *
 * @param adapter - The HTTP adapter
 * @param url - Endpoint returning `{ "text": string }`
 * @param logger - Optional logger
 * @returns The fact text or a FetchError
 */
export const executeCatFact = async (
  adapter: HttpAdapter,
  url: string = DEFAULT_CAT_FACT_URL,
  logger?: Logger,
): Promise<Result<string, FetchError>> =>
  mapResult(
    await executeJsonRequest(adapter, { url }, catFactSchema, logger),
    (fact) => fact.text,
  );
