/**
 * Loads the JSON tables shipped in the package's `data/` directory.
 * The directory sits two levels above both `src/intl` and `dist/intl`.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const DATA_DIR = new URL("../../data/", import.meta.url);

/** Reads `data/<relativePath>` and parses it with `schema`. Throws on mismatch. */
export const loadDataFile = <S extends z.ZodTypeAny>(
  relativePath: string,
  schema: S,
): z.output<S> =>
  schema.parse(
    JSON.parse(readFileSync(new URL(relativePath, DATA_DIR), "utf8")),
  );
