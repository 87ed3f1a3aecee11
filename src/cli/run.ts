/**
 * Command-line runner. Kept free of process globals so it can be driven from
 * tests with a stub adapter and captured output.
 */

import { parseArgs } from "node:util";
import type { HttpAdapter } from "../adapters/adapter.js";
import type { Logger } from "../types/logger.js";
import { tryResult } from "../types/common.js";
import { createFetchAdapter } from "../adapters/fetch.js";
import { createClient } from "../core/create-client.js";
import { type AppConfig, loadConfig } from "../core/config.js";
import { createRatesReporter } from "../core/report.js";
import { createLocalizer } from "../intl/messages.js";
import { createConsoleLogger } from "../utils/logger.js";
import { formatShowcase } from "./showcase.js";

export const USAGE = `Usage: result-intl <command> [options]

Commands:
  cat-fact                 Print a random cat fact
  rates [YYYY-MM-DD]       Print exchange rates for a day (default: latest)
  formats                  Print sample values in the configured locale

Options:
  --locale <tag>           Override RESULT_INTL_LOCALE
  -h, --help               Show this help`;

/** Side effects the runner needs. */
export interface CliEnvironment {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  /** Builds the adapter from the resolved config. Defaults to `fetch`. */
  readonly createAdapter?: ((config: AppConfig) => HttpAdapter) | undefined;
  readonly createLogger?: ((config: AppConfig) => Logger) | undefined;
  readonly now?: (() => Date) | undefined;
}

/**
 * Runs one command and resolves to the process exit code.
 */
export const runCli = async (
  argv: readonly string[],
  environment: CliEnvironment,
): Promise<number> => {
  const { stdout, stderr } = environment;

  const parsedArgs = tryResult(() =>
    parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        locale: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }),
  );
  if (!parsedArgs.success) {
    const cause = parsedArgs.error;
    stderr(cause instanceof Error ? cause.message : String(cause));
    stderr(USAGE);
    return 2;
  }
  const parsed = parsedArgs.data;

  const [command, ...rest] = parsed.positionals;
  if (parsed.values.help) {
    stdout(USAGE);
    return 0;
  }
  if (command === undefined) {
    stderr(USAGE);
    return 2;
  }

  const env = parsed.values.locale
    ? { ...environment.env, RESULT_INTL_LOCALE: parsed.values.locale }
    : environment.env;
  const configResult = await loadConfig(env);
  if (!configResult.success) {
    stderr(configResult.error.message);
    return 2;
  }
  const config = configResult.data;

  const logger =
    environment.createLogger?.(config) ?? createConsoleLogger({ level: config.logLevel });
  const adapter =
    environment.createAdapter?.(config) ??
    createFetchAdapter({ lowDataMode: config.lowDataMode });
  const client = createClient({
    adapter,
    logger,
    endpoints: config.endpoints,
    now: environment.now,
  });
  const localizer = createLocalizer({ locale: config.locale });

  switch (command) {
    case "cat-fact": {
      const result = await client.fetchCatFact();
      if (!result.success) {
        stderr(result.error.message);
        return 1;
      }
      stdout(`${localizer.t("cat_fact_title")} ${result.data}`);
      return 0;
    }
    case "rates": {
      const reporter = createRatesReporter({ client, localizer, write: stdout });
      const succeeded = await reporter.printExchangeRates(rest[0] ?? "latest");
      return succeeded ? 0 : 1;
    }
    case "formats": {
      const now = environment.now?.() ?? new Date();
      for (const line of formatShowcase(config.locale, config.timeZone, now, localizer)) {
        stdout(line);
      }
      return 0;
    }
    default:
      stderr(`Unknown command "${command}"`);
      stderr(USAGE);
      return 2;
  }
};
