import * as path from "path";
import { RunSettings } from "./types";

export type Command = "crawl" | "golden";

export interface CliArgs {
  command: Command;
  configPath?: string;
  outputDir: string;
  overrides: Partial<RunSettings>;
}

/** A flag given with no value parses as NaN so settings validation rejects it */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value.trim() === "" ? Number.NaN : Number(value);
}

/**
 * Parse CLI arguments.
 * Supports a command (crawl | golden) and --config, --output, --timeout,
 * --max-items, --concurrency, --delay, --request-timeout.
 */
export function parseArgs(argv: string[]): CliArgs {
  const opts: Record<string, string> = {};
  let command: Command = "crawl";

  for (const arg of argv) {
    if (arg === "crawl" || arg === "golden") { command = arg; continue; }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    }
  }

  return {
    command,
    configPath: opts.config,
    outputDir: path.resolve(opts.output || "./output"),
    overrides: {
      maxRuntimeSeconds: parseNumber(opts.timeout),
      maxItems: parseNumber(opts["max-items"]),
      concurrency: parseNumber(opts.concurrency),
      delayMs: parseNumber(opts.delay),
      requestTimeoutMs: parseNumber(opts["request-timeout"]),
    },
  };
}
