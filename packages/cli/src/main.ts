import { logger } from "@cvsskit/engine";
import { parseArgs, UsageError, type ParsedArgs } from "./args.js";
import { runScore } from "./commands/score.js";
import { runBatch } from "./commands/batch.js";
import { runMetrics } from "./commands/metrics.js";
import { runInit } from "./commands/init.js";

export const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mcvsskit\x1b[0m — CVSS v3.1 / v4.0 vector scoring
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  cvsskit score <vector...>         Score one or more vectors
  cvsskit batch <file>              Score a vector list (one per line, # comments)
  cvsskit metrics                   List the metrics of a CVSS version
  cvsskit init [path]               Write a starter .cvsskit.yml
  cvsskit version                   Print version

\x1b[1mSCORE OPTIONS\x1b[0m
  --format <fmt>               Output: table, json (default: table)
  --fail-on <severity>         Exit 1 if a base score >= severity (none, low, medium, high, critical)

\x1b[1mBATCH OPTIONS\x1b[0m
  --format <fmt>               Output: table, json, csv, markdown (default: from .cvsskit.yml, else table)
  --output <file>              Write report to file
  --fail-on <severity>         Exit 1 if a base score >= severity (overrides fail_on)

\x1b[1mMETRICS OPTIONS\x1b[0m
  --cvss <version>             3.1 or 4.0 (default: 3.1)
  --format <fmt>               Output: table, json (default: table)

\x1b[1mEXAMPLES\x1b[0m
  cvsskit score CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H
  cvsskit score "CVSS:4.0/AV:N/AC:L/AT:N/PR:N/UI:N/VC:H/VI:H/VA:H/SC:N/SI:N/SA:N" --format json
  cvsskit batch vectors.txt --format csv --output scores.csv
  cvsskit batch vectors.txt --fail-on high            CI gate on high+ base scores
  cvsskit metrics --cvss 4.0

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output
  --no-color                   Plain output (also NO_COLOR)

\x1b[1mENVIRONMENT\x1b[0m
  CVSSKIT_LOG_LEVEL                 Log level: debug, info, warn, error, silent

`);
}

/** ANSI output only on a terminal, and never under `--no-color` or `NO_COLOR`. */
export function shouldUseColor(args: Record<string, string>, isTTY: boolean, env: NodeJS.ProcessEnv): boolean {
  return isTTY && !env.NO_COLOR && args["no-color"] !== "true";
}

/** Dispatch one invocation and resolve to its exit code. */
export async function main(argv: string[]): Promise<number> {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    printHelp();
    return 0;
  }

  if (argv.includes("--version") || argv.includes("-v")) {
    process.stdout.write(`cvsskit v${VERSION}\n`);
    return 0;
  }

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      logger.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
  const { command, args, positional } = parsed;
  const color = shouldUseColor(args, process.stdout.isTTY === true, process.env);

  switch (command) {
    case "version":
      process.stdout.write(`cvsskit v${VERSION}\n`);
      return 0;

    case "score":
      return runScore({
        vectors: positional,
        format: args["format"] || "table",
        failOn: args["fail-on"],
        color,
      });

    case "batch": {
      if (!positional[0]) {
        logger.error("Error: no file given. Usage: cvsskit batch <file>");
        return 1;
      }
      return runBatch({
        file: positional[0],
        cwd: process.cwd(),
        format: args["format"],
        output: args["output"],
        failOn: args["fail-on"],
        color,
      });
    }

    case "metrics":
      return runMetrics({
        version: args["cvss"] || "3.1",
        format: args["format"] || "table",
        color,
      });

    case "init":
      return runInit({ path: positional[0] || "." });

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 1;
  }
}
