import { logger, safeScoreVector, type Severity } from "@cvsskit/engine";
import { formatScoreTable, outcomeToJson } from "../formatter.js";
import { breachesGate, parseFailOn } from "./gate.js";

export interface ScoreOptions {
  vectors: string[];
  format: string;
  failOn?: string;
  color: boolean;
}

/**
 * Score each vector given on the command line. Exit code is 1 when any input
 * fails to parse or a base score reaches `--fail-on`.
 */
export function runScore(options: ScoreOptions): number {
  if (options.vectors.length === 0) {
    logger.error("Error: no vector given. Usage: cvsskit score <vector...>");
    return 1;
  }
  if (options.format !== "table" && options.format !== "json") {
    logger.error(`Error: invalid --format '${options.format}' (expected table or json)`);
    return 1;
  }

  let threshold: Severity | null = null;
  if (options.failOn !== undefined) {
    const failOn = parseFailOn(options.failOn);
    if (!failOn.valid) {
      logger.error(`Error: invalid --fail-on '${options.failOn}' (expected none, low, medium, high or critical)`);
      return 1;
    }
    threshold = failOn.severity;
  }

  const entries = options.vectors.map((input) => ({ input, outcome: safeScoreVector(input) }));

  if (options.format === "json") {
    const json = entries.map(({ input, outcome }) => outcomeToJson(input, outcome));
    process.stdout.write(JSON.stringify(json, null, 2) + "\n");
  } else {
    process.stdout.write(formatScoreTable(entries, { color: options.color }) + "\n");
  }

  const severities = entries.flatMap(({ outcome }) => (outcome.success ? [outcome.result.baseSeverity] : []));
  const failed = entries.length - severities.length;

  if (failed > 0) {
    logger.debug(`${failed} of ${entries.length} vectors could not be scored`);
    return 1;
  }
  return breachesGate(severities, threshold) ? 1 : 0;
}
