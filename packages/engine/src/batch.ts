/**
 * Batch scoring: one independent computation per input. A row that fails to
 * parse is recorded with its error and the batch carries on.
 */

import { safeScoreVector, type ScoreOutcome } from "./cvss/score.js";
import type { Severity } from "./cvss/severity.js";
import { logger } from "./logger.js";

export interface BatchRow {
  /** 1-based position in the input list */
  index: number;
  input: string;
  outcome: ScoreOutcome;
}

export interface BatchSummary {
  total: number;
  scored: number;
  failed: number;
  /** Scored rows per base severity */
  bySeverity: Record<Severity, number>;
}

export interface BatchReport {
  rows: BatchRow[];
  summary: BatchSummary;
}

/**
 * Split a vector list file into inputs: one vector per line, blank lines and
 * `#` comments skipped.
 */
export function readVectorList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export function summarize(rows: readonly BatchRow[]): BatchSummary {
  const bySeverity: Record<Severity, number> = { None: 0, Low: 0, Medium: 0, High: 0, Critical: 0 };
  let scored = 0;

  for (const row of rows) {
    if (!row.outcome.success) continue;
    scored++;
    bySeverity[row.outcome.result.baseSeverity]++;
  }

  return { total: rows.length, scored, failed: rows.length - scored, bySeverity };
}

export function scoreBatch(inputs: readonly (string | null | undefined)[]): BatchReport {
  const rows = inputs.map((raw, i): BatchRow => {
    const outcome = safeScoreVector(raw);
    if (!outcome.success) {
      logger.debug(`row ${i + 1}: ${outcome.error.message}`);
    }
    return { index: i + 1, input: raw ?? "", outcome };
  });

  const summary = summarize(rows);
  logger.info(`Scored ${summary.scored}/${summary.total} vectors (${summary.failed} failed)`);
  return { rows, summary };
}
