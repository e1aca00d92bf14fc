import type { BatchReport } from "../batch.js";
import { adjustedScore } from "../cvss/score.js";

export const CSV_HEADER = [
  "row",
  "vector",
  "version",
  "base_score",
  "base_severity",
  "temporal_score",
  "environmental_score",
  "environmental_severity",
  "impact_score",
  "exploitability_score",
  "error",
] as const;

function csvEscape(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function num(score: number | null): string {
  return score === null ? "" : score.toFixed(1);
}

function subScore(value: number): string {
  return value.toFixed(3);
}

/**
 * One line per row; `temporal_score` holds the v4.0 threat score for 4.0
 * vectors. Impact and exploitability are the unrounded base sub-scores, to
 * three decimals.
 */
export function formatCsv(report: BatchReport): string {
  const lines = [CSV_HEADER.join(",")];

  for (const row of report.rows) {
    let fields: string[];
    if (row.outcome.success) {
      const r = row.outcome.result;
      fields = [
        String(row.index),
        r.vectorString,
        r.version,
        num(r.baseScore),
        r.baseSeverity,
        num(adjustedScore(r).score),
        num(r.environmentalScore),
        r.environmentalSeverity ?? "",
        subScore(r.impactScore),
        subScore(r.exploitabilityScore),
        "",
      ];
    } else {
      fields = [String(row.index), row.input, "", "", "", "", "", "", "", "", row.outcome.error.message];
    }
    lines.push(fields.map(csvEscape).join(","));
  }

  return lines.join("\n") + "\n";
}
