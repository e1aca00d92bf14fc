/**
 * Markdown batch report generator.
 *
 * Produces a standalone markdown document with a severity summary, one row per
 * scored vector and a list of the inputs that could not be scored.
 */

import type { BatchReport } from "../batch.js";
import { adjustedScore } from "../cvss/score.js";
import { SEVERITY_ORDER, type Severity } from "../cvss/severity.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportOptions {
  title?: string;
  timestamp?: string | Date;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function scoreCell(score: number | null, severity: Severity | null): string {
  if (score === null || severity === null) return "—";
  return `${score.toFixed(1)} ${severity}`;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Generate a markdown report for a scored batch. `report.rows` may already be
 * filtered; the summary always describes the whole batch.
 */
export function generateMarkdownReport(report: BatchReport, options?: ReportOptions): string {
  const title = options?.title ?? "CVSS Report";
  const ts =
    options?.timestamp instanceof Date
      ? options.timestamp.toISOString()
      : options?.timestamp ?? new Date().toISOString();

  const { summary } = report;
  const sections: string[] = [];

  sections.push(`# ${title}`);
  sections.push("");
  sections.push(`*Generated: ${ts}*`);
  sections.push("");

  // ── Summary ────────────────────────────────────────────────────────────
  sections.push("## Summary");
  sections.push("");
  sections.push(`**${summary.scored} of ${summary.total} vectors scored, ${summary.failed} failed**`);
  sections.push("");
  sections.push("| Severity | Count |");
  sections.push("|----------|-------|");
  for (const sev of [...SEVERITY_ORDER].reverse()) {
    sections.push(`| ${sev} | ${summary.bySeverity[sev]} |`);
  }
  sections.push("");

  // ── Scores ─────────────────────────────────────────────────────────────
  const scored = report.rows.flatMap((row) =>
    row.outcome.success ? [{ index: row.index, result: row.outcome.result }] : [],
  );

  if (scored.length > 0) {
    sections.push("## Scores");
    sections.push("");
    sections.push("| # | Vector | Base | Temporal / Threat | Environmental |");
    sections.push("|---|--------|------|-------------------|---------------|");
    for (const { index, result } of scored) {
      const adjusted = adjustedScore(result);
      sections.push(
        `| ${index} | \`${cell(result.vectorString)}\` | ${scoreCell(result.baseScore, result.baseSeverity)} | ` +
          `${scoreCell(adjusted.score, adjusted.severity)} | ` +
          `${scoreCell(result.environmentalScore, result.environmentalSeverity)} |`,
      );
    }
    sections.push("");
  }

  // ── Failures ───────────────────────────────────────────────────────────
  const failed = report.rows.flatMap((row) =>
    row.outcome.success ? [] : [{ index: row.index, input: row.input, error: row.outcome.error }],
  );

  if (failed.length > 0) {
    sections.push("## Failures");
    sections.push("");
    sections.push("| # | Input | Error |");
    sections.push("|---|-------|-------|");
    for (const { index, input, error } of failed) {
      sections.push(`| ${index} | \`${cell(input)}\` | ${cell(error.message)} |`);
    }
    sections.push("");
  }

  return sections.join("\n");
}
