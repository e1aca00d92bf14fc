import type { BatchReport, MetricTable, ScoreOutcome, ScoreResult, Severity } from "@cvsskit/engine";
import { adjustedScore, SEVERITY_ORDER } from "@cvsskit/engine";

// ANSI escape codes, no dependencies needed
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const WHITE = "\x1b[37m";

export interface FormatOptions {
  color: boolean;
}

function painter({ color }: FormatOptions): (code: string, text: string) => string {
  return (code, text) => (color ? `${code}${text}${RESET}` : text);
}

function severityColor(severity: Severity): string {
  switch (severity) {
    case "Critical": return BG_RED + WHITE;
    case "High": return RED;
    case "Medium": return YELLOW;
    case "Low": return BLUE;
    case "None": return DIM;
  }
}

function scoreText(score: number | null, severity: Severity | null): string {
  return score === null || severity === null ? "—" : `${score.toFixed(1)} ${severity}`;
}

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

export type OutcomeJson =
  | { input: string; result: ScoreResult }
  | { input: string; error: { kind: string; message: string } };

/** Error objects don't serialize their message, so failures are flattened. */
export function outcomeToJson(input: string, outcome: ScoreOutcome): OutcomeJson {
  return outcome.success
    ? { input, result: outcome.result }
    : { input, error: { kind: outcome.error.kind, message: outcome.error.message } };
}

export function formatBatchJson(report: BatchReport): string {
  return JSON.stringify(
    {
      summary: report.summary,
      rows: report.rows.map((row) => ({ row: row.index, ...outcomeToJson(row.input, row.outcome) })),
    },
    null,
    2,
  );
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

const LABEL_W = 15;

/**
 * One block per input: the canonical vector, then a line per score the
 * vector defines. Failed inputs show the parse error instead.
 */
export function formatScoreTable(
  entries: Array<{ input: string; outcome: ScoreOutcome }>,
  options: FormatOptions,
): string {
  const c = painter(options);
  const lines: string[] = [""];

  const scoreLine = (label: string, score: number | null, severity: Severity | null) => {
    if (score === null || severity === null) return;
    lines.push(`    ${label.padEnd(LABEL_W)}${score.toFixed(1).padStart(4)}  ${c(severityColor(severity), severity)}`);
  };

  for (const { input, outcome } of entries) {
    if (!outcome.success) {
      lines.push(`  ${c(BOLD, input)}`);
      lines.push(`    ${c(RED, "Error".padEnd(LABEL_W))}${outcome.error.message}`);
      lines.push("");
      continue;
    }

    const result = outcome.result;
    lines.push(`  ${c(BOLD, result.vectorString)}`);
    scoreLine("Base", result.baseScore, result.baseSeverity);
    if (result.version === "3.1") {
      scoreLine("Temporal", result.temporalScore, result.temporalSeverity);
    } else {
      scoreLine("Threat", result.threatScore, result.threatSeverity);
    }
    scoreLine("Environmental", result.environmentalScore, result.environmentalSeverity);

    if (result.environmentalVector !== null) {
      lines.push(`    ${"Effective".padEnd(LABEL_W)}${c(DIM, result.environmentalVector)}`);
    }
    if (result.version === "4.0" && result.supplemental !== null) {
      const labels = Object.entries(result.supplemental).map(([key, value]) => `${key}=${value}`);
      lines.push(`    ${"Supplemental".padEnd(LABEL_W)}${labels.join(", ")}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

const INDEX_W = 5;
const CELL_W = 14;

export function formatBatchTable(report: BatchReport, options: FormatOptions): string {
  const c = painter(options);
  const { summary } = report;
  const lines: string[] = [];

  lines.push("");
  lines.push(
    `  ${c(BOLD, "#".padEnd(INDEX_W))}${c(BOLD, "BASE".padEnd(CELL_W))}${c(BOLD, "ADJUSTED".padEnd(CELL_W))}` +
      `${c(BOLD, "ENVIRONMENTAL".padEnd(CELL_W))}${c(BOLD, "VECTOR")}`,
  );
  lines.push(`  ${"─".repeat(INDEX_W + CELL_W * 3 + 6)}`);

  for (const row of report.rows) {
    const idx = String(row.index).padEnd(INDEX_W);
    if (!row.outcome.success) {
      lines.push(`  ${idx}${c(RED, "invalid".padEnd(CELL_W * 3))}${row.input}`);
      lines.push(`  ${" ".repeat(INDEX_W)}${c(DIM, row.outcome.error.message)}`);
      continue;
    }

    const result = row.outcome.result;
    const adjusted = adjustedScore(result);
    const base = c(severityColor(result.baseSeverity), scoreText(result.baseScore, result.baseSeverity).padEnd(CELL_W));
    lines.push(
      `  ${idx}${base}${scoreText(adjusted.score, adjusted.severity).padEnd(CELL_W)}` +
        `${scoreText(result.environmentalScore, result.environmentalSeverity).padEnd(CELL_W)}${result.vectorString}`,
    );
  }

  lines.push("");

  const parts: string[] = [];
  for (const sev of [...SEVERITY_ORDER].reverse()) {
    const count = summary.bySeverity[sev];
    if (count > 0) parts.push(c(severityColor(sev), `${sev.toUpperCase()} ${count}`));
  }
  if (parts.length > 0) lines.push(`  ${parts.join("  ")}`);

  const status = summary.failed > 0 ? c(RED, `${summary.failed} failed`) : c(GREEN, "0 failed");
  lines.push(`  ${summary.scored} of ${summary.total} scored, ${status}`);
  lines.push("");

  return lines.join("\n");
}

export function formatMetricsTable(table: MetricTable, options: FormatOptions): string {
  const c = painter(options);
  const lines: string[] = [];

  lines.push("");
  lines.push(c(CYAN, `  CVSS ${table.version} METRICS`));
  lines.push("");

  const codeW = 6;
  const nameW = 30;
  const groupW = 15;

  lines.push(
    `  ${c(BOLD, "CODE".padEnd(codeW))}${c(BOLD, "NAME".padEnd(nameW))}${c(BOLD, "GROUP".padEnd(groupW))}${c(BOLD, "VALUES")}`,
  );
  lines.push(`  ${"─".repeat(codeW + nameW + groupW + 24)}`);

  for (const metric of table.metrics) {
    const code = metric.required ? c(BOLD, metric.code.padEnd(codeW)) : metric.code.padEnd(codeW);
    const values = Object.entries(metric.values).map(([value, label]) => `${value}=${label}`).join(", ");
    lines.push(`  ${code}${metric.name.padEnd(nameW)}${c(DIM, metric.group.padEnd(groupW))}${values}`);
  }

  lines.push("");
  lines.push(`  ${table.metrics.length} metrics, ${table.required.length} required`);
  lines.push("");

  return lines.join("\n");
}
