import { readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  DEFAULT_CONFIG,
  VALID_FORMATS,
  filterByConfig,
  formatCsv,
  generateMarkdownReport,
  loadConfig,
  logger,
  readVectorList,
  scoreBatch,
  type BatchReport,
  type OutputFormat,
} from "@cvsskit/engine";
import { formatBatchJson, formatBatchTable } from "../formatter.js";
import { breachesGate, parseFailOn } from "./gate.js";

export interface BatchOptions {
  file: string;
  /** Directory searched for `.cvsskit.yml` */
  cwd: string;
  format?: string;
  output?: string;
  failOn?: string;
  color: boolean;
}

function isFormat(raw: string): raw is OutputFormat {
  return VALID_FORMATS.some((f) => f === raw);
}

function render(report: BatchReport, format: OutputFormat, color: boolean): string {
  switch (format) {
    case "json":
      return formatBatchJson(report) + "\n";
    case "csv":
      return formatCsv(report);
    case "markdown":
      return generateMarkdownReport(report);
    case "table":
      return formatBatchTable(report, { color }) + "\n";
  }
}

/**
 * Score a vector list file. Flags override `.cvsskit.yml`; the config's
 * `severity_threshold` trims the report but never the gate.
 */
export function runBatch(options: BatchOptions): number {
  const config = loadConfig(options.cwd) ?? DEFAULT_CONFIG;

  const format = options.format ?? config.format;
  if (!isFormat(format)) {
    logger.error(`Error: invalid --format '${format}' (expected ${VALID_FORMATS.join(", ")})`);
    return 1;
  }

  let threshold = config.fail_on;
  if (options.failOn !== undefined) {
    const failOn = parseFailOn(options.failOn);
    if (!failOn.valid) {
      logger.error(`Error: invalid --fail-on '${options.failOn}' (expected none, low, medium, high or critical)`);
      return 1;
    }
    threshold = failOn.severity;
  }

  const filePath = resolve(options.cwd, options.file);
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    logger.error(`Error: could not read ${options.file} — ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const inputs = readVectorList(text);
  if (inputs.length === 0) {
    logger.warn(`No vectors found in ${options.file}`);
  }

  const report = scoreBatch(inputs);
  const shown: BatchReport = { rows: filterByConfig(report.rows, config), summary: report.summary };
  const output = render(shown, format, options.color);

  if (options.output) {
    try {
      writeFileSync(resolve(options.cwd, options.output), output);
      logger.info(`Report written to ${options.output}`);
    } catch (err) {
      logger.error(`Error: could not write to ${options.output} — ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }
  } else {
    process.stdout.write(output);
  }

  const severities = report.rows.flatMap((row) => (row.outcome.success ? [row.outcome.result.baseSeverity] : []));
  if (report.summary.failed > 0) return 1;
  return breachesGate(severities, threshold) ? 1 : 0;
}
