import { z } from "zod";

export const SeveritySchema = z.enum(["None", "Low", "Medium", "High", "Critical"]);

export type Severity = z.infer<typeof SeveritySchema>;

/** Lowest to highest. */
export const SEVERITY_ORDER: readonly Severity[] = SeveritySchema.options;

export interface SeverityBand {
  severity: Severity;
  /** Inclusive lower bound */
  min: number;
}

/**
 * Half-open bands shared by v3.1 and v4.0. A score of exactly 0 is "None";
 * each boundary belongs to the higher band.
 */
export const SEVERITY_BANDS: readonly SeverityBand[] = [
  { severity: "Critical", min: 9.0 },
  { severity: "High", min: 7.0 },
  { severity: "Medium", min: 4.0 },
  { severity: "Low", min: 0 },
];

export function severityOf(score: number): Severity {
  if (score === 0) return "None";
  for (const band of SEVERITY_BANDS) {
    if (score >= band.min) return band.severity;
  }
  return "None";
}

/** Negative when `a` ranks below `b`, zero when equal. */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER.indexOf(a) - SEVERITY_ORDER.indexOf(b);
}

/** Case-insensitive lookup used for CLI flags and config values. */
export function parseSeverity(raw: string): Severity | null {
  const lower = raw.trim().toLowerCase();
  return SEVERITY_ORDER.find((s) => s.toLowerCase() === lower) ?? null;
}
