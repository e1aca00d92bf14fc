import type { Severity } from "./severity.js";

export type CvssVersion = "3.1" | "4.0";

export const CVSS_VERSIONS: readonly CvssVersion[] = ["3.1", "4.0"];

/** Metric groups in canonical vector order. v3.1 uses "temporal", v4.0 "threat". */
export type MetricGroup = "base" | "temporal" | "threat" | "environmental" | "supplemental";

/** Value every optional metric holds when the vector leaves it out. */
export const NOT_DEFINED = "X";

export type MetricCode = string;
export type MetricValue = string;

/**
 * Validated metric mapping. Every metric of the version is present; optional
 * metrics the vector omitted hold {@link NOT_DEFINED}.
 */
export type MetricSet = Readonly<Record<MetricCode, MetricValue>>;

export interface ParsedVector {
  readonly version: CvssVersion;
  readonly metrics: MetricSet;
}

interface ScoreResultCommon {
  /** Canonical vector string (defined metrics only, table order) */
  readonly vectorString: string;
  readonly metrics: MetricSet;
  readonly baseScore: number;
  readonly baseSeverity: Severity;
  readonly environmentalScore: number | null;
  readonly environmentalSeverity: Severity | null;
  /** Effective vector after modified metrics replaced their base counterparts */
  readonly environmentalVector: string | null;
  /** Unrounded impact sub-score of the base metrics */
  readonly impactScore: number;
  /** Unrounded exploitability sub-score of the base metrics */
  readonly exploitabilityScore: number;
}

export interface Cvss31ScoreResult extends ScoreResultCommon {
  readonly version: "3.1";
  readonly temporalScore: number | null;
  readonly temporalSeverity: Severity | null;
}

export interface SupplementalLabels {
  readonly safety?: string;
  readonly automatable?: string;
  readonly recovery?: string;
  readonly valueDensity?: string;
  readonly responseEffort?: string;
  readonly providerUrgency?: string;
}

export interface Cvss40ScoreResult extends ScoreResultCommon {
  readonly version: "4.0";
  readonly threatScore: number | null;
  readonly threatSeverity: Severity | null;
  readonly supplemental: SupplementalLabels | null;
}

export type ScoreResult = Cvss31ScoreResult | Cvss40ScoreResult;
