/**
 * CVSS v4.0 arithmetic over the vulnerable-system / subsequent-system split.
 * Supplemental metrics never feed a number; they are echoed as labels.
 */

import { deriveEnvironmentalMetrics, hasDefinedMetric } from "./derive.js";
import { roundUp } from "./round.js";
import { serializeVector } from "./serializer.js";
import { severityOf } from "./severity.js";
import { getMetricTable, weightOf } from "./tables.js";
import {
  NOT_DEFINED,
  type Cvss40ScoreResult,
  type MetricSet,
  type ParsedVector,
  type SupplementalLabels,
} from "./types.js";

const table = getMetricTable("4.0");

const SUPPLEMENTAL_KEYS: Readonly<Record<string, keyof SupplementalLabels>> = {
  S: "safety",
  AU: "automatable",
  R: "recovery",
  V: "valueDensity",
  RE: "responseEffort",
  U: "providerUrgency",
};

export interface SubScores {
  vulnerableImpact: number;
  subsequentImpact: number;
  exploitability: number;
}

function w(metrics: MetricSet, code: string): number {
  return weightOf(table, code, metrics[code]);
}

export function subScores(metrics: MetricSet): SubScores {
  return {
    vulnerableImpact: Math.max(w(metrics, "VC"), w(metrics, "VI"), w(metrics, "VA")),
    subsequentImpact: Math.max(w(metrics, "SC"), w(metrics, "SI"), w(metrics, "SA")),
    exploitability: 8.22 *
      w(metrics, "AV") *
      w(metrics, "AC") *
      w(metrics, "AT") *
      w(metrics, "PR") *
      w(metrics, "UI"),
  };
}

function baseScoreOf({ vulnerableImpact, subsequentImpact, exploitability }: SubScores): number {
  if (vulnerableImpact === 0 && subsequentImpact === 0) return 0;
  return roundUp(Math.min(exploitability + vulnerableImpact + subsequentImpact, 10));
}

/** Highest of the CR / IR / AR multipliers; "X" weighs 1.0. */
export function requirementMultiplier(metrics: MetricSet): number {
  return Math.max(w(metrics, "CR"), w(metrics, "IR"), w(metrics, "AR"));
}

function supplementalLabels(metrics: MetricSet): SupplementalLabels | null {
  const labels: { -readonly [K in keyof SupplementalLabels]: string } = {};
  let defined = false;

  for (const metric of table.metrics) {
    if (metric.group !== "supplemental") continue;
    const value = metrics[metric.code];
    const key = SUPPLEMENTAL_KEYS[metric.code];
    if (key === undefined || value === undefined || value === NOT_DEFINED) continue;
    labels[key] = metric.values[value];
    defined = true;
  }

  return defined ? Object.freeze(labels) : null;
}

export function scoreCvss40(parsed: ParsedVector): Cvss40ScoreResult {
  const { metrics } = parsed;
  const sub = subScores(metrics);
  const baseScore = baseScoreOf(sub);

  const threatScore = hasDefinedMetric(parsed, "threat")
    ? roundUp(baseScore * w(metrics, "E"))
    : null;

  let environmentalScore: number | null = null;
  let environmentalVector: string | null = null;
  if (hasDefinedMetric(parsed, "environmental")) {
    const derived = deriveEnvironmentalMetrics(parsed);
    const modifiedBase = baseScoreOf(subScores(derived.metrics));
    environmentalScore = roundUp(Math.min(modifiedBase * requirementMultiplier(metrics), 10));
    environmentalVector = serializeVector(derived);
  }

  const result: Cvss40ScoreResult = {
    version: "4.0",
    vectorString: serializeVector(parsed),
    metrics,
    baseScore,
    baseSeverity: severityOf(baseScore),
    threatScore,
    threatSeverity: threatScore === null ? null : severityOf(threatScore),
    environmentalScore,
    environmentalSeverity: environmentalScore === null ? null : severityOf(environmentalScore),
    environmentalVector,
    supplemental: supplementalLabels(metrics),
    impactScore: sub.vulnerableImpact + sub.subsequentImpact,
    exploitabilityScore: sub.exploitability,
  };
  return Object.freeze(result);
}
