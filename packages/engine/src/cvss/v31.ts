/**
 * CVSS v3.1 arithmetic: impact and exploitability sub-scores, scope-dependent
 * base score, temporal multipliers and the environmental recomputation over
 * modified metrics.
 */

import { deriveEnvironmentalMetrics, hasDefinedMetric } from "./derive.js";
import { roundUp } from "./round.js";
import { serializeVector } from "./serializer.js";
import { severityOf } from "./severity.js";
import { getMetricTable, weightOf } from "./tables.js";
import type { Cvss31ScoreResult, MetricSet, ParsedVector } from "./types.js";

const table = getMetricTable("3.1");

const SCOPE_CHANGED = "C";
/** Cap on the modified impact sub-score coefficient */
const MAX_MODIFIED_ISC = 0.915;

interface SubScores {
  impact: number;
  exploitability: number;
}

function w(metrics: MetricSet, code: string): number {
  return weightOf(table, code, metrics[code]);
}

function exploitability(metrics: MetricSet, scopeChanged: boolean): number {
  return 8.22 *
    w(metrics, "AV") *
    w(metrics, "AC") *
    weightOf(table, "PR", metrics.PR, scopeChanged) *
    w(metrics, "UI");
}

function baseSubScores(metrics: MetricSet): SubScores {
  const scopeChanged = metrics.S === SCOPE_CHANGED;
  const isc = 1 - (1 - w(metrics, "C")) * (1 - w(metrics, "I")) * (1 - w(metrics, "A"));
  const impact = scopeChanged
    ? 7.52 * (isc - 0.029) - 3.25 * Math.pow(isc - 0.02, 15)
    : 6.42 * isc;

  return { impact, exploitability: exploitability(metrics, scopeChanged) };
}

function modifiedSubScores(derived: MetricSet): SubScores {
  const scopeChanged = derived.S === SCOPE_CHANGED;
  const miss = Math.min(
    1 -
      (1 - w(derived, "CR") * w(derived, "C")) *
      (1 - w(derived, "IR") * w(derived, "I")) *
      (1 - w(derived, "AR") * w(derived, "A")),
    MAX_MODIFIED_ISC,
  );
  const impact = scopeChanged
    ? 7.52 * (miss - 0.029) - 3.25 * Math.pow(miss * 0.9731 - 0.02, 13)
    : 6.42 * miss;

  return { impact, exploitability: exploitability(derived, scopeChanged) };
}

function combine({ impact, exploitability }: SubScores, scopeChanged: boolean): number {
  if (impact <= 0) return 0;
  return scopeChanged
    ? roundUp(Math.min(1.08 * (impact + exploitability), 10))
    : roundUp(Math.min(impact + exploitability, 10));
}

/** E × RL × RC; each "X" weighs 1.0. */
export function temporalMultiplier(metrics: MetricSet): number {
  return w(metrics, "E") * w(metrics, "RL") * w(metrics, "RC");
}

export function scoreCvss31(parsed: ParsedVector): Cvss31ScoreResult {
  const { metrics } = parsed;
  const sub = baseSubScores(metrics);
  const baseScore = combine(sub, metrics.S === SCOPE_CHANGED);

  const temporalScore = hasDefinedMetric(parsed, "temporal")
    ? roundUp(baseScore * temporalMultiplier(metrics))
    : null;

  let environmentalScore: number | null = null;
  let environmentalVector: string | null = null;
  if (hasDefinedMetric(parsed, "environmental")) {
    const derived = deriveEnvironmentalMetrics(parsed);
    const modified = modifiedSubScores(derived.metrics);
    environmentalScore = roundUp(
      combine(modified, derived.metrics.S === SCOPE_CHANGED) * temporalMultiplier(metrics),
    );
    environmentalVector = serializeVector(derived);
  }

  const result: Cvss31ScoreResult = {
    version: "3.1",
    vectorString: serializeVector(parsed),
    metrics,
    baseScore,
    baseSeverity: severityOf(baseScore),
    temporalScore,
    temporalSeverity: temporalScore === null ? null : severityOf(temporalScore),
    environmentalScore,
    environmentalSeverity: environmentalScore === null ? null : severityOf(environmentalScore),
    environmentalVector,
    impactScore: sub.impact,
    exploitabilityScore: sub.exploitability,
  };
  return Object.freeze(result);
}
