import { VectorParseError } from "./errors.js";
import { parseVector } from "./parser.js";
import type { Severity } from "./severity.js";
import type { ParsedVector, ScoreResult } from "./types.js";
import { scoreCvss31 } from "./v31.js";
import { scoreCvss40 } from "./v40.js";

export type ScoreOutcome =
  | { success: true; result: ScoreResult }
  | { success: false; error: VectorParseError };

/**
 * Score a validated vector. Each call returns a fresh, frozen result carrying
 * its own sub-scores; nothing is kept between calls.
 */
export function computeScores(parsed: ParsedVector): ScoreResult {
  switch (parsed.version) {
    case "3.1":
      return scoreCvss31(parsed);
    case "4.0":
      return scoreCvss40(parsed);
  }
}

/** Parse then score. Throws a {@link VectorParseError} on bad input. */
export function scoreVector(text: string): ScoreResult {
  return computeScores(parseVector(text));
}

/**
 * Non-throwing variant for batch callers. A missing or blank input fails the
 * same way a malformed vector does.
 */
export function safeScoreVector(text: string | null | undefined): ScoreOutcome {
  try {
    return { success: true, result: scoreVector(text ?? "") };
  } catch (err) {
    if (err instanceof VectorParseError) return { success: false, error: err };
    throw err;
  }
}

/** The v3.1 temporal or v4.0 threat score, whichever the result carries. */
export function adjustedScore(result: ScoreResult): { score: number | null; severity: Severity | null } {
  return result.version === "3.1"
    ? { score: result.temporalScore, severity: result.temporalSeverity }
    : { score: result.threatScore, severity: result.threatSeverity };
}
