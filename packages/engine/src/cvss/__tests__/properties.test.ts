import { describe, it, expect } from "vitest";
import { parseVector } from "../parser.js";
import { serializeVector } from "../serializer.js";
import { computeScores } from "../score.js";
import type { ParsedVector } from "../types.js";

/** Every combination of the given metric values, as vector segments in key order. */
function grid(metrics: Array<[string, string[]]>): string[] {
  let combos: string[] = [""];
  for (const [code, values] of metrics) {
    combos = combos.flatMap((prefix) => values.map((value) => `${prefix}/${code}:${value}`));
  }
  return combos;
}

const IMPACT = ["N", "L", "H"];
const NEXT_IMPACT: Record<string, string> = { N: "L", L: "H" };

function raised(parsed: ParsedVector, code: string): ParsedVector | null {
  const next = NEXT_IMPACT[parsed.metrics[code]];
  if (next === undefined) return null;
  return { version: parsed.version, metrics: { ...parsed.metrics, [code]: next } };
}

/** Codes where some single-step raise lowered the base score, with the vector it happened on. */
function monotonicityViolations(vectors: ParsedVector[], codes: string[]): string[] {
  const violations: string[] = [];
  for (const parsed of vectors) {
    const base = computeScores(parsed).baseScore;
    for (const code of codes) {
      const up = raised(parsed, code);
      if (up !== null && computeScores(up).baseScore < base) {
        violations.push(`${code} on ${serializeVector(parsed)}`);
      }
    }
  }
  return violations;
}

const V31_BASE_VECTORS = grid([
  ["AV", ["N", "A", "L", "P"]],
  ["AC", ["L", "H"]],
  ["PR", ["N", "L", "H"]],
  ["UI", ["N", "R"]],
  ["S", ["U", "C"]],
  ["C", IMPACT],
  ["I", IMPACT],
  ["A", IMPACT],
]).map((segments) => `CVSS:3.1${segments}`);

const V31_SUFFIXES = [
  "",
  "/E:F/RL:W/RC:R",
  "/CR:H/IR:L/AR:M",
  "/MAV:A/MAC:H/MPR:L/MUI:R/MS:C/MC:L/MI:N/MA:H",
  "/E:U/RC:U/CR:L/MAV:P/MS:U",
];

const V40_BASE_VECTORS = grid([
  ["AV", ["N", "A", "L", "P"]],
  ["AC", ["L"]],
  ["AT", ["N", "P"]],
  ["PR", ["N"]],
  ["UI", ["N"]],
  ["VC", IMPACT],
  ["VI", IMPACT],
  ["VA", IMPACT],
  ["SC", IMPACT],
  ["SI", IMPACT],
  ["SA", IMPACT],
]).map((segments) => `CVSS:4.0${segments}`);

const V40_SUFFIXES = [
  "",
  "/E:P",
  "/CR:H/IR:M/AR:L/MAV:A/MAC:H/MAT:P/MPR:L/MUI:A/MVC:L/MVI:N/MVA:H/MSC:L/MSI:S/MSA:S",
  "/S:P/AU:Y/R:I/V:C/RE:H/U:Amber",
  "/E:U/MSI:H/S:N/U:Clear",
];

describe("CVSS v3.1 base vector space", () => {
  const parsed = V31_BASE_VECTORS.map((text) => parseVector(text));

  it("covers every base vector", () => {
    expect(V31_BASE_VECTORS).toHaveLength(2592);
    expect(new Set(V31_BASE_VECTORS).size).toBe(2592);
  });

  it("never lowers the base score when C, I or A is raised", () => {
    expect(monotonicityViolations(parsed, ["C", "I", "A"])).toEqual([]);
  });

  it("keeps every base score within 0 to 10", () => {
    const outOfRange = parsed.map((p) => computeScores(p).baseScore).filter((s) => s < 0 || s > 10);
    expect(outOfRange).toEqual([]);
  });

  it("round-trips every vector through serializeVector", () => {
    V31_BASE_VECTORS.forEach((base, i) => {
      const text = base + V31_SUFFIXES[i % V31_SUFFIXES.length];
      const p = parseVector(text);
      const canonical = serializeVector(p);
      expect(canonical).toBe(text);
      expect(parseVector(canonical)).toEqual(p);
    });
  });

  it("round-trips a vector with every optional metric defined", () => {
    const p = parseVector(`${V31_BASE_VECTORS[0]}${V31_SUFFIXES[1]}/CR:H/IR:L/AR:M${V31_SUFFIXES[3]}`);
    expect(parseVector(serializeVector(p))).toEqual(p);
  });
});

describe("CVSS v4.0 impact space", () => {
  const parsed = V40_BASE_VECTORS.map((text) => parseVector(text));

  it("covers every impact combination for each attack vector and requirement", () => {
    expect(V40_BASE_VECTORS).toHaveLength(4 * 2 * 729);
  });

  it("never lowers the base score when a vulnerable or subsequent impact is raised", () => {
    expect(monotonicityViolations(parsed, ["VC", "VI", "VA", "SC", "SI", "SA"])).toEqual([]);
  });

  it("scores 0 exactly when every impact is None", () => {
    const mismatched = parsed.filter((p) => {
      const noImpact = ["VC", "VI", "VA", "SC", "SI", "SA"].every((code) => p.metrics[code] === "N");
      return noImpact !== (computeScores(p).baseScore === 0);
    });
    expect(mismatched.map((p) => serializeVector(p))).toEqual([]);
  });

  it("round-trips threat, environmental and supplemental metrics", () => {
    V40_BASE_VECTORS.forEach((base, i) => {
      const text = base + V40_SUFFIXES[i % V40_SUFFIXES.length];
      const p = parseVector(text);
      const canonical = serializeVector(p);
      expect(canonical).toBe(text);
      expect(parseVector(canonical)).toEqual(p);
    });
  });
});
