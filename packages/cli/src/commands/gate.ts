import { compareSeverity, parseSeverity, type Severity } from "@cvsskit/engine";

export type FailOn = { valid: true; severity: Severity | null } | { valid: false };

/** `--fail-on` value: a severity name, or "none" to turn the gate off. */
export function parseFailOn(raw: string): FailOn {
  if (raw.trim().toLowerCase() === "none") return { valid: true, severity: null };
  const severity = parseSeverity(raw);
  return severity ? { valid: true, severity } : { valid: false };
}

/** True when any severity reaches the threshold. */
export function breachesGate(severities: readonly Severity[], threshold: Severity | null): boolean {
  if (threshold === null) return false;
  return severities.some((s) => compareSeverity(s, threshold) >= 0);
}
