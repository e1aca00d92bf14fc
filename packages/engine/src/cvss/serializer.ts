import { getMetricTable } from "./tables.js";
import { NOT_DEFINED, type ParsedVector } from "./types.js";

/**
 * Canonical vector string: version tag, then every defined metric in table
 * order (base, temporal/threat, environmental, supplemental). Metrics holding
 * "X" are left out, so `parseVector(serializeVector(p))` equals `p`.
 */
export function serializeVector(parsed: ParsedVector): string {
  const table = getMetricTable(parsed.version);
  const parts: string[] = [table.prefix];

  for (const metric of table.metrics) {
    const value = parsed.metrics[metric.code];
    if (value !== undefined && value !== NOT_DEFINED) {
      parts.push(`${metric.code}:${value}`);
    }
  }

  return parts.join("/");
}
