import { getMetricTable } from "./tables.js";
import { NOT_DEFINED, type MetricGroup, type ParsedVector } from "./types.js";

/**
 * Merge step for environmental scoring. Each defined modified metric (MAV,
 * MC, MSI, ...) overwrites the base metric it modifies; the modified metrics
 * themselves are reset to "X". Requirement metrics (CR/IR/AR) and every other
 * group pass through untouched, so the base formulas can run unchanged on the
 * result.
 */
export function deriveEnvironmentalMetrics(parsed: ParsedVector): ParsedVector {
  const table = getMetricTable(parsed.version);
  const metrics: Record<string, string> = { ...parsed.metrics };

  for (const metric of table.metrics) {
    if (metric.modifies === undefined) continue;
    const value = parsed.metrics[metric.code];
    if (value !== undefined && value !== NOT_DEFINED) {
      metrics[metric.modifies] = value;
    }
    metrics[metric.code] = NOT_DEFINED;
  }

  return Object.freeze({ version: parsed.version, metrics: Object.freeze(metrics) });
}

/** True when any metric of `group` holds something other than "X". */
export function hasDefinedMetric(parsed: ParsedVector, group: MetricGroup): boolean {
  return getMetricTable(parsed.version).metrics.some((metric) => {
    if (metric.group !== group) return false;
    const value = parsed.metrics[metric.code];
    return value !== undefined && value !== NOT_DEFINED;
  });
}
