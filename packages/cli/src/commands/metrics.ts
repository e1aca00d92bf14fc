import { CVSS_VERSIONS, getMetricTable, logger, type CvssVersion } from "@cvsskit/engine";
import { formatMetricsTable } from "../formatter.js";

export interface MetricsOptions {
  version: string;
  format: string;
  color: boolean;
}

function isVersion(raw: string): raw is CvssVersion {
  return CVSS_VERSIONS.some((v) => v === raw);
}

export function runMetrics(options: MetricsOptions): number {
  if (!isVersion(options.version)) {
    logger.error(`Error: unsupported --cvss '${options.version}' (expected ${CVSS_VERSIONS.join(" or ")})`);
    return 1;
  }

  const table = getMetricTable(options.version);

  switch (options.format) {
    case "json":
      process.stdout.write(JSON.stringify({ version: table.version, metrics: table.metrics }, null, 2) + "\n");
      return 0;
    case "table":
      process.stdout.write(formatMetricsTable(table, { color: options.color }));
      return 0;
    default:
      logger.error(`Error: invalid --format '${options.format}' (expected table or json)`);
      return 1;
  }
}
