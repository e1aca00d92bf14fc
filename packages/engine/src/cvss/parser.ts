import {
  DuplicateMetricError,
  InvalidMetricValueError,
  MalformedSegmentError,
  MissingRequiredMetricError,
  UnknownMetricError,
  UnsupportedVersionError,
} from "./errors.js";
import { getMetricTable } from "./tables.js";
import { CVSS_VERSIONS, NOT_DEFINED, type CvssVersion, type ParsedVector } from "./types.js";
import { didYouMean } from "../suggest.js";

function detectVersion(tag: string): CvssVersion | null {
  return CVSS_VERSIONS.find((v) => tag === `CVSS:${v}`) ?? null;
}

/**
 * Parse and validate a vector string such as
 * `CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H`.
 *
 * Checks run in this order: version tag, segment shape, duplicates, unknown
 * keys, missing required metrics, then value legality. The returned metric set
 * holds every metric of the version, with "X" for optional ones left out.
 */
export function parseVector(text: string): ParsedVector {
  const input = text.trim();
  const [tag, ...segments] = input.split("/");

  const version = detectVersion(tag);
  if (!version) throw new UnsupportedVersionError(input, tag);

  const table = getMetricTable(version);
  const raw = new Map<string, string>();

  for (const segment of segments) {
    const parts = segment.split(":");
    if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
      throw new MalformedSegmentError(input, segment);
    }
    const [key, value] = parts;

    if (raw.has(key)) throw new DuplicateMetricError(input, key);
    if (!table.byCode.has(key)) {
      throw new UnknownMetricError(input, key, didYouMean(key, [...table.byCode.keys()], 1));
    }
    raw.set(key, value);
  }

  const missing = table.required.filter((code) => !raw.has(code));
  if (missing.length > 0) throw new MissingRequiredMetricError(input, missing);

  const metrics: Record<string, string> = {};
  for (const metric of table.metrics) {
    const value = raw.get(metric.code) ?? NOT_DEFINED;
    if (!Object.hasOwn(metric.values, value)) {
      throw new InvalidMetricValueError(input, metric.code, value, Object.keys(metric.values));
    }
    metrics[metric.code] = value;
  }

  return Object.freeze({ version, metrics: Object.freeze(metrics) });
}
