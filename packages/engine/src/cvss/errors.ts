/**
 * Typed failures raised while turning a vector string into a validated
 * metric set. Scoring a validated set never throws.
 */

export type VectorErrorKind =
  | "UnsupportedVersion"
  | "MalformedSegment"
  | "DuplicateMetric"
  | "UnknownMetric"
  | "MissingRequiredMetric"
  | "InvalidMetricValue";

export abstract class VectorParseError extends Error {
  abstract readonly kind: VectorErrorKind;

  constructor(
    message: string,
    /** The raw input that failed */
    readonly vector: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedVersionError extends VectorParseError {
  readonly kind = "UnsupportedVersion";

  constructor(vector: string, readonly tag: string) {
    super(
      tag
        ? `Unsupported CVSS version tag '${tag}' (expected CVSS:3.1 or CVSS:4.0)`
        : "Missing CVSS version tag (expected CVSS:3.1 or CVSS:4.0)",
      vector,
    );
  }
}

export class MalformedSegmentError extends VectorParseError {
  readonly kind = "MalformedSegment";

  constructor(vector: string, readonly segment: string) {
    super(`Malformed segment '${segment}' (expected KEY:VALUE)`, vector);
  }
}

export class DuplicateMetricError extends VectorParseError {
  readonly kind = "DuplicateMetric";

  constructor(vector: string, readonly metric: string) {
    super(`Metric '${metric}' appears more than once`, vector);
  }
}

export class UnknownMetricError extends VectorParseError {
  readonly kind = "UnknownMetric";

  constructor(vector: string, readonly metric: string, readonly suggestion: string | null) {
    const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
    super(`Unknown metric '${metric}'${hint}`, vector);
  }
}

export class MissingRequiredMetricError extends VectorParseError {
  readonly kind = "MissingRequiredMetric";

  constructor(vector: string, readonly missing: readonly string[]) {
    super(`Missing required metrics: ${missing.join(", ")}`, vector);
  }
}

export class InvalidMetricValueError extends VectorParseError {
  readonly kind = "InvalidMetricValue";

  constructor(
    vector: string,
    readonly metric: string,
    readonly value: string,
    readonly allowed: readonly string[],
  ) {
    super(`Invalid value '${value}' for metric '${metric}' (allowed: ${allowed.join(", ")})`, vector);
  }
}
