// ---------------------------------------------------------------------------
// @cvsskit/engine
//
// CVSS v3.1 / v4.0 vector parser and scoring engine. Shared by the CLI and any
// batch front end that feeds it vector strings.
// ---------------------------------------------------------------------------

// Types
export {
  CVSS_VERSIONS,
  NOT_DEFINED,
  type CvssVersion,
  type MetricGroup,
  type MetricCode,
  type MetricValue,
  type MetricSet,
  type ParsedVector,
  type ScoreResult,
  type Cvss31ScoreResult,
  type Cvss40ScoreResult,
  type SupplementalLabels,
} from "./cvss/types.js";

// Errors
export {
  VectorParseError,
  UnsupportedVersionError,
  MalformedSegmentError,
  DuplicateMetricError,
  UnknownMetricError,
  MissingRequiredMetricError,
  InvalidMetricValueError,
  type VectorErrorKind,
} from "./cvss/errors.js";

// Tables
export {
  getMetricTable,
  weightOf,
  type MetricTable,
  type MetricDefinition,
} from "./cvss/tables.js";

// Parser / serializer
export { parseVector } from "./cvss/parser.js";
export { serializeVector } from "./cvss/serializer.js";
export { deriveEnvironmentalMetrics, hasDefinedMetric } from "./cvss/derive.js";

// Scoring
export {
  computeScores,
  scoreVector,
  safeScoreVector,
  adjustedScore,
  type ScoreOutcome,
} from "./cvss/score.js";
export { roundUp } from "./cvss/round.js";
export {
  severityOf,
  compareSeverity,
  parseSeverity,
  SeveritySchema,
  SEVERITY_ORDER,
  SEVERITY_BANDS,
  type Severity,
  type SeverityBand,
} from "./cvss/severity.js";

// Batch
export {
  scoreBatch,
  readVectorList,
  summarize,
  type BatchRow,
  type BatchSummary,
  type BatchReport,
} from "./batch.js";

// Formatters
export { generateMarkdownReport, type ReportOptions } from "./formatters/markdown-report.js";
export { formatCsv, CSV_HEADER } from "./formatters/csv.js";

// Config
export {
  loadConfig,
  filterByConfig,
  CONFIG_FILE,
  DEFAULT_CONFIG,
  VALID_FORMATS,
  type CvssKitConfig,
  type OutputFormat,
} from "./config.js";

// Logger
export { logger } from "./logger.js";

export { didYouMean } from "./suggest.js";
