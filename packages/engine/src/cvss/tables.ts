/**
 * Per-version metric tables: legal values, labels and weights.
 *
 * The data lives in `data/cvss-v3.1.json` and `data/cvss-v4.0.json`. Each file
 * is validated with Zod when the module loads, cross-checked (every modified
 * metric names a base metric, every scored value has a weight) and frozen, so
 * scoring code can look weights up without guarding against gaps.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { SEVERITY_BANDS, type SeverityBand } from "./severity.js";
import { NOT_DEFINED, type CvssVersion, type MetricGroup } from "./types.js";

const GROUP_ORDER: readonly MetricGroup[] = ["base", "temporal", "threat", "environmental", "supplemental"];

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const metricDefinitionSchema = z.object({
  code: z.string().regex(/^[A-Z]+$/),
  name: z.string().min(1),
  group: z.enum(["base", "temporal", "threat", "environmental", "supplemental"]),
  required: z.boolean(),
  /** value code → label */
  values: z.record(z.string()),
  weights: z.record(z.number()).optional(),
  /** v3.1 Privileges Required weights under a changed scope */
  scopeChangedWeights: z.record(z.number()).optional(),
  /** Base metric this environmental metric overrides */
  modifies: z.string().optional(),
});

const tableFileSchema = z
  .object({
    version: z.enum(["3.1", "4.0"]),
    metrics: z.array(metricDefinitionSchema).min(1),
  })
  .superRefine((file, ctx) => {
    const byCode = new Map<string, z.infer<typeof metricDefinitionSchema>>();
    let lastGroup = 0;

    file.metrics.forEach((metric, index) => {
      const issue = (message: string) =>
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["metrics", index], message });

      if (byCode.has(metric.code)) issue(`duplicate metric ${metric.code}`);
      byCode.set(metric.code, metric);

      const groupIdx = GROUP_ORDER.indexOf(metric.group);
      if (groupIdx < lastGroup) issue(`${metric.code} is out of group order`);
      lastGroup = groupIdx;

      const codes = Object.keys(metric.values);
      if (codes.length === 0) issue(`${metric.code} has no values`);
      if (metric.required && (metric.group !== "base" || Object.hasOwn(metric.values, NOT_DEFINED))) {
        issue(`required metric ${metric.code} must be a base metric without a Not Defined value`);
      }
      if (!metric.required && !Object.hasOwn(metric.values, NOT_DEFINED)) {
        issue(`optional metric ${metric.code} needs a Not Defined value`);
      }

      for (const weights of [metric.weights, metric.scopeChangedWeights]) {
        if (!weights) continue;
        for (const value of codes) {
          if (weights[value] === undefined) issue(`${metric.code}:${value} has no weight`);
        }
      }
    });

    file.metrics.forEach((metric, index) => {
      if (metric.modifies === undefined) return;
      const target = byCode.get(metric.modifies);
      if (!target || target.group !== "base") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["metrics", index, "modifies"],
          message: `${metric.code} modifies unknown base metric ${metric.modifies}`,
        });
        return;
      }
      for (const value of Object.keys(metric.values)) {
        if (value === NOT_DEFINED) continue;
        if (target.weights && target.weights[value] === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["metrics", index, "values", value],
            message: `${metric.code}:${value} has no weight on ${target.code}`,
          });
        }
      }
    });
  });

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export type MetricDefinition = Readonly<z.infer<typeof metricDefinitionSchema>>;

export interface MetricTable {
  readonly version: CvssVersion;
  /** Version tag that leads every vector, e.g. `CVSS:3.1` */
  readonly prefix: string;
  /** All metrics in canonical vector order */
  readonly metrics: readonly MetricDefinition[];
  readonly byCode: ReadonlyMap<string, MetricDefinition>;
  /** Base metrics every vector must carry, in canonical order */
  readonly required: readonly string[];
  readonly severityBands: readonly SeverityBand[];
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

const DATA_FILES: Record<CvssVersion, string> = {
  "3.1": "cvss-v3.1.json",
  "4.0": "cvss-v4.0.json",
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function loadTable(version: CvssVersion): MetricTable {
  const file = new URL(`../../data/${DATA_FILES[version]}`, import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(file, "utf-8"));

  const result = tableFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid CVSS ${version} metric table: ${details}`);
  }
  if (result.data.version !== version) {
    throw new Error(`${DATA_FILES[version]} declares version ${result.data.version}`);
  }

  const metrics = deepFreeze(result.data.metrics);
  return Object.freeze({
    version,
    prefix: `CVSS:${version}`,
    metrics,
    byCode: new Map(metrics.map((m) => [m.code, m] as const)),
    required: Object.freeze(metrics.filter((m) => m.required).map((m) => m.code)),
    severityBands: SEVERITY_BANDS,
  });
}

const TABLES: Readonly<Record<CvssVersion, MetricTable>> = Object.freeze({
  "3.1": loadTable("3.1"),
  "4.0": loadTable("4.0"),
});

export function getMetricTable(version: CvssVersion): MetricTable {
  return TABLES[version];
}

/**
 * Weight of `code:value`. Lookups on a validated metric set always succeed;
 * the throw only guards against calling with an unvalidated value.
 */
export function weightOf(
  table: MetricTable,
  code: string,
  value: string,
  scopeChanged = false,
): number {
  const metric = table.byCode.get(code);
  const weights = scopeChanged ? metric?.scopeChangedWeights ?? metric?.weights : metric?.weights;
  const weight = weights?.[value];
  if (weight === undefined) {
    throw new RangeError(`${table.prefix} has no weight for ${code}:${value}`);
  }
  return weight;
}
