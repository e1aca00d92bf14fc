/**
 * Config loader: reads and validates `.cvsskit.yml` configuration files.
 * Validated with Zod; bad values fall back to defaults with a warning.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { ScoreOutcome } from "./cvss/score.js";
import { compareSeverity, parseSeverity, SEVERITY_ORDER, type Severity } from "./cvss/severity.js";
import { logger } from "./logger.js";
import { didYouMean } from "./suggest.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export const CONFIG_FILE = ".cvsskit.yml";

export const VALID_FORMATS = ["table", "json", "csv", "markdown"] as const;
export type OutputFormat = typeof VALID_FORMATS[number];

export interface CvssKitConfig {
  /** Report format for `cvsskit batch`: "table", "json", "csv", "markdown" */
  format: OutputFormat;
  /** Exit non-zero when a base score reaches this severity; null disables the gate */
  fail_on: Severity | null;
  /** Scored rows below this base severity are left out of batch reports */
  severity_threshold: Severity;
}

export const DEFAULT_CONFIG: CvssKitConfig = {
  format: "table",
  fail_on: null,
  severity_threshold: "None",
};

const SEVERITY_NAMES = SEVERITY_ORDER.map((s) => s.toLowerCase());

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const cvssKitConfigSchema = z.object({
  format: z.string().optional(),
  fail_on: z.string().nullable().optional(),
  severity_threshold: z.string().optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function isFormat(raw: string): raw is OutputFormat {
  return VALID_FORMATS.some((f) => f === raw);
}

function warnInvalid(key: string, value: string, valid: readonly string[], fallback: string): void {
  const suggestion = didYouMean(value, valid);
  const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
  logger.warn(`invalid ${key} '${value}'${hint}. Using default '${fallback}'.`);
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.cvsskit.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): CvssKitConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    logger.warn(`could not read ${CONFIG_FILE} — ${err instanceof Error ? err.message : String(err)}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    logger.warn(`could not parse ${CONFIG_FILE} — ${err instanceof Error ? err.message : String(err)}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  if (!parsed || typeof parsed !== "object") return { ...DEFAULT_CONFIG };

  // Validate shape with Zod
  const result = cvssKitConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  const data = result.data;

  // Warn about unknown top-level keys
  const knownKeys = Object.keys(DEFAULT_CONFIG);
  for (const key of Object.keys(data)) {
    if (!knownKeys.includes(key)) {
      const suggestion = didYouMean(key, knownKeys);
      const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
      logger.warn(`unknown config key '${key}'${hint}`);
    }
  }

  const config: CvssKitConfig = { ...DEFAULT_CONFIG };

  // format
  if (data.format !== undefined) {
    if (isFormat(data.format)) {
      config.format = data.format;
    } else {
      warnInvalid("format", data.format, VALID_FORMATS, DEFAULT_CONFIG.format);
    }
  }

  // fail_on: "none" (or null) turns the gate off
  if (data.fail_on !== undefined && data.fail_on !== null && data.fail_on.toLowerCase() !== "none") {
    const severity = parseSeverity(data.fail_on);
    if (severity) {
      config.fail_on = severity;
    } else {
      warnInvalid("fail_on", data.fail_on, SEVERITY_NAMES, "none");
    }
  }

  // severity_threshold
  if (data.severity_threshold !== undefined) {
    const severity = parseSeverity(data.severity_threshold);
    if (severity) {
      config.severity_threshold = severity;
    } else {
      warnInvalid(
        "severity_threshold",
        data.severity_threshold,
        SEVERITY_NAMES,
        DEFAULT_CONFIG.severity_threshold.toLowerCase(),
      );
    }
  }

  return config;
}

/**
 * Filter batch rows by config, dropping scored rows below `severity_threshold`.
 * Failed rows are always kept.
 */
export function filterByConfig<T extends { outcome: ScoreOutcome }>(
  rows: T[],
  config: CvssKitConfig,
): T[] {
  return rows.filter((row) => {
    const outcome: ScoreOutcome = row.outcome;
    if (!outcome.success) return true;
    return compareSeverity(outcome.result.baseSeverity, config.severity_threshold) >= 0;
  });
}
