// config/env.ts
// Read QUALITY_* environment variables into configuration overrides.

import * as dotenv from "dotenv";

import { ConfigError } from "../errors.js";
import { isSeverity, type Severity } from "../types.js";
import { defaults } from "./defaults.js";
import { buildConfig, type ConfigOverrides, type QualityConfig } from "./schema.js";

export type Env = Record<string, string | undefined>;

function num(env: Env, key: string): number | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new ConfigError(key, `expected a number, got "${v}"`);
  return n;
}

function severity(env: Env, key: string): Severity | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return undefined;
  const s = v.trim().toLowerCase();
  if (!isSeverity(s)) throw new ConfigError(key, `expected info|warning|critical, got "${v}"`);
  return s;
}

function list(env: Env, key: string): string[] | undefined {
  const v = env[key];
  if (v === undefined) return undefined;
  // "|" separated so that "" and "N/A" style markers survive
  return v.split("|").map((s) => s.trim());
}

export function overridesFromEnv(env: Env): ConfigOverrides {
  return {
    inference: {
      categoricalMaxFraction: num(env, "QUALITY_CATEGORICAL_MAX_FRACTION"),
      categoricalMaxDistinct: num(env, "QUALITY_CATEGORICAL_MAX_DISTINCT"),
      missingMarkers: list(env, "QUALITY_MISSING_MARKERS"),
    },
    profile: {
      topN: num(env, "QUALITY_TOP_N"),
      sampleSize: num(env, "QUALITY_SAMPLE_SIZE"),
      outlierIqrMultiplier: num(env, "QUALITY_OUTLIER_IQR"),
    },
    drift: {
      nullRate: {
        critical: num(env, "QUALITY_NULL_RATE_CRITICAL"),
        warning: num(env, "QUALITY_NULL_RATE_WARNING"),
        info: num(env, "QUALITY_NULL_RATE_INFO"),
      },
      meanShift: {
        critical: num(env, "QUALITY_MEAN_SHIFT_CRITICAL"),
        warning: num(env, "QUALITY_MEAN_SHIFT_WARNING"),
      },
      psi: {
        bins: num(env, "QUALITY_PSI_BINS"),
        critical: num(env, "QUALITY_PSI_CRITICAL"),
        warning: num(env, "QUALITY_PSI_WARNING"),
      },
      category: {
        missingMinShare: num(env, "QUALITY_MISSING_CATEGORY_MIN_SHARE"),
        newSeverity: severity(env, "QUALITY_NEW_CATEGORY_SEVERITY"),
        missingSeverity: severity(env, "QUALITY_MISSING_CATEGORY_SEVERITY"),
      },
    },
    scoring: {
      penalties: {
        critical: num(env, "QUALITY_PENALTY_CRITICAL"),
        warning: num(env, "QUALITY_PENALTY_WARNING"),
        info: num(env, "QUALITY_PENALTY_INFO"),
      },
    },
    runtime: {
      concurrency: num(env, "QUALITY_CONCURRENCY"),
    },
  };
}

/** Defaults overlaid with the environment (and .env, when present). */
export function loadConfig(env: Env = process.env): QualityConfig {
  if (env === process.env) dotenv.config();
  return buildConfig(defaults, overridesFromEnv(env));
}
