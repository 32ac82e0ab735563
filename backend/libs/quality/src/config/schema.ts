// config/schema.ts
// Configuration types, deep-merge of overrides and runtime validation.

import { ConfigError } from "../errors.js";
import { isSeverity, type Severity } from "../types.js";

/* ============================== Types ============================== */

export type InferenceConfig = {
  readonly categoricalMaxFraction: number;  // 0..1
  readonly categoricalMaxDistinct: number;  // integer >= 1
  readonly missingMarkers: readonly string[];
};

export type ProfileConfig = {
  readonly topN: number;                    // integer >= 1
  readonly sampleSize: number;              // integer >= 0
  readonly outlierIqrMultiplier: number;    // > 0
};

export type Thresholds = { readonly critical: number; readonly warning: number };

export type NullRateThresholds = Thresholds & { readonly info: number };
export type MeanShiftThresholds = Thresholds & { readonly epsilon: number };
export type PsiThresholds = Thresholds & { readonly bins: number; readonly epsilon: number };

export type CategoryDriftConfig = {
  readonly missingMinShare: number;         // 0..1
  readonly newSeverity: Severity;
  readonly missingSeverity: Severity;
};

export type DriftConfig = {
  readonly nullRate: NullRateThresholds;
  readonly meanShift: MeanShiftThresholds;
  readonly psi: PsiThresholds;
  readonly category: CategoryDriftConfig;
};

export type SchemaSeverities = {
  readonly columnAdded: Severity;
  readonly columnRemoved: Severity;
  readonly typeChanged: Severity;
};

export type ScoringConfig = {
  readonly penalties: Readonly<Record<Severity, number>>;
  readonly schemaSeverity: SchemaSeverities;
};

export type RuntimeConfig = {
  readonly concurrency: number;             // 0 = available parallelism
};

export type QualityConfig = {
  readonly inference: InferenceConfig;
  readonly profile: ProfileConfig;
  readonly drift: DriftConfig;
  readonly scoring: ScoringConfig;
  readonly runtime: RuntimeConfig;
};

export type ConfigOverrides = {
  inference?: Partial<InferenceConfig>;
  profile?: Partial<ProfileConfig>;
  drift?: {
    nullRate?: Partial<NullRateThresholds>;
    meanShift?: Partial<MeanShiftThresholds>;
    psi?: Partial<PsiThresholds>;
    category?: Partial<CategoryDriftConfig>;
  };
  scoring?: {
    penalties?: Partial<Record<Severity, number>>;
    schemaSeverity?: Partial<SchemaSeverities>;
  };
  runtime?: Partial<RuntimeConfig>;
};

/* =========================== Validation ============================ */

function isFiniteNumber(x: unknown, min = -Infinity, max = Infinity): x is number {
  return typeof x === "number" && Number.isFinite(x) && x >= min && x <= max;
}

function check(ok: boolean, path: string, message: string): void {
  if (!ok) throw new ConfigError(path, message);
}

function checkThresholds(t: Thresholds, path: string): void {
  check(isFiniteNumber(t.warning, 0), `${path}.warning`, "must be a finite number >= 0");
  check(isFiniteNumber(t.critical, 0), `${path}.critical`, "must be a finite number >= 0");
  check(t.critical >= t.warning, `${path}.critical`, "must be >= warning");
}

export function validateConfig(cfg: QualityConfig): void {
  const inf = cfg.inference;
  check(isFiniteNumber(inf.categoricalMaxFraction, 0, 1), "inference.categoricalMaxFraction", "must be within 0..1");
  check(Number.isInteger(inf.categoricalMaxDistinct) && inf.categoricalMaxDistinct >= 1,
    "inference.categoricalMaxDistinct", "must be an integer >= 1");
  check(Array.isArray(inf.missingMarkers) && inf.missingMarkers.every((m) => typeof m === "string"),
    "inference.missingMarkers", "must be a list of strings");

  const p = cfg.profile;
  check(Number.isInteger(p.topN) && p.topN >= 1, "profile.topN", "must be an integer >= 1");
  check(Number.isInteger(p.sampleSize) && p.sampleSize >= 0, "profile.sampleSize", "must be an integer >= 0");
  check(isFiniteNumber(p.outlierIqrMultiplier) && p.outlierIqrMultiplier > 0,
    "profile.outlierIqrMultiplier", "must be > 0");

  const d = cfg.drift;
  checkThresholds(d.nullRate, "drift.nullRate");
  check(isFiniteNumber(d.nullRate.info, 0) && d.nullRate.info <= d.nullRate.warning,
    "drift.nullRate.info", "must be within 0..warning");
  checkThresholds(d.meanShift, "drift.meanShift");
  check(isFiniteNumber(d.meanShift.epsilon) && d.meanShift.epsilon > 0, "drift.meanShift.epsilon", "must be > 0");
  checkThresholds(d.psi, "drift.psi");
  check(Number.isInteger(d.psi.bins) && d.psi.bins >= 1, "drift.psi.bins", "must be an integer >= 1");
  check(isFiniteNumber(d.psi.epsilon) && d.psi.epsilon > 0 && d.psi.epsilon < 1, "drift.psi.epsilon", "must be within (0, 1)");
  check(isFiniteNumber(d.category.missingMinShare, 0, 1), "drift.category.missingMinShare", "must be within 0..1");
  check(isSeverity(d.category.newSeverity), "drift.category.newSeverity", "must be a severity");
  check(isSeverity(d.category.missingSeverity), "drift.category.missingSeverity", "must be a severity");

  const s = cfg.scoring;
  for (const sev of ["info", "warning", "critical"] as const) {
    check(isFiniteNumber(s.penalties[sev], 0), `scoring.penalties.${sev}`, "must be a finite number >= 0");
  }
  for (const key of ["columnAdded", "columnRemoved", "typeChanged"] as const) {
    check(isSeverity(s.schemaSeverity[key]), `scoring.schemaSeverity.${key}`, "must be a severity");
  }

  check(Number.isInteger(cfg.runtime.concurrency) && cfg.runtime.concurrency >= 0,
    "runtime.concurrency", "must be an integer >= 0");
}

/* ============================ Merging ============================== */

function deepFreeze(obj: object): void {
  for (const v of Object.values(obj)) {
    if (typeof v === "object" && v !== null) deepFreeze(v);
  }
  Object.freeze(obj);
}

// Unset override keys must not clobber the base value when spread.
function defined<T extends object>(o: T | undefined): Partial<T> {
  const out: Partial<T> = {};
  if (o === undefined) return out;
  for (const key in o) {
    if (o[key] !== undefined) out[key] = o[key];
  }
  return out;
}

/** Merge overrides onto a base configuration, validate, and freeze the result. */
export function buildConfig(base: QualityConfig, o: ConfigOverrides = {}): QualityConfig {
  const cfg: QualityConfig = {
    inference: {
      ...base.inference,
      ...defined(o.inference),
      missingMarkers: [...(o.inference?.missingMarkers ?? base.inference.missingMarkers)],
    },
    profile: { ...base.profile, ...defined(o.profile) },
    drift: {
      nullRate: { ...base.drift.nullRate, ...defined(o.drift?.nullRate) },
      meanShift: { ...base.drift.meanShift, ...defined(o.drift?.meanShift) },
      psi: { ...base.drift.psi, ...defined(o.drift?.psi) },
      category: { ...base.drift.category, ...defined(o.drift?.category) },
    },
    scoring: {
      penalties: { ...base.scoring.penalties, ...defined(o.scoring?.penalties) },
      schemaSeverity: { ...base.scoring.schemaSeverity, ...defined(o.scoring?.schemaSeverity) },
    },
    runtime: { ...base.runtime, ...defined(o.runtime) },
  };
  validateConfig(cfg);
  deepFreeze(cfg);
  return cfg;
}
