// compare/drift.ts
// Column-by-column drift between a baseline and the current dataset.
//
// Metrics (each emits at most one finding, categories one per category):
//   null-rate-delta              |rate_d − rate_b|
//   mean-shift                   |mean_d − mean_b| / max(std_b, ε)       numeric
//   population-stability-index   binned (numeric) or per-category         numeric, discrete
//   new-category                 dataset category unseen in the baseline  discrete
//   missing-category             common baseline category now absent      discrete

import type { DriftConfig, NullRateThresholds, Thresholds } from "../config/schema.js";
import type { ColumnAnalysis, DiscreteSummary, NumericSummary } from "../profile/profiler.js";
import type { ColumnType, DriftFinding, Severity } from "../types.js";
import { categoricalPsi, numericPsi } from "./psi.js";

const DISCRETE: readonly ColumnType[] = ["categorical", "boolean"];

/** Drift is only measured between equal types, or between two discrete types. */
export function compatibleTypes(a: ColumnType, b: ColumnType): boolean {
  return a === b || (DISCRETE.includes(a) && DISCRETE.includes(b));
}

/** `>=` thresholds (mean shift, PSI). */
export function gradeAtLeast(value: number, t: Thresholds): Severity | null {
  if (value >= t.critical) return "critical";
  if (value >= t.warning) return "warning";
  return null;
}

/** Null-rate bands: strictly above critical/warning, info from the noise floor up. */
export function gradeNullRate(delta: number, t: NullRateThresholds): Severity | null {
  if (delta > t.critical) return "critical";
  if (delta > t.warning) return "warning";
  if (delta >= t.info) return "info";
  return null;
}

function numericDrift(column: string, base: NumericSummary, cur: NumericSummary, cfg: DriftConfig): DriftFinding[] {
  const out: DriftFinding[] = [];

  if (base.mean !== null && cur.mean !== null) {
    const scale = Math.max(base.std ?? 0, cfg.meanShift.epsilon);
    const shift = Math.abs(cur.mean - base.mean) / scale;
    const severity = gradeAtLeast(shift, cfg.meanShift);
    if (severity) out.push({ column, metric: "mean-shift", value: shift, severity });
  }

  const index = numericPsi(base.sorted, cur.sorted, cfg.psi.bins, cfg.psi.epsilon);
  if (index !== null) {
    const severity = gradeAtLeast(index, cfg.psi);
    if (severity) out.push({ column, metric: "population-stability-index", value: index, severity });
  }
  return out;
}

function discreteDrift(column: string, base: DiscreteSummary, cur: DiscreteSummary, cfg: DriftConfig): DriftFinding[] {
  if (base.total === 0) return [];
  const out: DriftFinding[] = [];

  const index = categoricalPsi(base.frequencies, base.total, cur.frequencies, cur.total, cfg.psi.epsilon);
  if (index !== null) {
    const severity = gradeAtLeast(index, cfg.psi);
    if (severity) out.push({ column, metric: "population-stability-index", value: index, severity });
  }

  for (const [category, count] of cur.frequencies) {
    if (base.frequencies.has(category)) continue;
    out.push({
      column,
      metric: "new-category",
      value: count / cur.total,
      severity: cfg.category.newSeverity,
      category,
    });
  }

  for (const [category, count] of base.frequencies) {
    const share = count / base.total;
    if (share < cfg.category.missingMinShare || cur.frequencies.has(category)) continue;
    out.push({
      column,
      metric: "missing-category",
      value: share,
      severity: cfg.category.missingSeverity,
      category,
    });
  }
  return out;
}

/**
 * Drift findings for one column present in both tables. Returns nothing when
 * the types are incompatible; the schema differ reports that case.
 */
export function detectColumnDrift(
  baseline: ColumnAnalysis,
  dataset: ColumnAnalysis,
  cfg: DriftConfig
): DriftFinding[] {
  const column = dataset.profile.name;
  if (!compatibleTypes(baseline.profile.type, dataset.profile.type)) return [];

  const out: DriftFinding[] = [];

  const rb = baseline.profile.nullRate;
  const rd = dataset.profile.nullRate;
  if (rb !== null && rd !== null) {
    const delta = Math.abs(rd - rb);
    const severity = gradeNullRate(delta, cfg.nullRate);
    if (severity) out.push({ column, metric: "null-rate-delta", value: delta, severity });
  }

  const b = baseline.summary;
  const d = dataset.summary;
  if (b.type === "numeric" && d.type === "numeric") {
    out.push(...numericDrift(column, b, d, cfg));
  } else if ((b.type === "categorical" || b.type === "boolean") && (d.type === "categorical" || d.type === "boolean")) {
    out.push(...discreteDrift(column, b, d, cfg));
  }
  return out;
}
