// report/recommend.ts
// Advisory fixes derived from dataset profiles. These don't affect the score.

import type { ColumnAnalysis } from "../profile/profiler.js";
import type { Recommendation } from "../types.js";

const MISSING_WARN = 0.05;
const MISSING_CRITICAL = 0.2;
const INVALID_CRITICAL = 0.1;

function pct(x: number): string {
  return `${(x * 100).toFixed(1)}%`;
}

/** Per column, in column order: missing values, outliers, invalid values, constant column. */
export function recommendFixes(columns: readonly ColumnAnalysis[]): Recommendation[] {
  const out: Recommendation[] = [];

  for (const { profile: p, degradedFrom } of columns) {
    const column = p.name;

    if (p.nullRate !== null && p.nullRate >= MISSING_WARN) {
      out.push({
        column,
        issue: "missing-values",
        severity: p.nullRate >= MISSING_CRITICAL ? "critical" : "warning",
        message:
          `${pct(p.nullRate)} of "${column}" is missing; impute it (mean or median for numbers, ` +
          `most frequent value for categories) or drop the affected rows.`,
      });
    }

    if (p.type === "numeric" && p.outlierCount > 0) {
      out.push({
        column,
        issue: "outliers",
        severity: "warning",
        message: `"${column}" has ${p.outlierCount} value(s) outside the IQR fences; consider clipping or winsorizing.`,
      });
    }

    if (p.invalidCount > 0) {
      const expected = degradedFrom?.type ?? p.type;
      const share = p.rowCount ? p.invalidCount / p.rowCount : 0;
      out.push({
        column,
        issue: "invalid-values",
        severity: share > INVALID_CRITICAL ? "critical" : "warning",
        message: `${p.invalidCount} value(s) in "${column}" don't parse as ${expected}; cast or clean them.`,
      });
    }

    if (p.distinctCount === 1 && p.rowCount > 1) {
      out.push({
        column,
        issue: "constant-column",
        severity: "info",
        message: `"${column}" holds a single distinct value and carries no information.`,
      });
    }
  }
  return out;
}
