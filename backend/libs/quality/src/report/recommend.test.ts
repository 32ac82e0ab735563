import { describe, it, expect } from "vitest";
import { defaultConfig } from "../config/index.js";
import { profileColumn } from "../profile/profiler.js";
import { MISSING, text } from "../table/values.js";
import type { ColumnType } from "../types.js";
import { recommendFixes } from "./recommend.js";
import { summarize } from "./summary.js";

const analysis = (name: string, type: ColumnType, values: string[]) =>
  profileColumn(name, values.map((v) => (v === "" ? MISSING : text(v))), type, defaultConfig.profile);

describe("recommendFixes", () => {
  it("suggests imputation for missing values", () => {
    expect(recommendFixes([analysis("x", "numeric", ["1", "2", "3", ""])])).toEqual([
      {
        column: "x",
        issue: "missing-values",
        severity: "critical",
        message:
          '25.0% of "x" is missing; impute it (mean or median for numbers, most frequent value for categories) ' +
          "or drop the affected rows.",
      },
    ]);
  });

  it("flags outliers", () => {
    const [rec] = recommendFixes([analysis("v", "numeric", ["1", "2", "3", "4", "100"])]);
    expect(rec).toEqual({
      column: "v",
      issue: "outliers",
      severity: "warning",
      message: '"v" has 1 value(s) outside the IQR fences; consider clipping or winsorizing.',
    });
  });

  it("names the expected type for unparsable values", () => {
    const recs = recommendFixes([analysis("a", "numeric", ["x", "y"])]);
    expect(recs).toEqual([
      {
        column: "a",
        issue: "invalid-values",
        severity: "critical",
        message: '2 value(s) in "a" don\'t parse as numeric; cast or clean them.',
      },
    ]);
  });

  it("marks constant columns as info", () => {
    expect(recommendFixes([analysis("c", "categorical", ["k", "k", "k"])]).map((r) => [r.issue, r.severity])).toEqual([
      ["constant-column", "info"],
    ]);
    expect(recommendFixes([analysis("c", "categorical", ["k"])])).toEqual([]);
  });
});

describe("summarize", () => {
  it("renders counts and score", () => {
    expect(summarize(3, 2, { critical: 0, warning: 1, info: 2 }, 93, null)).toBe(
      "Rows: 3, Columns: 2. Findings: 0 critical, 1 warning, 2 info. Quality score: 93."
    );
  });

  it("mentions the baseline when one was compared", () => {
    expect(summarize(1, 1, { critical: 0, warning: 0, info: 0 }, 100, { rowCount: 4, columnCount: 1 })).toBe(
      "Rows: 1, Columns: 1. Findings: 0 critical, 0 warning, 0 info. Quality score: 100. Baseline comparison included."
    );
  });
});
