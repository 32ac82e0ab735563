import { describe, it, expect } from "vitest";
import { defaultConfig } from "../config/index.js";
import { profileColumn, type ColumnAnalysis } from "../profile/profiler.js";
import { MISSING, text } from "../table/values.js";
import type { ColumnType } from "../types.js";
import { compatibleTypes, detectColumnDrift, gradeAtLeast, gradeNullRate } from "./drift.js";

const cfg = defaultConfig.drift;

function analysis(name: string, type: ColumnType, values: string[]): ColumnAnalysis {
  return profileColumn(name, values.map((v) => (v === "" ? MISSING : text(v))), type, defaultConfig.profile);
}

const repeat = (value: string, n: number): string[] => Array.from({ length: n }, () => value);

describe("grading", () => {
  it("mean shift and PSI grade at or above thresholds", () => {
    expect(gradeAtLeast(3, cfg.meanShift)).toBe("critical");
    expect(gradeAtLeast(1, cfg.meanShift)).toBe("warning");
    expect(gradeAtLeast(0.99, cfg.meanShift)).toBeNull();
  });

  it("null-rate bands are strict above warning and critical", () => {
    expect(gradeNullRate(0.21, cfg.nullRate)).toBe("critical");
    expect(gradeNullRate(0.2, cfg.nullRate)).toBe("warning");
    expect(gradeNullRate(0.05, cfg.nullRate)).toBe("info");
    expect(gradeNullRate(0.01, cfg.nullRate)).toBe("info");
    expect(gradeNullRate(0.009, cfg.nullRate)).toBeNull();
  });

  it("categorical and boolean are comparable", () => {
    expect(compatibleTypes("categorical", "boolean")).toBe(true);
    expect(compatibleTypes("numeric", "text")).toBe(false);
  });
});

describe("detectColumnDrift: numeric", () => {
  const baseline = analysis("age", "numeric", ["30", "50"]); // mean 40, std 10

  it("flags a 3.5 std shift as critical", () => {
    const findings = detectColumnDrift(baseline, analysis("age", "numeric", ["70", "80"]), cfg);
    expect(findings[0]).toEqual({ column: "age", metric: "mean-shift", value: 3.5, severity: "critical" });
    expect(findings[1]).toMatchObject({ metric: "population-stability-index", severity: "critical" });
    expect(findings).toHaveLength(2);
  });

  it("does not flag a 0.5 std shift", () => {
    const findings = detectColumnDrift(baseline, analysis("age", "numeric", ["40", "50"]), cfg);
    expect(findings.filter((f) => f.metric === "mean-shift")).toEqual([]);
  });

  it("emits nothing for identical columns", () => {
    expect(detectColumnDrift(baseline, analysis("age", "numeric", ["30", "50"]), cfg)).toEqual([]);
  });

  it("uses epsilon for a constant baseline", () => {
    const flat = analysis("v", "numeric", ["5", "5"]);
    const findings = detectColumnDrift(flat, analysis("v", "numeric", ["6", "6"]), cfg);
    expect(findings[0]).toMatchObject({ metric: "mean-shift", value: 1 / 1e-9, severity: "critical" });
  });
});

describe("detectColumnDrift: categorical", () => {
  it("reports a missing and a new category", () => {
    const baseline = analysis("status", "categorical", [...repeat("active", 90), ...repeat("closed", 10)]);
    const dataset = analysis("status", "categorical", [...repeat("active", 90), ...repeat("pending", 10)]);
    const findings = detectColumnDrift(baseline, dataset, cfg);

    expect(findings.map((f) => [f.metric, f.category, f.severity])).toEqual([
      ["population-stability-index", undefined, "critical"],
      ["new-category", "pending", "warning"],
      ["missing-category", "closed", "critical"],
    ]);
    expect(findings[1].value).toBe(0.1);
    expect(findings[2].value).toBe(0.1);
  });

  it("ignores vanished categories below the minimum share", () => {
    const baseline = analysis("s", "categorical", [...repeat("a", 99), "b"]);
    const dataset = analysis("s", "categorical", repeat("a", 100));
    expect(detectColumnDrift(baseline, dataset, cfg)).toEqual([]);
  });

  it("skips category metrics when the baseline has no values", () => {
    const baseline = analysis("s", "categorical", ["", ""]);
    const dataset = analysis("s", "categorical", ["a", "b"]);
    expect(detectColumnDrift(baseline, dataset, cfg)).toEqual([
      { column: "s", metric: "null-rate-delta", value: 1, severity: "critical" },
    ]);
  });
});

describe("detectColumnDrift: nulls and types", () => {
  it("grades the null-rate change", () => {
    const baseline = analysis("t", "text", ["a", "b", "c", "d"]);
    const dataset = analysis("t", "text", ["a", "", "", "d"]);
    expect(detectColumnDrift(baseline, dataset, cfg)).toEqual([
      { column: "t", metric: "null-rate-delta", value: 0.5, severity: "critical" },
    ]);
  });

  it("returns nothing for incompatible types", () => {
    const baseline = analysis("x", "numeric", ["1", ""]);
    const dataset = analysis("x", "text", ["a", "b"]);
    expect(detectColumnDrift(baseline, dataset, cfg)).toEqual([]);
  });
});
