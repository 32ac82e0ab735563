import { describe, it, expect } from "vitest";
import { defaultConfig } from "../config/index.js";
import { tableFromRows } from "../table/table.js";
import { MISSING, text } from "../table/values.js";
import type { ColumnType, RawValue } from "../types.js";
import { inferColumnType, inferSchema } from "./infer.js";

const cfg = defaultConfig.inference;
const col = (...values: string[]): RawValue[] => values.map((v) => (v === "" ? MISSING : text(v)));

describe("inferColumnType", () => {
  it("falls back to text for an all-missing column", () => {
    expect(inferColumnType(col("", ""), cfg)).toBe("text");
    expect(inferColumnType([], cfg)).toBe("text");
  });

  it("reads true/false as boolean, 0/1 as numeric", () => {
    expect(inferColumnType(col("true", "FALSE", "", "True"), cfg)).toBe("boolean");
    expect(inferColumnType(col("0", "1", "1"), cfg)).toBe("numeric");
  });

  it("recognises datetimes across supported patterns", () => {
    expect(inferColumnType(col("2024-01-01", "2024/02/01", "03/01/2024"), cfg)).toBe("datetime");
  });

  it("splits categorical from text by distinct count", () => {
    const repeated = Array.from({ length: 100 }, (_, i) => (i % 2 ? "b" : "a"));
    expect(inferColumnType(col(...repeated), cfg)).toBe("categorical");
    expect(inferColumnType(col("alpha", "beta", "gamma"), cfg)).toBe("text");
  });

  it("caps categorical at the distinct limit", () => {
    const wide = Array.from({ length: 600 }, (_, i) => `v${i % 60}`);
    expect(inferColumnType(col(...wide), cfg)).toBe("text");
  });

  it("ignores row order", () => {
    const values = ["x", "y", "x", "x", "x", "x", "x", "x", "x", "x", "x"];
    expect(inferColumnType(col(...values), cfg)).toBe(inferColumnType(col(...[...values].reverse()), cfg));
  });
});

describe("inferSchema", () => {
  it("returns one type per column and honours hints", () => {
    const t = tableFromRows(["n", "s"], [["1", "a"], ["2", "b"]], cfg.missingMarkers);
    expect(inferSchema(t, cfg)).toEqual(["numeric", "text"]);
    expect(inferSchema(t, cfg, { n: "categorical" })).toEqual(["categorical", "text"]);
  });

  it("only uses hints the object owns", () => {
    const t = tableFromRows(["constructor", "valueOf"], [["1", "a"], ["2", "b"]], cfg.missingMarkers);
    expect(inferSchema(t, cfg, {})).toEqual(["numeric", "text"]);
    const hints: Record<string, ColumnType> = Object.create(null);
    hints["__proto__"] = "categorical";
    const u = tableFromRows(["__proto__"], [["1"], ["2"]], cfg.missingMarkers);
    expect(inferSchema(u, cfg, hints)).toEqual(["categorical"]);
  });
});
