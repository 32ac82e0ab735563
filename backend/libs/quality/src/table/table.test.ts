import { describe, it, expect } from "vitest";
import { defaultConfig } from "../config/index.js";
import { InvalidTableError } from "../errors.js";
import type { Table } from "../types.js";
import { createTable, getColumn, tableFromRows, validateTable } from "./table.js";
import { MISSING, text } from "./values.js";

const markers = defaultConfig.inference.missingMarkers;

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidTableError) return err.code;
    throw err;
  }
  return undefined;
}

describe("tableFromRows", () => {
  it("pads short rows with missing cells and maps markers", () => {
    const t = tableFromRows(["a", "b"], [["1", "x"], ["2"], ["NA", "y"]], markers);
    expect(t.rowCount).toBe(3);
    expect(t.columns[0]).toEqual([text("1"), text("2"), MISSING]);
    expect(t.columns[1]).toEqual([text("x"), MISSING, text("y")]);
    expect(t.index.get("b")).toBe(1);
  });

  it("rejects rows longer than the header", () => {
    expect(() => tableFromRows(["a", "b"], [["1", "2"], ["1", "2", "3"]], markers)).toThrow(
      "dataset: row 2 has 3 fields, expected 2"
    );
  });

  it("allows zero rows", () => {
    const t = tableFromRows(["a"], [], markers);
    expect(t.rowCount).toBe(0);
    expect(t.columns).toEqual([[]]);
  });
});

describe("createTable", () => {
  it("rejects an empty header", () => {
    expect(codeOf(() => createTable([], []))).toBe("no-columns");
  });

  it("rejects duplicate names, labelled by table", () => {
    expect(() => createTable(["a", "a"], [[], []], "baseline")).toThrow('baseline: duplicate column "a"');
    expect(codeOf(() => createTable(["a", "a"], [[], []]))).toBe("duplicate-column");
  });

  it("rejects columns of different lengths", () => {
    expect(() => createTable(["a", "b"], [[text("1")], []])).toThrow('dataset: column "b" has 0 values, expected 1');
  });

  it("freezes the result", () => {
    const t = createTable(["a"], [[text("1")]]);
    expect(Object.isFrozen(t)).toBe(true);
    expect(Object.isFrozen(t.columns[0])).toBe(true);
    expect(getColumn(t, "a")).toEqual([text("1")]);
    expect(getColumn(t, "zz")).toBeUndefined();
  });
});

describe("validateTable", () => {
  it("catches hand-built tables that break the invariants", () => {
    const bad: Table = { names: ["x", "x"], columns: [[], []], index: new Map(), rowCount: 0 };
    expect(codeOf(() => validateTable(bad, "baseline"))).toBe("duplicate-column");
  });
});
