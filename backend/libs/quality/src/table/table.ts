// table/table.ts
// Table construction and validation. Tables are frozen once built.

import { InvalidTableError } from "../errors.js";
import type { RawValue, Table } from "../types.js";
import { MISSING, toRawValue } from "./values.js";

/**
 * Build a Table from column-major cells.
 * Throws InvalidTableError when there are no columns, a name repeats,
 * or the columns have different lengths.
 */
export function createTable(
  names: readonly string[],
  columns: readonly (readonly RawValue[])[],
  label = "dataset"
): Table {
  if (names.length === 0) {
    throw new InvalidTableError("no-columns", "table has no columns", label);
  }
  if (names.length !== columns.length) {
    throw new InvalidTableError(
      "ragged-columns",
      `${names.length} column names but ${columns.length} columns`,
      label
    );
  }

  const index = new Map<string, number>();
  names.forEach((name, i) => {
    if (index.has(name)) {
      throw new InvalidTableError("duplicate-column", `duplicate column "${name}"`, label);
    }
    index.set(name, i);
  });

  const rowCount = columns[0].length;
  columns.forEach((col, i) => {
    if (col.length !== rowCount) {
      throw new InvalidTableError(
        "ragged-columns",
        `column "${names[i]}" has ${col.length} values, expected ${rowCount}`,
        label
      );
    }
  });

  return Object.freeze({
    names: Object.freeze([...names]),
    columns: Object.freeze(columns.map((c) => Object.freeze([...c]))),
    index,
    rowCount,
  });
}

/**
 * Build a Table from a header and row-major text cells.
 * Short rows are padded with missing cells; long rows are rejected.
 */
export function tableFromRows(
  header: readonly string[],
  rows: readonly (readonly (string | null | undefined)[])[],
  missingMarkers: readonly string[],
  label = "dataset"
): Table {
  const markers = new Set(missingMarkers);
  const columns: RawValue[][] = header.map(() => []);

  rows.forEach((row, r) => {
    if (row.length > header.length) {
      throw new InvalidTableError(
        "ragged-rows",
        `row ${r + 1} has ${row.length} fields, expected ${header.length}`,
        label
      );
    }
    for (let c = 0; c < header.length; c++) {
      columns[c].push(c < row.length ? toRawValue(row[c], markers) : MISSING);
    }
  });

  return createTable(header, columns, label);
}

/** Re-check an externally supplied table (frozen objects from other callers included). */
export function validateTable(table: Table, label = "dataset"): Table {
  return createTable(table.names, table.columns, label);
}

export function getColumn(table: Table, name: string): readonly RawValue[] | undefined {
  const i = table.index.get(name);
  return i === undefined ? undefined : table.columns[i];
}
