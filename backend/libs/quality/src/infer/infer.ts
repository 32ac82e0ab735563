// infer/infer.ts
// Semantic type inference from raw cell text.
//
// Rules, checked in order over the non-missing values of a column:
//   no values                         -> text
//   all "true"/"false" (any case)     -> boolean
//   all numbers                       -> numeric   ("0"/"1" land here)
//   all datetimes (fixed patterns)    -> datetime
//   few distinct values               -> categorical
//   anything else                     -> text
//
// Every rule is a function of the value multiset, so row order never
// changes the outcome.

import type { InferenceConfig } from "../config/schema.js";
import { parseBoolean, parseDatetime, parseNumber, presentValues } from "../table/values.js";
import type { ColumnType, RawValue, Table, TypeHints } from "../types.js";

function every(values: readonly string[], parse: (s: string) => unknown): boolean {
  for (const v of values) if (parse(v) === null) return false;
  return true;
}

export function isCategorical(distinct: number, nonNull: number, cfg: InferenceConfig): boolean {
  return distinct <= cfg.categoricalMaxFraction * nonNull && distinct <= cfg.categoricalMaxDistinct;
}

export function inferColumnType(column: readonly RawValue[], cfg: InferenceConfig): ColumnType {
  const values = presentValues(column);
  if (values.length === 0) return "text";
  if (every(values, parseBoolean)) return "boolean";
  if (every(values, parseNumber)) return "numeric";
  if (every(values, parseDatetime)) return "datetime";
  if (isCategorical(new Set(values).size, values.length, cfg)) return "categorical";
  return "text";
}

/** Own-property lookup; a column named "constructor" must not see Object.prototype. */
export function hintFor(hints: TypeHints | undefined, name: string): ColumnType | undefined {
  return hints && Object.hasOwn(hints, name) ? hints[name] : undefined;
}

/** One type per column, in column order. Hints override inference by name. */
export function inferSchema(table: Table, cfg: InferenceConfig, hints?: TypeHints): ColumnType[] {
  return table.names.map((name, i) => hintFor(hints, name) ?? inferColumnType(table.columns[i], cfg));
}
