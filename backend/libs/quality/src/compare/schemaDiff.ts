// compare/schemaDiff.ts
// Schema drift vs a baseline: removed, added, and type-changed columns.

import type { SchemaSeverities } from "../config/schema.js";
import type { ColumnType, SchemaFinding } from "../types.js";

export type SchemaColumn = { name: string; type: ColumnType };

/**
 * Findings in a fixed order: removed columns (baseline order), then added
 * columns (dataset order), then type changes (dataset order). Names match
 * exactly; renames show up as one removal plus one addition.
 */
export function diffSchemas(
  baseline: readonly SchemaColumn[],
  dataset: readonly SchemaColumn[],
  severity: SchemaSeverities
): SchemaFinding[] {
  const base = new Map(baseline.map((c) => [c.name, c.type] as const));
  const cur = new Map(dataset.map((c) => [c.name, c.type] as const));

  const removed: SchemaFinding[] = [];
  for (const c of baseline) {
    if (!cur.has(c.name)) removed.push({ kind: "column-removed", column: c.name, severity: severity.columnRemoved });
  }

  const added: SchemaFinding[] = [];
  const changed: SchemaFinding[] = [];
  for (const c of dataset) {
    const was = base.get(c.name);
    if (was === undefined) {
      added.push({ kind: "column-added", column: c.name, severity: severity.columnAdded });
    } else if (was !== c.type) {
      changed.push({ kind: "type-changed", column: c.name, severity: severity.typeChanged, from: was, to: c.type });
    }
  }

  return [...removed, ...added, ...changed];
}
