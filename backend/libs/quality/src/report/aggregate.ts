// report/aggregate.ts
// Severity ordering, finding sort order, tallies and the quality score.

import type { ScoringConfig } from "../config/schema.js";
import type { DriftFinding, SchemaFinding, Severity, SeverityCounts } from "../types.js";

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = { info: 0, warning: 1, critical: 2 };

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

// Code-unit order, so the result never depends on the host locale.
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

type Sortable = { severity: Severity; column: string; kind: string; category: string };

function compareFindings(a: Sortable, b: Sortable): number {
  return (
    compareSeverity(b.severity, a.severity) ||
    compareText(a.column, b.column) ||
    compareText(a.kind, b.kind) ||
    compareText(a.category, b.category)
  );
}

/** Severity descending, then column name, then kind. */
export function sortSchemaFindings(findings: readonly SchemaFinding[]): SchemaFinding[] {
  const key = (f: SchemaFinding): Sortable => ({ severity: f.severity, column: f.column, kind: f.kind, category: "" });
  return [...findings].sort((a, b) => compareFindings(key(a), key(b)));
}

/** Severity descending, then column name, then metric, then category. */
export function sortDriftFindings(findings: readonly DriftFinding[]): DriftFinding[] {
  const key = (f: DriftFinding): Sortable => ({
    severity: f.severity,
    column: f.column,
    kind: f.metric,
    category: f.category ?? "",
  });
  return [...findings].sort((a, b) => compareFindings(key(a), key(b)));
}

export function countSeverities(findings: readonly { severity: Severity }[]): SeverityCounts {
  const counts: SeverityCounts = { info: 0, warning: 0, critical: 0 };
  for (const f of findings) counts[f.severity]++;
  return counts;
}

/** 100 minus a fixed penalty per finding, floored at 0. */
export function qualityScore(counts: SeverityCounts, penalties: ScoringConfig["penalties"]): number {
  const lost =
    counts.critical * penalties.critical +
    counts.warning * penalties.warning +
    counts.info * penalties.info;
  return Math.max(0, 100 - lost);
}

export type Aggregate = {
  schemaFindings: SchemaFinding[];
  driftFindings: DriftFinding[];
  counts: SeverityCounts;
  score: number;
};

export function aggregateFindings(
  schema: readonly SchemaFinding[],
  drift: readonly DriftFinding[],
  scoring: ScoringConfig
): Aggregate {
  const counts = countSeverities([...schema, ...drift]);
  return {
    schemaFindings: sortSchemaFindings(schema),
    driftFindings: sortDriftFindings(drift),
    counts,
    score: qualityScore(counts, scoring.penalties),
  };
}
