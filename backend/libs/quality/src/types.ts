// src/types.ts
// Data model shared by every stage of the quality pipeline.
//
// Tables are column-major and hold raw text cells; nothing is typed until the
// inferencer assigns a ColumnType. Profiles, findings and the report are plain
// JSON-friendly objects so the serving layer can encode them directly.

/* ────────────────────────────────────────────────────────────────────────── *
 * Tables
 * ────────────────────────────────────────────────────────────────────────── */

export type MissingValue = { kind: "missing" };
export type TextValue = { kind: "text"; value: string };
export type RawValue = MissingValue | TextValue;

export type Table = {
  readonly names: readonly string[];
  readonly columns: readonly (readonly RawValue[])[];
  readonly index: ReadonlyMap<string, number>;   // column name -> position
  readonly rowCount: number;
};

/* ────────────────────────────────────────────────────────────────────────── *
 * Types & severities
 * ────────────────────────────────────────────────────────────────────────── */

export const COLUMN_TYPES = ["numeric", "boolean", "categorical", "datetime", "text"] as const;
export type ColumnType = (typeof COLUMN_TYPES)[number];

export const SEVERITIES = ["info", "warning", "critical"] as const;
export type Severity = (typeof SEVERITIES)[number];

export type SeverityCounts = Record<Severity, number>;

export type Granularity = "year" | "month" | "day" | "hour" | "minute" | "second" | "millisecond";

/* ────────────────────────────────────────────────────────────────────────── *
 * Profiles
 * ────────────────────────────────────────────────────────────────────────── */

type ProfileBase = {
  name: string;
  rowCount: number;
  nullCount: number;
  nullRate: number | null;       // null when the table has no rows
  distinctCount: number;         // non-null canonical values
  invalidCount: number;          // non-null values that don't parse under `type`
  degraded: boolean;             // fell back to text
  sampleValues: string[];
};

export type Quantiles = { p25: number; p50: number; p75: number };

export type NumericProfile = ProfileBase & {
  type: "numeric";
  min: number | null;
  max: number | null;
  mean: number | null;
  std: number | null;            // population
  quantiles: Quantiles | null;
  outlierCount: number;
};

export type TopValue = { value: string; count: number; share: number };

export type CategoricalProfile = ProfileBase & {
  type: "categorical";
  topValues: TopValue[];
};

export type BooleanProfile = ProfileBase & {
  type: "boolean";
  topValues: TopValue[];
};

export type DatetimeProfile = ProfileBase & {
  type: "datetime";
  min: string | null;            // ISO-8601, UTC
  max: string | null;
  granularity: Granularity | null;
};

export type TextProfile = ProfileBase & {
  type: "text";
  minLength: number | null;
  meanLength: number | null;
  maxLength: number | null;
};

export type ColumnProfile =
  | NumericProfile
  | CategoricalProfile
  | BooleanProfile
  | DatetimeProfile
  | TextProfile;

/* ────────────────────────────────────────────────────────────────────────── *
 * Findings
 * ────────────────────────────────────────────────────────────────────────── */

export type SchemaFindingKind = "column-added" | "column-removed" | "type-changed";

export type SchemaFinding =
  | { kind: "column-added" | "column-removed"; column: string; severity: Severity }
  | { kind: "type-changed"; column: string; severity: Severity; from: ColumnType; to: ColumnType };

export type DriftMetric =
  | "null-rate-delta"
  | "mean-shift"
  | "population-stability-index"
  | "new-category"
  | "missing-category";

export type DriftFinding = {
  column: string;
  metric: DriftMetric;
  value: number;
  severity: Severity;
  category?: string;
};

export type RecommendationIssue = "missing-values" | "outliers" | "invalid-values" | "constant-column";

export type Recommendation = {
  column: string;
  issue: RecommendationIssue;
  message: string;
  severity: Severity;
};

/* ────────────────────────────────────────────────────────────────────────── *
 * Report
 * ────────────────────────────────────────────────────────────────────────── */

export type BaselineInfo = { rowCount: number; columnCount: number };

export type Report = {
  rowCount: number;
  columnCount: number;
  columns: ColumnProfile[];
  schemaFindings: SchemaFinding[];
  driftFindings: DriftFinding[];
  score: number;                 // 0..100
  counts: SeverityCounts;
  baseline: BaselineInfo | null;
  recommendations: Recommendation[];
  notes: string[];
  summary: string;
};

export type TypeHints = Readonly<Partial<Record<string, ColumnType>>>;

export function isColumnType(x: unknown): x is ColumnType {
  return COLUMN_TYPES.some((t) => t === x);
}

export function isSeverity(x: unknown): x is Severity {
  return SEVERITIES.some((s) => s === x);
}
