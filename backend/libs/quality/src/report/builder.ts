// report/builder.ts
// Assemble the Report handed to the serving layer. No computation here.

import type {
  BaselineInfo,
  ColumnProfile,
  Recommendation,
  Report,
  Table,
} from "../types.js";
import type { Aggregate } from "./aggregate.js";

export type ReportParts = {
  dataset: Table;
  profiles: ColumnProfile[];
  aggregate: Aggregate;
  baseline: BaselineInfo | null;
  recommendations: Recommendation[];
  notes: string[];
  summary: string;
};

export function buildReport(parts: ReportParts): Report {
  return {
    rowCount: parts.dataset.rowCount,
    columnCount: parts.dataset.names.length,
    columns: parts.profiles,
    schemaFindings: parts.aggregate.schemaFindings,
    driftFindings: parts.aggregate.driftFindings,
    score: parts.aggregate.score,
    counts: parts.aggregate.counts,
    baseline: parts.baseline,
    recommendations: parts.recommendations,
    notes: parts.notes,
    summary: parts.summary,
  };
}
