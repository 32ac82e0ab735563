// report/summary.ts

import type { BaselineInfo, SeverityCounts } from "../types.js";

export function summarize(
  rowCount: number,
  columnCount: number,
  counts: SeverityCounts,
  score: number,
  baseline: BaselineInfo | null
): string {
  const parts = [
    `Rows: ${rowCount}, Columns: ${columnCount}.`,
    `Findings: ${counts.critical} critical, ${counts.warning} warning, ${counts.info} info.`,
    `Quality score: ${score}.`,
  ];
  if (baseline) parts.push("Baseline comparison included.");
  return parts.join(" ");
}
