// core/analyze.ts
// analyze(dataset, baseline?) -> Report
//
//   validate -> infer + profile (per column) -> schema diff + drift (baseline
//   with rows only) -> aggregate -> recommendations -> report
//
// Column work fans out through mapColumns(); everything order-sensitive is
// rebuilt from column positions or sorted before it reaches the report.

import { defaultConfig } from "../config/index.js";
import type { QualityConfig } from "../config/schema.js";
import { detectColumnDrift } from "../compare/drift.js";
import { diffSchemas } from "../compare/schemaDiff.js";
import { errorMessage } from "../errors.js";
import { hintFor, inferColumnType } from "../infer/infer.js";
import { profileColumn, type ColumnAnalysis } from "../profile/profiler.js";
import { aggregateFindings } from "../report/aggregate.js";
import { buildReport } from "../report/builder.js";
import { recommendFixes } from "../report/recommend.js";
import { summarize } from "../report/summary.js";
import { validateTable } from "../table/table.js";
import type { BaselineInfo, ColumnType, DriftFinding, Report, SchemaFinding, Table, TypeHints } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { startSpan } from "../utils/tracing.js";
import { mapColumns, throwIfAborted, type PoolOptions } from "./pool.js";

export type AnalyzeOptions = {
  config?: QualityConfig;
  hints?: TypeHints;           // column name -> type, overrides inference
  signal?: AbortSignal;
  logger?: Logger;
};

/** Infer and profile every column of a table, in column order. */
export function profileTable(
  table: Table,
  config: QualityConfig,
  hints?: TypeHints,
  pool: PoolOptions = {}
): Promise<ColumnAnalysis[]> {
  return mapColumns(
    table.names,
    (name, i) => {
      const column = table.columns[i];
      const type = hintFor(hints, name) ?? inferColumnType(column, config.inference);
      return profileColumn(name, column, type, config.profile);
    },
    pool
  );
}

function declaredType(c: ColumnAnalysis): { name: string; type: ColumnType } {
  return { name: c.profile.name, type: c.degradedFrom?.type ?? c.profile.type };
}

function degradationNotes(label: string, columns: readonly ColumnAnalysis[]): string[] {
  const notes: string[] = [];
  for (const c of columns) {
    if (!c.degradedFrom) continue;
    notes.push(
      `${label} column "${c.profile.name}" could not be read as ${c.degradedFrom.type} ` +
      `(${c.degradedFrom.reason}); profiled as text.`
    );
  }
  return notes;
}

export async function analyze(
  dataset: Table,
  baseline?: Table | null,
  options: AnalyzeOptions = {}
): Promise<Report> {
  const config = options.config ?? defaultConfig;
  const log = (options.logger ?? silentLogger).child("analyze");
  const pool: PoolOptions = { concurrency: config.runtime.concurrency, signal: options.signal };

  return startSpan("quality.analyze", async (span) => {
    const current = validateTable(dataset, "dataset");
    const reference = baseline ? validateTable(baseline, "baseline") : null;
    const compare = reference !== null && reference.rowCount > 0;
    if (reference && !compare) {
      log.warn("baseline has no rows; comparison skipped", { columns: reference.names.length });
    }
    span.setAttributes({
      "dataset.rows": current.rowCount,
      "dataset.columns": current.names.length,
      "baseline.rows": reference?.rowCount ?? 0,
    });

    const doneProfile = log.time("profiled dataset", { rows: current.rowCount, columns: current.names.length });
    const columns = await profileTable(current, config, options.hints, pool);
    doneProfile();

    const notes = degradationNotes("dataset", columns);
    for (const c of columns) {
      if (c.degradedFrom) log.warn("column degraded to text", { column: c.profile.name, from: c.degradedFrom.type });
    }

    let schema: SchemaFinding[] = [];
    const drift: DriftFinding[] = [];
    let baselineInfo: BaselineInfo | null = null;

    if (compare) {
      baselineInfo = { rowCount: reference.rowCount, columnCount: reference.names.length };

      const doneBaseline = log.time("profiled baseline", { rows: reference.rowCount });
      const refColumns = await profileTable(reference, config, options.hints, pool);
      doneBaseline();
      notes.push(...degradationNotes("baseline", refColumns));

      // Degraded columns diff under their requested type and skip drift.
      schema = diffSchemas(
        refColumns.map(declaredType),
        columns.map(declaredType),
        config.scoring.schemaSeverity
      );

      const shared: Array<[ColumnAnalysis, ColumnAnalysis]> = [];
      let common = 0;
      for (const c of columns) {
        const j = reference.index.get(c.profile.name);
        if (j === undefined) continue;
        common++;
        const ref = refColumns[j];
        if (!ref.degradedFrom && !c.degradedFrom) shared.push([ref, c]);
      }
      if (common === 0) notes.push("No shared columns between dataset and baseline.");

      const perColumn = await mapColumns(
        shared,
        ([ref, cur]) => {
          try {
            return { findings: detectColumnDrift(ref, cur, config.drift), note: null };
          } catch (err) {
            log.error("drift detection failed", { column: cur.profile.name, err });
            return { findings: [], note: `Drift for column "${cur.profile.name}" skipped: ${errorMessage(err)}` };
          }
        },
        pool
      );
      for (const r of perColumn) {
        drift.push(...r.findings);
        if (r.note) notes.push(r.note);
      }
      log.debug("compared with baseline", { schemaFindings: schema.length, driftFindings: drift.length });
    }

    throwIfAborted(options.signal);
    const aggregate = aggregateFindings(schema, drift, config.scoring);
    const report = buildReport({
      dataset: current,
      profiles: columns.map((c) => c.profile),
      aggregate,
      baseline: baselineInfo,
      recommendations: recommendFixes(columns),
      notes,
      summary: summarize(current.rowCount, current.names.length, aggregate.counts, aggregate.score, baselineInfo),
    });
    log.info("analysis complete", { score: report.score, ...report.counts });
    return report;
  });
}
