// src/index.ts
// Public entrypoint of the quality engine.
//
//   const dataset = tableFromRows(header, rows, defaultConfig.inference.missingMarkers);
//   const report = await analyze(dataset, baseline, { config: loadConfig() });

export * from "./types.js";
export * from "./errors.js";
export * from "./config/index.js";

export { createTable, tableFromRows, validateTable, getColumn } from "./table/table.js";
export { MISSING, text, isMissing, presentValues, parseNumber, parseBoolean, parseDatetime } from "./table/values.js";

export { hintFor, inferColumnType, inferSchema } from "./infer/infer.js";
export { profileColumn, type ColumnAnalysis, type ColumnSummary } from "./profile/profiler.js";
export { diffSchemas, type SchemaColumn } from "./compare/schemaDiff.js";
export { detectColumnDrift, compatibleTypes } from "./compare/drift.js";
export { aggregateFindings, qualityScore, countSeverities, SEVERITY_RANK } from "./report/aggregate.js";
export { buildReport } from "./report/builder.js";

export { analyze, profileTable, type AnalyzeOptions } from "./core/analyze.js";
export { mapColumns, type PoolOptions } from "./core/pool.js";

export { createLogger, silentLogger, type Logger, type LogLevelName, type LoggerOptions } from "./utils/logger.js";
export { initTracer, startSpan } from "./utils/tracing.js";
