// src/errors.ts
// Error taxonomy for the quality engine.

export type InvalidTableCode =
  | "no-columns"
  | "duplicate-column"
  | "ragged-columns"
  | "ragged-rows";

export class QualityError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "QualityError";
    this.code = code;
  }
}

/** Input table is unusable; raised before any profiling starts. */
export class InvalidTableError extends QualityError {
  readonly table: string;
  constructor(code: InvalidTableCode, message: string, table = "dataset") {
    super(code, `${table}: ${message}`);
    this.name = "InvalidTableError";
    this.table = table;
  }
}

export class ConfigError extends QualityError {
  readonly path: string;
  constructor(path: string, message: string) {
    super("invalid-config", `${path}: ${message}`);
    this.name = "ConfigError";
    this.path = path;
  }
}

export class AnalysisAbortedError extends QualityError {
  constructor(reason?: unknown) {
    super("aborted", reason instanceof Error ? reason.message : "analysis aborted");
    this.name = "AnalysisAbortedError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
