// routes/analyze.ts
// POST /api/analyze
//   body: { dataset: csv, baseline?: csv, hints?: { [column]: ColumnType } }
//   200:  { report, sampleColumns, sampleRows }

import type { ServerResponse } from "node:http";

import {
  analyze,
  isColumnType,
  type ColumnType,
  type Logger,
  type QualityConfig,
  type Report,
  type TypeHints,
} from "../../../../libs/quality/src/index.js";
import { parseCsv, sampleRows, type SampleRow } from "../loader/csv.js";
import { HttpError } from "../middleware/error.js";
import type { Request, Router } from "../utils/router.js";
import { ok } from "../utils/response.js";

export const SAMPLE_ROWS = 20;

export type AnalyzeBody = {
  dataset: string;
  baseline?: string;
  hints?: TypeHints;
};

export type AnalyzeResponse = {
  report: Report;
  sampleColumns: string[];
  sampleRows: SampleRow[];
};

export type AnalyzeDeps = {
  config: QualityConfig;
  logger: Logger;
  timeoutMs: number;          // 0 disables the timeout
};

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/** Validate the request body; throws HttpError(400) with a field-level message. */
export function parseAnalyzeBody(body: unknown): AnalyzeBody {
  if (!isRecord(body)) throw new HttpError(400, "body must be a JSON object");
  const { dataset, baseline, hints } = body;

  if (typeof dataset !== "string") throw new HttpError(400, "dataset: expected CSV text");
  if (baseline !== undefined && baseline !== null && typeof baseline !== "string") {
    throw new HttpError(400, "baseline: expected CSV text");
  }

  let typeHints: TypeHints | undefined;
  if (hints !== undefined && hints !== null) {
    if (!isRecord(hints)) throw new HttpError(400, "hints: expected an object of column types");
    const out: Record<string, ColumnType> = Object.create(null);
    for (const [column, type] of Object.entries(hints)) {
      if (!isColumnType(type)) {
        throw new HttpError(400, `hints.${column}: unknown column type "${String(type)}"`);
      }
      out[column] = type;
    }
    typeHints = out;
  }

  return {
    dataset,
    baseline: typeof baseline === "string" ? baseline : undefined,
    hints: typeHints,
  };
}

export function analyzeRoutes(router: Router, deps: AnalyzeDeps): void {
  const log = deps.logger.child("analyze");

  router.post("/api/analyze", async (req: Request, res: ServerResponse) => {
    const body = parseAnalyzeBody(req.body);
    const markers = deps.config.inference.missingMarkers;
    const dataset = parseCsv(body.dataset, { label: "dataset", missingMarkers: markers });
    const baseline = body.baseline === undefined
      ? null
      : parseCsv(body.baseline, { label: "baseline", missingMarkers: markers });

    const controller = new AbortController();
    const timer = deps.timeoutMs > 0
      ? setTimeout(() => controller.abort(new Error(`analysis timed out after ${deps.timeoutMs}ms`)), deps.timeoutMs)
      : null;
    const onClose = () => {
      if (!res.writableEnded) controller.abort(new Error("client closed the connection"));
    };
    res.once("close", onClose);

    try {
      const report = await analyze(dataset, baseline, {
        config: deps.config,
        hints: body.hints,
        signal: controller.signal,
        logger: log,
      });
      const payload: AnalyzeResponse = {
        report,
        sampleColumns: [...dataset.names],
        sampleRows: sampleRows(dataset, SAMPLE_ROWS),
      };
      ok(res, payload);
    } finally {
      if (timer) clearTimeout(timer);
      res.off("close", onClose);
    }
  });
}
