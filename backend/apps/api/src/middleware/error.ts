// middleware/error.ts
// Global error boundary: known input errors become 4xx/503, the rest 500 with an incident id.

import { randomBytes } from "node:crypto";

import { AnalysisAbortedError, InvalidTableError, type Logger } from "../../../../libs/quality/src/index.js";
import { CsvParseError } from "../loader/csv.js";
import type { Middleware } from "../utils/router.js";
import { send } from "../utils/response.js";

/** Error with an HTTP status, thrown by middleware and handlers. */
export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;
  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.details = details;
  }
}

export function statusFor(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof InvalidTableError || err instanceof CsvParseError) return 400;
  if (err instanceof AnalysisAbortedError) return 503;
  return 500;
}

export function errorBoundary(log: Logger): Middleware {
  return async (req, res, next) => {
    try {
      await next();
    } catch (err) {
      const status = statusFor(err);
      if (res.headersSent) {
        log.error("error after response started", { method: req.method, url: req.url, err });
        res.destroy();
        return;
      }
      if (status < 500 || err instanceof AnalysisAbortedError) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn("request rejected", { status, method: req.method, url: req.url, message });
        const details = err instanceof HttpError ? err.details : undefined;
        send(res, status, details === undefined ? { error: message } : { error: message, details });
        return;
      }
      const id = randomBytes(4).toString("hex");
      log.error("unhandled error", { id, method: req.method, url: req.url, err });
      send(res, 500, { error: "Internal Server Error", id });
    }
  };
}
