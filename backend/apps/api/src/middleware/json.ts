// middleware/json.ts
// JSON body parser with a byte limit. Sets req.body; non-JSON requests pass through.

import type { Readable } from "node:stream";

import type { Middleware } from "../utils/router.js";
import { HttpError } from "./error.js";

const BODY_METHODS = ["POST", "PUT", "PATCH"];

export function readBody(stream: Readable, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let done = false;

    const fail = (err: Error) => {
      if (done) return;
      done = true;
      reject(err);
    };

    stream.on("data", (chunk: Buffer | string) => {
      if (done) return;
      const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      size += buf.length;
      if (size > limit) {
        fail(new HttpError(413, `Payload too large (limit ${limit} bytes)`));
        stream.resume(); // drain
        return;
      }
      chunks.push(buf);
    });
    stream.on("end", () => {
      if (done) return;
      done = true;
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
    stream.on("error", fail);
  });
}

export function json(opts: { limit?: number } = {}): Middleware {
  const limit = opts.limit ?? 1_000_000;

  return async (req, _res, next) => {
    if (!BODY_METHODS.includes((req.method || "").toUpperCase())) return next();
    const ct = (req.headers["content-type"] || "").toString().toLowerCase();
    if (!ct.includes("application/json")) return next();

    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limit) {
      throw new HttpError(413, `Payload too large (limit ${limit} bytes)`);
    }

    const data = await readBody(req, limit);
    try {
      req.body = data ? JSON.parse(data) : {};
    } catch {
      throw new HttpError(400, "Invalid JSON");
    }
    return next();
  };
}
