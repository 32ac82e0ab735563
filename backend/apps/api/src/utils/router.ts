// utils/router.ts
// Minimal router + middleware pipeline over node:http.

import type { IncomingMessage, ServerResponse } from "node:http";

export type Request = IncomingMessage & {
  path: string;
  body?: unknown;
};

export type Next = () => Promise<void>;
export type Middleware = (req: Request, res: ServerResponse, next: Next) => void | Promise<void>;
export type Handler = (req: Request, res: ServerResponse) => void | Promise<void>;

type Method = "GET" | "POST" | "*";
type Route = { method: Method; pattern: RegExp; handler: Handler };

/** Run middlewares in order; each `next()` resolves once everything after it has. */
export function compose(stack: readonly Middleware[]): (req: Request, res: ServerResponse) => Promise<void> {
  return (req, res) => {
    let last = -1;
    const run = async (idx: number): Promise<void> => {
      if (idx <= last) throw new Error("next() called multiple times");
      last = idx;
      const fn = stack[idx];
      if (!fn) return;
      await fn(req, res, () => run(idx + 1));
    };
    return run(0);
  };
}

// Literal paths with "*" wildcards; a trailing slash is optional.
function toRegex(path: string): RegExp {
  const pat = path
    .replace(/\/+$/, "")
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*");
  return new RegExp("^" + pat + "/?$");
}

export class Router {
  private routes: Route[] = [];

  get(path: string, h: Handler) { this.add("GET", path, h); }
  post(path: string, h: Handler) { this.add("POST", path, h); }
  any(path: string, h: Handler) { this.add("*", path, h); }

  add(method: Method, path: string, handler: Handler): void {
    this.routes.push({ method, pattern: toRegex(path), handler });
  }

  handle(): Middleware {
    return async (req, res, next) => {
      const method = (req.method || "GET").toUpperCase();
      const url = new URL(req.url || "/", "http://localhost");
      req.path = url.pathname;

      for (const r of this.routes) {
        if (r.method !== "*" && r.method !== method) continue;
        if (r.pattern.test(req.path)) return r.handler(req, res);
      }
      return next();
    };
  }
}
