// middleware/cors.ts
// CORS headers + OPTIONS preflight.

import type { Middleware } from "../utils/router.js";

export type CorsOptions = {
  origin?: string;
  methods?: string[];
  headers?: string[];
  credentials?: boolean;
};

export function cors(opts: CorsOptions = {}): Middleware {
  const o = {
    origin: opts.origin || "*",
    methods: (opts.methods || ["GET", "POST", "OPTIONS"]).join(","),
    headers: (opts.headers || ["Content-Type", "Authorization"]).join(","),
    credentials: !!opts.credentials,
  };

  return (req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", o.origin);
    res.setHeader("Access-Control-Allow-Methods", o.methods);
    res.setHeader("Access-Control-Allow-Headers", o.headers);
    if (o.credentials) res.setHeader("Access-Control-Allow-Credentials", "true");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }
    return next();
  };
}
