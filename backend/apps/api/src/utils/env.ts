// utils/env.ts
// Server settings from process.env (and .env, when present).

import * as dotenv from "dotenv";

export type ApiEnv = {
  port: number;
  host: string;
  corsOrigin: string;
  maxBodyBytes: number;       // JSON body guard
  analyzeTimeoutMs: number;   // per request; 0 disables
  nodeEnv: string;
};

const DEFAULTS: ApiEnv = {
  port: 3001,
  host: "0.0.0.0",
  corsOrigin: "*",
  maxBodyBytes: 20_000_000,
  analyzeTimeoutMs: 30_000,
  nodeEnv: "development",
};

function int(v: string | undefined, key: string, def: number): number {
  if (v === undefined || v.trim() === "") return def;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0) throw new Error(`${key}: expected a non-negative integer, got "${v}"`);
  return n;
}

export function loadEnv(env: Record<string, string | undefined> = process.env): ApiEnv {
  if (env === process.env) dotenv.config();
  return {
    port: int(env.PORT, "PORT", DEFAULTS.port),
    host: env.HOST || DEFAULTS.host,
    corsOrigin: env.CORS_ORIGIN || DEFAULTS.corsOrigin,
    maxBodyBytes: int(env.MAX_BODY_BYTES, "MAX_BODY_BYTES", DEFAULTS.maxBodyBytes),
    analyzeTimeoutMs: int(env.ANALYZE_TIMEOUT_MS, "ANALYZE_TIMEOUT_MS", DEFAULTS.analyzeTimeoutMs),
    nodeEnv: env.NODE_ENV || DEFAULTS.nodeEnv,
  };
}
