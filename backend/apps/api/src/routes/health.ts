// routes/health.ts
// Liveness + service info.

import type { Router } from "../utils/router.js";
import { ok } from "../utils/response.js";

export const SERVICE_INFO = {
  name: "data-quality-guardrails",
  endpoints: ["GET /api/health", "POST /api/analyze"],
} as const;

export function healthRoutes(router: Router): void {
  router.get("/api/health", (_req, res) => ok(res, { status: "ok" }));
  router.get("/api", (_req, res) => ok(res, SERVICE_INFO));
  router.get("/", (_req, res) => ok(res, SERVICE_INFO));
}
