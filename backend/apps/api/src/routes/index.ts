// routes/index.ts
// Central route registration.

import type { Router } from "../utils/router.js";
import { notFound } from "../utils/response.js";
import { analyzeRoutes, type AnalyzeDeps } from "./analyze.js";
import { healthRoutes } from "./health.js";

export function registerRoutes(router: Router, deps: AnalyzeDeps): void {
  healthRoutes(router);
  analyzeRoutes(router, deps);

  // 404 fallback
  router.any("*", (_req, res) => notFound(res));
}
