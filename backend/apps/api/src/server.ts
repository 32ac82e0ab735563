// src/server.ts
// App assembly: middleware stack + routes over node:http.

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

import type { Logger, QualityConfig } from "../../../libs/quality/src/index.js";
import { cors } from "./middleware/cors.js";
import { errorBoundary } from "./middleware/error.js";
import { json } from "./middleware/json.js";
import { requestLogger } from "./middleware/logger.js";
import { registerRoutes } from "./routes/index.js";
import type { ApiEnv } from "./utils/env.js";
import { compose, Router, type Request } from "./utils/router.js";

export type AppDeps = {
  env: Pick<ApiEnv, "corsOrigin" | "maxBodyBytes" | "analyzeTimeoutMs">;
  config: QualityConfig;
  logger: Logger;
};

export type App = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export function createApp(deps: AppDeps): App {
  const router = new Router();
  registerRoutes(router, {
    config: deps.config,
    logger: deps.logger,
    timeoutMs: deps.env.analyzeTimeoutMs,
  });

  const pipeline = compose([
    errorBoundary(deps.logger.child("http")),
    requestLogger(deps.logger.child("http")),
    cors({ origin: deps.env.corsOrigin }),
    json({ limit: deps.env.maxBodyBytes }),
    router.handle(),
  ]);

  return (raw, res) => {
    const req: Request = Object.assign(raw, { path: "/" });
    return pipeline(req, res);
  };
}

export function createHttpServer(deps: AppDeps): Server {
  const app = createApp(deps);
  const log = deps.logger.child("http");
  return createServer((req, res) => {
    app(req, res).catch((err: unknown) => {
      log.fatal("request pipeline failed", { err });
      res.destroy();
    });
  });
}
