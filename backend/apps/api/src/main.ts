// src/main.ts
// Entry point: env -> config -> logger -> server.

import { createLogger, initTracer, loadConfig } from "../../../libs/quality/src/index.js";
import { createHttpServer } from "./server.js";
import { loadEnv } from "./utils/env.js";

const env = loadEnv();
const config = loadConfig();
const log = createLogger({ name: "api" });
initTracer("data-quality-api");

const server = createHttpServer({ env, config, logger: log });

server.listen(env.port, env.host, () => {
  log.info("listening", { url: `http://${env.host}:${env.port}`, env: env.nodeEnv });
});

function shutdown(signal: string): void {
  log.info("shutting down", { signal });
  server.close((err) => {
    if (err) {
      log.error("close failed", { err });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
