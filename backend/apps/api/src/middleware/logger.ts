// middleware/logger.ts
// Request logger: one line per finished response.

import type { Logger } from "../../../../libs/quality/src/index.js";
import type { Middleware } from "../utils/router.js";

export function requestLogger(log: Logger): Middleware {
  return (req, res, next) => {
    const start = Date.now();
    res.once("finish", () => {
      const data = { method: req.method, url: req.url, status: res.statusCode, ms: Date.now() - start };
      if (res.statusCode >= 500) log.error("request", data);
      else if (res.statusCode >= 400) log.warn("request", data);
      else log.info("request", data);
    });
    return next();
  };
}
