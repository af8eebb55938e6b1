/**
 * Structured request logging.
 *
 * The middleware emits one entry per request; `pinoRequestLog` turns
 * those entries into pino log lines.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

/**
 * Creates a request logging middleware.
 *
 * Logs method, path, status, and duration once the response is ready.
 */
export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    });
  };
}

/**
 * Log function writing entries to a pino logger.
 *
 * 5xx responses log at error, 4xx at warn, everything else at info.
 */
export function pinoRequestLog(logger: Logger): (entry: RequestLogEntry) => void {
  return (entry) => {
    const msg = `${entry.method} ${entry.path} ${entry.status}`;
    if (entry.status >= 500) {
      logger.error(entry, msg);
    } else if (entry.status >= 400) {
      logger.warn(entry, msg);
    } else {
      logger.info(entry, msg);
    }
  };
}
