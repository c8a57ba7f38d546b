/**
 * Request logging middleware.
 *
 * Reports one structured entry per request through an injected log
 * function. `requestLogger` adapts a pino logger to that function.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { REPLAY_HEADER } from "./idempotency.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** True when the idempotency layer answered from its cache */
  readonly replayed: boolean;
}

export type RequestLogFn = (entry: RequestLogEntry) => void;

export function loggerMiddleware(log: RequestLogFn): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      replayed: c.res.headers.get(REPLAY_HEADER) === "true",
    });
  };
}

/**
 * Log server errors at error, rejected requests at warn, the rest at info.
 */
export function requestLogger(logger: Logger): RequestLogFn {
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
