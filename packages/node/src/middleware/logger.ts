/**
 * Request logging middleware.
 *
 * Emits one structured entry per request once the response is built.
 * The host feeds these into pino; tests collect them in an array.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Set for requests addressed to a single ledger. */
  readonly ledgerId?: string | undefined;
}

const LEDGER_PATH = /^\/api\/v1\/ledgers\/([^/]+)/;

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const path = c.req.path;
    log({
      method: c.req.method,
      path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ledgerId: LEDGER_PATH.exec(path)?.[1],
    });
  };
}
