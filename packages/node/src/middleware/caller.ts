/**
 * Caller identity middleware.
 *
 * The ledger authorizes by comparing addresses; it does not authenticate.
 * An upstream identity layer (gateway, sidecar) fills a header with the
 * authenticated caller's address and this middleware lifts it into the
 * context. Requests without it are rejected with 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv, WithCaller } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const DEFAULT_CALLER_HEADER = "X-Caller-Address";

export function requireCaller(
  headerName: string = DEFAULT_CALLER_HEADER,
): MiddlewareHandler<AppEnv & WithCaller> {
  return async (c, next) => {
    const caller = c.req.header(headerName);
    if (caller === undefined || caller.trim() === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing ${headerName} header`),
        401,
      );
    }

    c.set("caller", caller);
    return next();
  };
}
