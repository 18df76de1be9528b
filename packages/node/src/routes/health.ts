/**
 * Health check route.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerRegistry } from "../services/ledger-registry.js";

export function createHealthRoutes(registry: LedgerRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      ledgers: registry.size,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
