/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { LedgerEvent, LedgerId } from "@ballast/types";
import type { AppEnv } from "./types/api-contract.js";
import { AuditLog } from "./services/audit-log.js";
import { LedgerRegistry } from "./services/ledger-registry.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { DEFAULT_CALLER_HEADER } from "./middleware/caller.js";
import { createHealthRoutes } from "./routes/health.js";
import { createLedgerRoutes } from "./routes/ledgers.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Receives every event emitted by a hosted ledger. */
  readonly onLedgerEvent?: ((ledgerId: LedgerId, event: LedgerEvent) => void) | undefined;
  /** Receives errors that become 500 responses. */
  readonly onInternalError?: ((err: Error) => void) | undefined;
  /** Oracle readings older than this are reported stale. Default: 24h */
  readonly oracleMaxAgeMs?: number | undefined;
  /** Header carrying the caller's address. Default: X-Caller-Address */
  readonly callerHeader?: string | undefined;
  /** Ledger clock. Default: wall clock */
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly registry: LedgerRegistry;
  readonly auditLog: AuditLog;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const auditLog = new AuditLog();
  const registry = new LedgerRegistry({
    auditLog,
    onEvent: options.onLedgerEvent,
    clock: options.clock,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(registry));

  // ─── API Routes ─────────────────────────────────────────────────
  app.route(
    "/api/v1/ledgers",
    createLedgerRoutes({
      registry,
      auditLog,
      oracleMaxAgeMs: options.oracleMaxAgeMs ?? 86400000,
      callerHeader: options.callerHeader ?? DEFAULT_CALLER_HEADER,
    }),
  );

  return { app, registry, auditLog };
}
