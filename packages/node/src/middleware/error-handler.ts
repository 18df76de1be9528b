/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps LedgerError codes to HTTP status codes. Anything else is a 500
 * whose message is not echoed to the client.
 */

import type { Context, ErrorHandler } from "hono";
import { LedgerError } from "@ballast/ledger";
import type { LedgerErrorCode } from "@ballast/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 423 | 500;

export const STATUS_MAP: Readonly<Record<LedgerErrorCode, ErrorStatus>> = {
  // Collateralization
  INSUFFICIENT_COLLATERAL: 422,
  INSUFFICIENT_SUPPLY: 422,
  EMPTY_COLLATERAL_POOL: 409,
  EXCESSIVE_REDUCTION: 422,
  ARITHMETIC_OVERFLOW: 422,

  // Governance
  PAUSED: 423,
  UNAUTHORIZED: 403,
  UNAUTHORIZED_MINT: 403,

  // Holdings
  INSUFFICIENT_BALANCE: 422,

  // Input
  INVALID_AMOUNT: 400,
  INVALID_COLLATERAL: 400,
  DUPLICATE_ASSET_ID: 409,
  INVALID_ADDRESS: 400,
  INVALID_TIMESTAMP: 400,
  INVALID_SNAPSHOT: 400,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the global error handler. Registered as Hono's onError handler.
 *
 * `onInternalError` sees every error that becomes a 500.
 */
export function createErrorHandler(
  onInternalError?: (err: Error) => void,
): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>): Response => {
    if (err instanceof LedgerError) {
      return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
    }

    onInternalError?.(err);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
