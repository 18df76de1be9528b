/**
 * Runtime Type Guards
 *
 * Narrowing functions for Ballast domain types, used where data crosses
 * a trust boundary (snapshots, HTTP bodies, persisted events).
 */

import type { Address } from "./identity.js";
import type { CollateralEntryRecord } from "./collateral.js";
import type { DomainEvent, EventMetadata, LedgerEventType } from "./event.js";

/** 2^64 - 1 */
const U64_MAX = 18_446_744_073_709_551_615n;

// =============================================================================
// Scalar guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * A base-10 digit string whose value fits in an unsigned 64-bit integer.
 * Leading zeros are rejected except for "0" itself.
 */
export function isU64String(value: unknown): value is string {
  if (typeof value !== "string" || !/^(0|[1-9]\d*)$/.test(value)) return false;
  return BigInt(value) <= U64_MAX;
}

// =============================================================================
// Collateral guards
// =============================================================================

export function isCollateralEntryRecord(value: unknown): value is CollateralEntryRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.assetId === "string" &&
    v.assetId.length > 0 &&
    typeof v.description === "string" &&
    isU64String(v.value)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const LEDGER_EVENT_TYPES = new Set<string>([
  "ledger.initialized",
  "units.issued",
  "units.redeemed",
  "units.transferred",
  "ledger.paused",
  "ledger.resumed",
  "oracle.updated",
]);

const EVENT_SOURCES = new Set<string>(["ledger", "host"]);

export function isLedgerEventType(value: unknown): value is LedgerEventType {
  return typeof value === "string" && LEDGER_EVENT_TYPES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object" &&
    !Array.isArray(v.payload)
  );
}
