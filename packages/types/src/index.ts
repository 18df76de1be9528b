/**
 * @ballast/types — Shared domain types for the Ballast stack.
 *
 * Used across all Ballast packages:
 * - Identity (addresses, asset and ledger ids)
 * - Collateral entries
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Identity types
export type { Address, AssetId, LedgerId } from "./identity.js";

// Collateral types
export type { CollateralEntry, CollateralEntryRecord } from "./collateral.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  LedgerEvent,
  LedgerEventType,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isU64String,
  isCollateralEntryRecord,
  isLedgerEventType,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
