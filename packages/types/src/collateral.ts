/**
 * Collateral Types
 *
 * Collateral entries back the circulating supply. Values are unsigned
 * 64-bit integers in the smallest currency unit.
 *
 * Rules:
 * - In-process values are bigint; wire/snapshot values are digit strings
 * - Entry order is significant (redemptions reduce the last entry)
 * - Entries are never removed, only reduced
 */

import type { AssetId } from "./identity.js";

/**
 * A declared collateral entry held by a pool.
 */
export interface CollateralEntry {
  /** Unique within the owning pool */
  readonly assetId: AssetId;

  /** Human-readable description (e.g. "T-bill 2027-03") */
  readonly description: string;

  /** Declared value in the smallest currency unit */
  readonly value: bigint;
}

/**
 * JSON-safe form of a CollateralEntry.
 * `value` is a base-10 digit string.
 */
export interface CollateralEntryRecord {
  readonly assetId: AssetId;
  readonly description: string;
  readonly value: string;
}
