/**
 * @ballast/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @ballast/types with ledger-specific
 * structures used by the state machine and its snapshots.
 *
 * Rules:
 * - All types are readonly
 * - Quantities are bigint in process, digit strings in snapshots
 * - Fail-closed: invalid requests throw, never silently succeed
 */

import type {
  Address,
  AssetId,
  CollateralEntry,
  CollateralEntryRecord,
  LedgerEvent,
} from "@ballast/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_COLLATERAL"
  | "INSUFFICIENT_SUPPLY"
  | "EMPTY_COLLATERAL_POOL"
  | "EXCESSIVE_REDUCTION"
  | "PAUSED"
  | "UNAUTHORIZED"
  | "UNAUTHORIZED_MINT"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "ARITHMETIC_OVERFLOW"
  | "INVALID_COLLATERAL"
  | "DUPLICATE_ASSET_ID"
  | "INVALID_ADDRESS"
  | "INVALID_TIMESTAMP"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned as a code.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Operation Inputs ────────────────────────────────────────────────────

/**
 * Parameters for bringing a new ledger into existence.
 */
export interface InitializeParams {
  readonly collateral: readonly CollateralEntry[];
  readonly initialSupply: bigint;
  readonly oracleInitialValue: bigint;
  readonly governanceAddress: Address;
  /** Receives the initial supply. */
  readonly owner: Address;
  /** ISO 8601 time recorded on the oracle. Defaults to the ledger clock. */
  readonly timestamp?: string | undefined;
}

/**
 * Column form of the initial collateral: three parallel arrays.
 */
export interface CollateralColumns {
  readonly assetIds: readonly AssetId[];
  readonly descriptions: readonly string[];
  readonly values: readonly bigint[];
}

/**
 * Optional attributes of the collateral entry appended by an issue.
 */
export interface IssueOptions {
  readonly assetId?: AssetId | undefined;
  readonly description?: string | undefined;
  /** Recorded as the event actor. Defaults to the recipient. */
  readonly caller?: Address | undefined;
}

/**
 * Construction options for a TreasuryLedger.
 */
export interface LedgerOptions {
  /** Correlation id stamped on every event. Defaults to "ledger". */
  readonly ledgerId?: string | undefined;
  /**
   * Receives one event per committed mutation. Called after the commit,
   * so an exception thrown here reaches the caller with the state
   * already changed.
   */
  readonly onEvent?: ((event: LedgerEvent) => void) | undefined;
  /** Wall clock for timestamps. Defaults to `() => new Date()`. */
  readonly clock?: (() => Date) | undefined;
}

// ─── Operation Results ───────────────────────────────────────────────────

export interface IssueResult {
  readonly entry: CollateralEntry;
  readonly circulatingSupply: bigint;
  readonly totalCollateral: bigint;
}

export interface RedeemResult {
  readonly reducedEntry: CollateralEntry;
  readonly circulatingSupply: bigint;
  readonly totalCollateral: bigint;
  /** Ratio check after the redeem. Redeem does not enforce it. */
  readonly healthy: boolean;
}

/**
 * Read-only view of the valuation oracle.
 */
export interface OracleReading {
  readonly latestValue: bigint;
  readonly lastUpdated: string;
}

/**
 * Point-in-time health of a ledger.
 */
export interface HealthReport {
  readonly healthy: boolean;
  readonly totalCollateral: bigint;
  readonly circulatingSupply: bigint;
  /** Truncated requirement for the current supply: supply * 150 / 100. */
  readonly requiredCollateral: bigint;
  /** floor(total * 100 / supply), or null when nothing circulates. */
  readonly ratioPercent: bigint | null;
  readonly paused: boolean;
  readonly oracle: OracleReading & { readonly ageMs: number };
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * A holder and its balance, JSON-safe.
 */
export interface HoldingRecord {
  readonly address: Address;
  readonly balance: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 * The mint authority is never part of it.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly ledgerId: string;
  readonly pool: {
    readonly entries: readonly CollateralEntryRecord[];
    readonly circulatingSupply: string;
  };
  readonly oracle: {
    readonly latestValue: string;
    readonly lastUpdated: string;
  };
  readonly guard: {
    readonly governanceAddress: Address;
    readonly paused: boolean;
  };
  readonly holdings: readonly HoldingRecord[];
  /** Number of events emitted so far. */
  readonly sequence: number;
  readonly createdAt: string;
}
