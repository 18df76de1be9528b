/**
 * @ballast/ledger — Collateral-backed issuance ledger engine.
 *
 * A pure TypeScript state machine with zero runtime dependencies.
 * Enforces the issuance invariants:
 * - Supply may only grow while sum(collateral) * 100 >= supply * 150
 * - Every call either commits fully or leaves no trace
 * - Only the ledger's own mint authority can change supply
 * - All quantities are u64 bigints (no floating point)
 *
 * Design rules:
 * - All exported types are readonly
 * - Fail-closed: invalid requests throw LedgerError
 * - Zero runtime dependencies
 */

// Aggregate root
export { TreasuryLedger } from "./treasury-ledger.js";

// Components
export { CollateralPool } from "./collateral-pool.js";
export type { PoolState } from "./collateral-pool.js";
export { ValuationOracle } from "./valuation-oracle.js";
export { GovernanceGuard, assertAddress } from "./governance-guard.js";
export { HoldingBook, MintAuthority } from "./holding-book.js";

// Ratio arithmetic
export {
  MIN_RATIO,
  RATIO_BASE,
  meetsMinimumRatio,
  requiredCollateral,
  collateralRatioPercent,
} from "./collateralization.js";

// u64 arithmetic
export { U64_MAX, assertU64, parseU64, formatU64, checkedAdd, sumU64 } from "./u64.js";

// Types
export type {
  LedgerErrorCode,
  InitializeParams,
  CollateralColumns,
  IssueOptions,
  LedgerOptions,
  IssueResult,
  RedeemResult,
  OracleReading,
  HealthReport,
  HoldingRecord,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
