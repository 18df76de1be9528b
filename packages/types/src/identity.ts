/**
 * Identity Types
 *
 * Callers, holders and governance are all identified by an opaque
 * address string supplied by the host's identity mechanism. The ledger
 * never interprets an address beyond equality.
 */

/** An opaque caller or holder identity (e.g. "0xabc…", "gov:treasury"). */
export type Address = string;

/** Opaque identifier of a collateral asset, unique within one pool. */
export type AssetId = string;

/** Identifier of a ledger instance inside a host. */
export type LedgerId = string;
