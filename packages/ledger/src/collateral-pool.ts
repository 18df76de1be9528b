/**
 * @ballast/ledger — Collateral pool.
 *
 * Ordered collateral entries plus the circulating-supply counter.
 * Entries are appended at the tail and only the tail entry is ever
 * reduced; nothing is removed.
 *
 * Mutation is two-phase: `prepareIssue()` / `prepareRedeem()` validate
 * and compute the next state without touching the current one, and
 * `commit()` installs a prepared state in a single assignment. A failed
 * prepare leaves the pool exactly as it was.
 */

import type { AssetId, CollateralEntry } from "@ballast/types";
import { LedgerError } from "./types.js";
import { assertU64, checkedAdd, sumU64 } from "./u64.js";

/**
 * An immutable pool state value.
 */
export interface PoolState {
  readonly entries: readonly CollateralEntry[];
  readonly circulatingSupply: bigint;
}

function validateEntry(entry: CollateralEntry, taken: ReadonlySet<AssetId>): CollateralEntry {
  if (typeof entry.assetId !== "string" || entry.assetId.trim() === "") {
    throw new LedgerError("INVALID_COLLATERAL", "Collateral asset id must be a non-empty string");
  }
  if (typeof entry.description !== "string") {
    throw new LedgerError(
      "INVALID_COLLATERAL",
      `Collateral description must be a string for asset "${entry.assetId}"`,
    );
  }
  if (taken.has(entry.assetId)) {
    throw new LedgerError("DUPLICATE_ASSET_ID", `Collateral asset already in pool: "${entry.assetId}"`);
  }
  assertU64(entry.value, `value of "${entry.assetId}"`);
  return { assetId: entry.assetId, description: entry.description, value: entry.value };
}

export class CollateralPool {
  private _state: PoolState;

  /**
   * Build a pool from entries in order. Throws on duplicate or malformed
   * entries, or when the values do not fit a u64 in sum.
   */
  constructor(entries: readonly CollateralEntry[] = [], circulatingSupply: bigint = 0n) {
    const taken = new Set<AssetId>();
    const accepted: CollateralEntry[] = [];
    for (const entry of entries) {
      const valid = validateEntry(entry, taken);
      taken.add(valid.assetId);
      accepted.push(valid);
    }
    sumU64(accepted.map((e) => e.value), "total collateral");

    this._state = {
      entries: accepted,
      circulatingSupply: assertU64(circulatingSupply, "circulatingSupply"),
    };
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get circulatingSupply(): bigint {
    return this._state.circulatingSupply;
  }

  get entries(): readonly CollateralEntry[] {
    return [...this._state.entries];
  }

  get size(): number {
    return this._state.entries.length;
  }

  /**
   * Sum of entry values. Never overflows a u64: every write path checks
   * the sum before committing.
   */
  totalValue(): bigint {
    let total = 0n;
    for (const entry of this._state.entries) {
      total += entry.value;
    }
    return total;
  }

  /** The most recently appended entry. */
  lastEntry(): CollateralEntry | undefined {
    return this._state.entries[this._state.entries.length - 1];
  }

  hasAsset(assetId: AssetId): boolean {
    return this._state.entries.some((e) => e.assetId === assetId);
  }

  /**
   * First free id of the form `pledge-<n>`, starting at the pool size.
   */
  nextPledgeId(): AssetId {
    let n = this._state.entries.length;
    while (this.hasAsset(`pledge-${n}`)) {
      n++;
    }
    return `pledge-${n}`;
  }

  // ─── Two-phase Mutation ──────────────────────────────────────────────

  /**
   * Next state after appending `entry` and creating `amount` units.
   * Does not check the collateralization ratio; the ledger does.
   */
  prepareIssue(entry: CollateralEntry, amount: bigint): PoolState {
    const taken = new Set(this._state.entries.map((e) => e.assetId));
    const valid = validateEntry(entry, taken);
    assertU64(amount, "amount");

    const circulatingSupply = checkedAdd(this._state.circulatingSupply, amount, "circulatingSupply");
    checkedAdd(this.totalValue(), valid.value, "total collateral");

    return {
      entries: [...this._state.entries, valid],
      circulatingSupply,
    };
  }

  /**
   * Next state after retiring `burnAmount` units and reducing the last
   * entry by `reduction`.
   *
   * Check order: supply, then pool emptiness, then the tail entry value.
   */
  prepareRedeem(burnAmount: bigint, reduction: bigint): PoolState {
    assertU64(burnAmount, "burnAmount");
    assertU64(reduction, "collateralValueReduction");

    const { entries, circulatingSupply } = this._state;

    if (circulatingSupply < burnAmount) {
      throw new LedgerError(
        "INSUFFICIENT_SUPPLY",
        `Cannot burn ${burnAmount.toString()} units: circulating supply is ${circulatingSupply.toString()}`,
      );
    }

    const last = entries[entries.length - 1];
    if (last === undefined) {
      throw new LedgerError("EMPTY_COLLATERAL_POOL", "Collateral pool has no entries to reduce");
    }

    if (last.value < reduction) {
      throw new LedgerError(
        "EXCESSIVE_REDUCTION",
        `Cannot reduce "${last.assetId}" by ${reduction.toString()}: its value is ${last.value.toString()}`,
      );
    }

    const reduced: CollateralEntry = { ...last, value: last.value - reduction };
    return {
      entries: [...entries.slice(0, -1), reduced],
      circulatingSupply: circulatingSupply - burnAmount,
    };
  }

  /**
   * Install a prepared state.
   */
  commit(next: PoolState): void {
    this._state = next;
  }
}
