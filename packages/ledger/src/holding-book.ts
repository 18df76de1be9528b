/**
 * @ballast/ledger — Holding book and mint authority.
 *
 * The holding book tracks who holds how many issued units. Transfers
 * move value between holders and never create or destroy it. Minting
 * and burning require the MintAuthority the book was created with:
 * the exact instance, compared by identity, so a copied or freshly
 * created authority is useless against it.
 *
 * Invariant: sum of balances === totalSupply.
 */

import type { Address } from "@ballast/types";
import { assertAddress } from "./governance-guard.js";
import type { HoldingRecord } from "./types.js";
import { LedgerError } from "./types.js";
import { assertU64, checkedAdd, formatU64 } from "./u64.js";

/**
 * Capability to change the supply of one holding book.
 */
export class MintAuthority {
  readonly label: string;

  private constructor(label: string) {
    this.label = label;
  }

  static create(label: string): MintAuthority {
    return Object.freeze(new MintAuthority(label));
  }
}

export class HoldingBook {
  private readonly _authority: MintAuthority;
  private readonly _balances: Map<Address, bigint> = new Map();
  private _totalSupply = 0n;

  constructor(authority: MintAuthority) {
    this._authority = authority;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(address: Address): bigint {
    return this._balances.get(address) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  /**
   * Holders with a non-zero balance, sorted by address.
   */
  holders(): readonly HoldingRecord[] {
    return [...this._balances.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([address, balance]) => ({ address, balance: formatU64(balance) }));
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  /**
   * Move `amount` units from one holder to another.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    assertAddress(from, "from");
    assertAddress(to, "to");
    assertU64(amount, "amount");
    this.assertCanBurn(from, amount);

    if (from === to || amount === 0n) {
      return;
    }

    const fromBalance = this.balanceOf(from) - amount;
    // Cannot overflow: every balance is bounded by totalSupply.
    const toBalance = this.balanceOf(to) + amount;
    this.setBalance(from, fromBalance);
    this.setBalance(to, toBalance);
  }

  /**
   * Throws INSUFFICIENT_BALANCE unless `holder` holds at least `amount`.
   */
  assertCanBurn(holder: Address, amount: bigint): void {
    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `'${holder}' holds ${balance.toString()} units, cannot move ${amount.toString()}`,
      );
    }
  }

  // ─── Supply Changes ──────────────────────────────────────────────────

  mint(authority: MintAuthority, to: Address, amount: bigint): void {
    this.assertAuthority(authority);
    assertAddress(to, "recipient");
    assertU64(amount, "amount");
    const totalSupply = checkedAdd(this._totalSupply, amount, "total supply");

    this.setBalance(to, this.balanceOf(to) + amount);
    this._totalSupply = totalSupply;
  }

  burn(authority: MintAuthority, from: Address, amount: bigint): void {
    this.assertAuthority(authority);
    assertAddress(from, "holder");
    assertU64(amount, "amount");
    this.assertCanBurn(from, amount);

    this.setBalance(from, this.balanceOf(from) - amount);
    this._totalSupply -= amount;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private assertAuthority(authority: MintAuthority): void {
    if (authority !== this._authority) {
      throw new LedgerError("UNAUTHORIZED_MINT", "Supply changes require this book's mint authority");
    }
  }

  private setBalance(address: Address, balance: bigint): void {
    if (balance === 0n) {
      this._balances.delete(address);
    } else {
      this._balances.set(address, balance);
    }
  }
}
