/**
 * @ballast/ledger — Governance guard.
 *
 * Holds the governance identity and the paused flag. Authorization is a
 * plain identity comparison against the stored address; there are no
 * roles.
 *
 * Rules:
 * - governanceAddress is fixed at construction
 * - Only governance may pause or resume
 * - While paused, issuance and redemption are rejected
 */

import type { Address } from "@ballast/types";
import { LedgerError } from "./types.js";

export function assertAddress(address: Address, label: string): Address {
  if (typeof address !== "string" || address.trim() === "") {
    throw new LedgerError("INVALID_ADDRESS", `${label} must be a non-empty address`);
  }
  return address;
}

export class GovernanceGuard {
  readonly governanceAddress: Address;
  private _paused: boolean;

  constructor(governanceAddress: Address, paused: boolean = false) {
    this.governanceAddress = assertAddress(governanceAddress, "governanceAddress");
    this._paused = paused;
  }

  get paused(): boolean {
    return this._paused;
  }

  isGovernance(caller: Address): boolean {
    return caller === this.governanceAddress;
  }

  /**
   * Throws UNAUTHORIZED unless the caller is the governance identity.
   */
  authorize(caller: Address, action: string): void {
    if (!this.isGovernance(caller)) {
      throw new LedgerError("UNAUTHORIZED", `'${caller}' is not authorized to ${action}`);
    }
  }

  /**
   * Throws PAUSED while the brake is engaged.
   */
  assertActive(operation: string): void {
    if (this._paused) {
      throw new LedgerError("PAUSED", `Ledger is paused: ${operation} is halted`);
    }
  }

  pause(caller: Address): void {
    this.authorize(caller, "pause");
    this._paused = true;
  }

  resume(caller: Address): void {
    this.authorize(caller, "resume");
    this._paused = false;
  }
}
