/**
 * @ballast/ledger — TreasuryLedger.
 *
 * The aggregate root. Owns one CollateralPool, one ValuationOracle, one
 * GovernanceGuard and one HoldingBook together with the sole
 * MintAuthority for that book, and is the only place the 150%
 * collateral floor is checked.
 *
 * API surface:
 * - initialize() / initializeFromColumns() — Bring a ledger into existence
 * - issue() — Pledge collateral and create supply
 * - redeem() — Retire supply and reduce the last collateral entry
 * - pause() / resume() — Governance brake
 * - checkHealth() / healthReport() — Read the collateral ratio
 * - transferUnits() — Move issued units between holders
 * - updateValuation() — Governance push of a new oracle value
 * - snapshot() / fromSnapshot() — Serialize and restore
 *
 * Every mutating call validates everything first and writes last, so a
 * thrown error means nothing changed.
 */

import type {
  Address,
  CollateralEntry,
  LedgerEvent,
  LedgerEventType,
} from "@ballast/types";
import { isAddress, isCollateralEntryRecord, isU64String } from "@ballast/types";
import { CollateralPool } from "./collateral-pool.js";
import {
  collateralRatioPercent,
  meetsMinimumRatio,
  requiredCollateral,
} from "./collateralization.js";
import { GovernanceGuard, assertAddress } from "./governance-guard.js";
import { HoldingBook, MintAuthority } from "./holding-book.js";
import type {
  CollateralColumns,
  HealthReport,
  InitializeParams,
  IssueOptions,
  IssueResult,
  LedgerOptions,
  LedgerSnapshot,
  OracleReading,
  RedeemResult,
} from "./types.js";
import { LedgerError } from "./types.js";
import { assertU64, checkedAdd, formatU64, parseU64, sumU64 } from "./u64.js";
import { ValuationOracle } from "./valuation-oracle.js";

const DEFAULT_PLEDGE_DESCRIPTION = "collateral pledge";

interface LedgerParts {
  readonly pool: CollateralPool;
  readonly oracle: ValuationOracle;
  readonly guard: GovernanceGuard;
  readonly holdings: HoldingBook;
  readonly authority: MintAuthority;
  readonly sequence: number;
}

export class TreasuryLedger {
  readonly ledgerId: string;

  private readonly _pool: CollateralPool;
  private readonly _oracle: ValuationOracle;
  private readonly _guard: GovernanceGuard;
  private readonly _holdings: HoldingBook;
  private readonly _authority: MintAuthority;
  private readonly _onEvent: ((event: LedgerEvent) => void) | undefined;
  private readonly _clock: () => Date;
  private _sequence: number;

  private constructor(parts: LedgerParts, options: LedgerOptions) {
    this.ledgerId = options.ledgerId ?? "ledger";
    this._pool = parts.pool;
    this._oracle = parts.oracle;
    this._guard = parts.guard;
    this._holdings = parts.holdings;
    this._authority = parts.authority;
    this._sequence = parts.sequence;
    this._onEvent = options.onEvent;
    this._clock = options.clock ?? (() => new Date());
  }

  // ─── Creation ────────────────────────────────────────────────────────

  /**
   * Create a ledger whose initial collateral backs `initialSupply` at
   * 150%, minting the supply to `owner`.
   *
   * Fails with INSUFFICIENT_COLLATERAL when
   * `total * 100 < initialSupply * 150`. The exact ratio is accepted.
   */
  static initialize(params: InitializeParams, options: LedgerOptions = {}): TreasuryLedger {
    const owner = assertAddress(params.owner, "owner");
    const guard = new GovernanceGuard(params.governanceAddress);
    const initialSupply = assertU64(params.initialSupply, "initialSupply");
    const pool = new CollateralPool(params.collateral, initialSupply);

    const totalCollateral = pool.totalValue();
    if (!meetsMinimumRatio(totalCollateral, initialSupply)) {
      throw new LedgerError(
        "INSUFFICIENT_COLLATERAL",
        `Collateral ${totalCollateral.toString()} cannot back an initial supply of ${initialSupply.toString()} at 150%`,
      );
    }

    const clock = options.clock ?? (() => new Date());
    const oracle = new ValuationOracle(
      params.oracleInitialValue,
      params.timestamp ?? clock().toISOString(),
    );

    const authority = MintAuthority.create(options.ledgerId ?? "ledger");
    const holdings = new HoldingBook(authority);
    holdings.mint(authority, owner, initialSupply);

    const ledger = new TreasuryLedger(
      { pool, oracle, guard, holdings, authority, sequence: 0 },
      options,
    );

    ledger.emit("ledger.initialized", owner, {
      governanceAddress: guard.governanceAddress,
      owner,
      entries: pool.entries.map((e) => ({
        assetId: e.assetId,
        description: e.description,
        value: formatU64(e.value),
      })),
      initialSupply: formatU64(initialSupply),
      oracleValue: formatU64(oracle.latestValue),
    });

    return ledger;
  }

  /**
   * Initialize from three parallel columns of asset ids, descriptions
   * and values.
   */
  static initializeFromColumns(
    columns: CollateralColumns,
    params: Omit<InitializeParams, "collateral">,
    options: LedgerOptions = {},
  ): TreasuryLedger {
    const { assetIds, descriptions, values } = columns;
    if (assetIds.length !== descriptions.length || assetIds.length !== values.length) {
      throw new LedgerError(
        "INVALID_COLLATERAL",
        `Collateral columns differ in length: ${String(assetIds.length)} ids, ${String(descriptions.length)} descriptions, ${String(values.length)} values`,
      );
    }

    const collateral: CollateralEntry[] = [];
    assetIds.forEach((assetId, i) => {
      const description = descriptions[i];
      const value = values[i];
      if (description === undefined || value === undefined) {
        throw new LedgerError("INVALID_COLLATERAL", `Collateral column hole at index ${String(i)}`);
      }
      collateral.push({ assetId, description, value });
    });

    return TreasuryLedger.initialize({ ...params, collateral }, options);
  }

  // ─── Issuance ────────────────────────────────────────────────────────

  /**
   * Pledge `additionalCollateralValue` as a new tail entry and create
   * `amount` units for `recipient`.
   *
   * required = (supply + amount) * 150 / 100, truncated.
   * Fails with INSUFFICIENT_COLLATERAL when sum + additional < required.
   */
  issue(
    additionalCollateralValue: bigint,
    amount: bigint,
    recipient: Address,
    options: IssueOptions = {},
  ): IssueResult {
    this._guard.assertActive("issue");
    assertU64(additionalCollateralValue, "additionalCollateralValue");
    assertU64(amount, "amount");
    assertAddress(recipient, "recipient");

    const newSupply = checkedAdd(this._pool.circulatingSupply, amount, "circulatingSupply");
    const required = requiredCollateral(newSupply);
    const totalCollateral = checkedAdd(
      this._pool.totalValue(),
      additionalCollateralValue,
      "total collateral",
    );

    if (totalCollateral < required) {
      throw new LedgerError(
        "INSUFFICIENT_COLLATERAL",
        `Issuing ${amount.toString()} needs ${required.toString()} collateral, only ${totalCollateral.toString()} pledged`,
      );
    }

    const entry: CollateralEntry = {
      assetId: options.assetId ?? this._pool.nextPledgeId(),
      description: options.description ?? DEFAULT_PLEDGE_DESCRIPTION,
      value: additionalCollateralValue,
    };
    const next = this._pool.prepareIssue(entry, amount);

    // Commit. The mint cannot fail: recipient and amount are validated
    // and the book's total equals the pre-issue supply.
    this._pool.commit(next);
    this._holdings.mint(this._authority, recipient, amount);

    this.emit("units.issued", options.caller ?? recipient, {
      recipient,
      amount: formatU64(amount),
      assetId: entry.assetId,
      collateralAdded: formatU64(additionalCollateralValue),
      circulatingSupply: formatU64(next.circulatingSupply),
      totalCollateral: formatU64(totalCollateral),
    });

    return { entry, circulatingSupply: next.circulatingSupply, totalCollateral };
  }

  // ─── Redemption ──────────────────────────────────────────────────────

  /**
   * Burn `burnAmount` units presented by `holder` and reduce the last
   * collateral entry by `collateralValueReduction`.
   *
   * The 150% floor is not re-checked afterwards: a reduction out of proportion to
   * the burn can leave the ledger under-collateralized. The result's
   * `healthy` flag reports where the ledger landed.
   */
  redeem(holder: Address, burnAmount: bigint, collateralValueReduction: bigint): RedeemResult {
    this._guard.assertActive("redeem");
    assertAddress(holder, "holder");

    const next = this._pool.prepareRedeem(burnAmount, collateralValueReduction);
    const reducedEntry = next.entries[next.entries.length - 1];
    if (reducedEntry === undefined) {
      throw new LedgerError("EMPTY_COLLATERAL_POOL", "Collateral pool has no entries to reduce");
    }
    this._holdings.assertCanBurn(holder, burnAmount);

    this._pool.commit(next);
    this._holdings.burn(this._authority, holder, burnAmount);

    const totalCollateral = this._pool.totalValue();
    const healthy = meetsMinimumRatio(totalCollateral, next.circulatingSupply);

    this.emit("units.redeemed", holder, {
      holder,
      burnAmount: formatU64(burnAmount),
      assetId: reducedEntry.assetId,
      collateralReduced: formatU64(collateralValueReduction),
      circulatingSupply: formatU64(next.circulatingSupply),
      totalCollateral: formatU64(totalCollateral),
      healthy,
    });

    return {
      reducedEntry,
      circulatingSupply: next.circulatingSupply,
      totalCollateral,
      healthy,
    };
  }

  // ─── Governance ──────────────────────────────────────────────────────

  pause(caller: Address): void {
    this._guard.pause(caller);
    this.emit("ledger.paused", caller, {});
  }

  resume(caller: Address): void {
    this._guard.resume(caller);
    this.emit("ledger.resumed", caller, {});
  }

  /**
   * Record a new oracle value. Governance only. The value is
   * informational and does not enter the collateral check.
   */
  updateValuation(caller: Address, value: bigint, timestamp?: string): OracleReading {
    this._guard.authorize(caller, "update the valuation");
    this._oracle.record(value, timestamp ?? this._clock().toISOString());

    this.emit("oracle.updated", caller, {
      latestValue: formatU64(this._oracle.latestValue),
      lastUpdated: this._oracle.lastUpdated,
    });
    return this._oracle.reading();
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  /**
   * Move issued units between holders. Not gated by the pause flag.
   */
  transferUnits(from: Address, to: Address, amount: bigint): void {
    this._holdings.transfer(from, to, amount);
    this.emit("units.transferred", from, { from, to, amount: formatU64(amount) });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Whether collateral covers 150% of supply right now. Never
   * mutates, never throws.
   */
  checkHealth(): boolean {
    return meetsMinimumRatio(this._pool.totalValue(), this._pool.circulatingSupply);
  }

  healthReport(now: Date = this._clock()): HealthReport {
    const totalCollateral = this._pool.totalValue();
    const circulatingSupply = this._pool.circulatingSupply;
    return {
      healthy: meetsMinimumRatio(totalCollateral, circulatingSupply),
      totalCollateral,
      circulatingSupply,
      requiredCollateral: requiredCollateral(circulatingSupply),
      ratioPercent: collateralRatioPercent(totalCollateral, circulatingSupply),
      paused: this._guard.paused,
      oracle: { ...this._oracle.reading(), ageMs: this._oracle.ageMs(now) },
    };
  }

  get circulatingSupply(): bigint {
    return this._pool.circulatingSupply;
  }

  get totalCollateral(): bigint {
    return this._pool.totalValue();
  }

  get entries(): readonly CollateralEntry[] {
    return this._pool.entries;
  }

  get paused(): boolean {
    return this._guard.paused;
  }

  get governanceAddress(): Address {
    return this._guard.governanceAddress;
  }

  get oracle(): OracleReading {
    return this._oracle.reading();
  }

  isOracleStale(maxAgeMs: number, now: Date = this._clock()): boolean {
    return this._oracle.isStale(maxAgeMs, now);
  }

  balanceOf(address: Address): bigint {
    return this._holdings.balanceOf(address);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      ledgerId: this.ledgerId,
      pool: {
        entries: this._pool.entries.map((e) => ({
          assetId: e.assetId,
          description: e.description,
          value: formatU64(e.value),
        })),
        circulatingSupply: formatU64(this._pool.circulatingSupply),
      },
      oracle: {
        latestValue: formatU64(this._oracle.latestValue),
        lastUpdated: this._oracle.lastUpdated,
      },
      guard: {
        governanceAddress: this._guard.governanceAddress,
        paused: this._guard.paused,
      },
      holdings: this._holdings.holders(),
      sequence: this._sequence,
      createdAt: this._clock().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot with a fresh mint authority.
   *
   * The 150% floor is not enforced here: a ledger may legitimately sit below it
   * after a redeem.
   */
  static fromSnapshot(snap: LedgerSnapshot, options: LedgerOptions = {}): TreasuryLedger {
    assertSnapshotShape(snap);

    try {
      const pool = new CollateralPool(
        snap.pool.entries.map((e) => ({
          assetId: e.assetId,
          description: e.description,
          value: parseU64(e.value, `value of "${e.assetId}"`),
        })),
        parseU64(snap.pool.circulatingSupply, "circulatingSupply"),
      );
      const oracle = new ValuationOracle(
        parseU64(snap.oracle.latestValue, "oracle value"),
        snap.oracle.lastUpdated,
      );
      const guard = new GovernanceGuard(snap.guard.governanceAddress, snap.guard.paused);

      const authority = MintAuthority.create(options.ledgerId ?? snap.ledgerId);
      const holdings = new HoldingBook(authority);
      const balances = snap.holdings.map((h) => parseU64(h.balance, `balance of '${h.address}'`));
      const held = sumU64(balances, "holder balances");
      if (held !== pool.circulatingSupply) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Holder balances sum to ${held.toString()} but circulating supply is ${pool.circulatingSupply.toString()}`,
        );
      }
      snap.holdings.forEach((h, i) => {
        holdings.mint(authority, h.address, balances[i] ?? 0n);
      });

      return new TreasuryLedger(
        { pool, oracle, guard, holdings, authority, sequence: snap.sequence },
        { ...options, ledgerId: options.ledgerId ?? snap.ledgerId },
      );
    } catch (err: unknown) {
      if (err instanceof LedgerError && err.code !== "INVALID_SNAPSHOT") {
        throw new LedgerError("INVALID_SNAPSHOT", `Snapshot rejected: ${err.message}`);
      }
      throw err;
    }
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private emit(
    type: LedgerEventType,
    actor: string,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    this._sequence++;
    if (this._onEvent === undefined) {
      return;
    }
    this._onEvent({
      type,
      metadata: {
        eventId: `${this.ledgerId}:${String(this._sequence)}`,
        timestamp: this._clock().toISOString(),
        actor,
        correlationId: this.ledgerId,
        source: "ledger",
      },
      payload,
    });
  }
}

function assertSnapshotShape(snap: LedgerSnapshot): void {
  const problems: string[] = [];

  if (snap.version !== 1) problems.push(`unsupported version ${String(snap.version)}`);
  if (typeof snap.ledgerId !== "string") problems.push("ledgerId must be a string");
  if (!Array.isArray(snap.pool.entries) || !snap.pool.entries.every(isCollateralEntryRecord)) {
    problems.push("pool.entries must be collateral records");
  }
  if (!isU64String(snap.pool.circulatingSupply)) problems.push("pool.circulatingSupply must be a u64 string");
  if (!isU64String(snap.oracle.latestValue)) problems.push("oracle.latestValue must be a u64 string");
  if (!isAddress(snap.guard.governanceAddress)) problems.push("guard.governanceAddress must be an address");
  if (typeof snap.guard.paused !== "boolean") problems.push("guard.paused must be a boolean");
  if (
    !Array.isArray(snap.holdings) ||
    !snap.holdings.every((h) => isAddress(h.address) && isU64String(h.balance))
  ) {
    problems.push("holdings must be address/balance records");
  }
  if (!Number.isInteger(snap.sequence) || snap.sequence < 0) {
    problems.push("sequence must be a non-negative integer");
  }

  if (problems.length > 0) {
    throw new LedgerError("INVALID_SNAPSHOT", `Snapshot rejected: ${problems.join("; ")}`);
  }
}
