/**
 * LedgerRegistry — Maps ledger ids to hosted TreasuryLedger instances.
 *
 * Each ledger is an isolated state machine. The registry assigns ids,
 * wires every ledger's event stream into the audit log and the host's
 * event listener, and hands ledgers out to route handlers.
 */

import { randomUUID } from "node:crypto";
import { TreasuryLedger } from "@ballast/ledger";
import type { CollateralColumns, InitializeParams, LedgerOptions } from "@ballast/ledger";
import type { LedgerEvent, LedgerId } from "@ballast/types";
import type { AuditLog } from "./audit-log.js";

export interface LedgerRegistryOptions {
  readonly auditLog: AuditLog;
  /** Called after the audit log records each event. */
  readonly onEvent?: ((ledgerId: LedgerId, event: LedgerEvent) => void) | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => LedgerId) | undefined;
}

export interface HostedLedger {
  readonly ledgerId: LedgerId;
  readonly ledger: TreasuryLedger;
}

export class LedgerRegistry {
  private readonly _ledgers = new Map<LedgerId, TreasuryLedger>();
  private readonly _options: LedgerRegistryOptions;

  constructor(options: LedgerRegistryOptions) {
    this._options = options;
  }

  /**
   * Initialize and host a new ledger. Nothing is registered when
   * initialization fails.
   */
  initialize(params: InitializeParams): HostedLedger {
    return this.host((options) => TreasuryLedger.initialize(params, options));
  }

  initializeFromColumns(
    columns: CollateralColumns,
    params: Omit<InitializeParams, "collateral">,
  ): HostedLedger {
    return this.host((options) => TreasuryLedger.initializeFromColumns(columns, params, options));
  }

  get(ledgerId: LedgerId): TreasuryLedger | undefined {
    return this._ledgers.get(ledgerId);
  }

  has(ledgerId: LedgerId): boolean {
    return this._ledgers.has(ledgerId);
  }

  /**
   * Hosted ledger ids in creation order.
   */
  ledgerIds(): readonly LedgerId[] {
    return [...this._ledgers.keys()];
  }

  get size(): number {
    return this._ledgers.size;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private host(build: (options: LedgerOptions) => TreasuryLedger): HostedLedger {
    const ledgerId = this._options.generateId?.() ?? randomUUID();
    const ledger = build({
      ledgerId,
      clock: this._options.clock,
      onEvent: (event) => {
        this._options.auditLog.record(ledgerId, event);
        this._options.onEvent?.(ledgerId, event);
      },
    });
    this._ledgers.set(ledgerId, ledger);
    return { ledgerId, ledger };
  }
}
