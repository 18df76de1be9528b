/**
 * Append-only audit log of ledger events.
 *
 * Every event a hosted ledger emits lands here, so the API can answer
 * who-did-what-when per ledger. In-memory only: entries last as long
 * as the process.
 */

import type { LedgerEvent, LedgerEventType } from "@ballast/types";

// =============================================================================
// Types
// =============================================================================

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly ledgerId: string;
  readonly eventId: string;
  readonly action: LedgerEventType;
  readonly actor: string;
  readonly detail: Readonly<Record<string, unknown>>;
}

export interface AuditLogQuery {
  readonly ledgerId?: string | undefined;
  readonly action?: LedgerEventType | undefined;
  readonly actor?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];

  /**
   * Append a ledger event.
   */
  record(ledgerId: string, event: LedgerEvent): AuditLogEntry {
    const entry: AuditLogEntry = {
      timestamp: event.metadata.timestamp,
      ledgerId,
      eventId: event.metadata.eventId,
      action: event.type,
      actor: event.metadata.actor,
      detail: event.payload,
    };
    this._entries.push(entry);
    return entry;
  }

  /**
   * Query entries with optional filters. Returns newest-first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.ledgerId !== undefined) {
      results = results.filter((e) => e.ledgerId === filter.ledgerId);
    }
    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    if (filter?.actor !== undefined) {
      results = results.filter((e) => e.actor === filter.actor);
    }

    // Newest first
    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}
