/**
 * Event Types
 *
 * Every committed state change of a ledger is described by exactly one
 * DomainEvent. Failed operations produce no event.
 *
 * Rules:
 * - Events are immutable after creation
 * - Payload quantities are digit strings so events stay JSON-safe
 */

/** Event type identifiers emitted by the ledger. */
export type LedgerEventType =
  | "ledger.initialized"
  | "units.issued"
  | "units.redeemed"
  | "units.transferred"
  | "ledger.paused"
  | "ledger.resumed"
  | "oracle.updated";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who caused this event */
  readonly actor: string;

  /** Groups events that belong to the same ledger */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "ledger" | "host";
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent<T extends string = string> {
  readonly type: T;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}

/** An event emitted by a TreasuryLedger. */
export type LedgerEvent = DomainEvent<LedgerEventType>;
