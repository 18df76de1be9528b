/**
 * @ballast/ledger — Valuation oracle.
 *
 * Storage for the latest reported collateral valuation and when it was
 * recorded. The value is accepted as given; nothing here fetches or
 * derives prices.
 */

import type { OracleReading } from "./types.js";
import { LedgerError } from "./types.js";
import { assertU64 } from "./u64.js";

function assertTimestamp(timestamp: string): string {
  if (typeof timestamp !== "string" || Number.isNaN(Date.parse(timestamp))) {
    throw new LedgerError("INVALID_TIMESTAMP", `Invalid oracle timestamp: "${String(timestamp)}"`);
  }
  return timestamp;
}

export class ValuationOracle {
  private _latestValue: bigint;
  private _lastUpdated: string;

  constructor(latestValue: bigint, lastUpdated: string) {
    this._latestValue = assertU64(latestValue, "oracle value");
    this._lastUpdated = assertTimestamp(lastUpdated);
  }

  get latestValue(): bigint {
    return this._latestValue;
  }

  get lastUpdated(): string {
    return this._lastUpdated;
  }

  reading(): OracleReading {
    return { latestValue: this._latestValue, lastUpdated: this._lastUpdated };
  }

  /**
   * Record a new valuation. Both fields are validated before either
   * is written.
   */
  record(value: bigint, timestamp: string): void {
    assertU64(value, "oracle value");
    assertTimestamp(timestamp);
    this._latestValue = value;
    this._lastUpdated = timestamp;
  }

  /**
   * Milliseconds since the last recording. Clamped at zero when the
   * recording is in the future relative to `now`.
   */
  ageMs(now: Date = new Date()): number {
    return Math.max(0, now.getTime() - Date.parse(this._lastUpdated));
  }

  isStale(maxAgeMs: number, now: Date = new Date()): boolean {
    return this.ageMs(now) > maxAgeMs;
  }
}
