/**
 * Content hash of a ledger snapshot.
 *
 * RFC 8785 canonical JSON, then SHA-256. `createdAt` is wall-clock
 * metadata and is stripped first, so two snapshots of the same state
 * hash identically whenever they were taken.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { LedgerSnapshot } from "@ballast/ledger";

export function hashLedgerSnapshot(snapshot: LedgerSnapshot): string {
  const { createdAt: _, ...structural } = snapshot;
  return createHash("sha256").update(canonicalize(structural)).digest("hex");
}
