/**
 * Response bodies.
 *
 * JSON has no bigint, so every quantity leaves the API as a digit
 * string. These mappers are the only place that conversion happens.
 */

import type { HealthReport, IssueResult, RedeemResult, TreasuryLedger } from "@ballast/ledger";
import type { CollateralEntry, CollateralEntryRecord, LedgerId } from "@ballast/types";

export interface LedgerView {
  readonly ledgerId: LedgerId;
  readonly governanceAddress: string;
  readonly paused: boolean;
  readonly circulatingSupply: string;
  readonly totalCollateral: string;
  readonly entries: readonly CollateralEntryRecord[];
  readonly oracle: { readonly latestValue: string; readonly lastUpdated: string };
}

export interface HealthView {
  readonly healthy: boolean;
  readonly totalCollateral: string;
  readonly circulatingSupply: string;
  readonly requiredCollateral: string;
  readonly ratioPercent: string | null;
  readonly paused: boolean;
  readonly oracle: {
    readonly latestValue: string;
    readonly lastUpdated: string;
    readonly ageMs: number;
  };
  /** The oracle reading is older than the configured maximum age. */
  readonly oracleStale: boolean;
}

export interface IssueView {
  readonly entry: CollateralEntryRecord;
  readonly circulatingSupply: string;
  readonly totalCollateral: string;
}

export interface RedeemView {
  readonly reducedEntry: CollateralEntryRecord;
  readonly circulatingSupply: string;
  readonly totalCollateral: string;
  readonly healthy: boolean;
}

export function toEntryRecord(entry: CollateralEntry): CollateralEntryRecord {
  return { assetId: entry.assetId, description: entry.description, value: entry.value.toString() };
}

export function toLedgerView(ledgerId: LedgerId, ledger: TreasuryLedger): LedgerView {
  const oracle = ledger.oracle;
  return {
    ledgerId,
    governanceAddress: ledger.governanceAddress,
    paused: ledger.paused,
    circulatingSupply: ledger.circulatingSupply.toString(),
    totalCollateral: ledger.totalCollateral.toString(),
    entries: ledger.entries.map(toEntryRecord),
    oracle: { latestValue: oracle.latestValue.toString(), lastUpdated: oracle.lastUpdated },
  };
}

export function toHealthView(report: HealthReport, oracleStale: boolean): HealthView {
  return {
    healthy: report.healthy,
    totalCollateral: report.totalCollateral.toString(),
    circulatingSupply: report.circulatingSupply.toString(),
    requiredCollateral: report.requiredCollateral.toString(),
    ratioPercent: report.ratioPercent === null ? null : report.ratioPercent.toString(),
    paused: report.paused,
    oracle: {
      latestValue: report.oracle.latestValue.toString(),
      lastUpdated: report.oracle.lastUpdated,
      ageMs: report.oracle.ageMs,
    },
    oracleStale,
  };
}

export function toIssueView(result: IssueResult): IssueView {
  return {
    entry: toEntryRecord(result.entry),
    circulatingSupply: result.circulatingSupply.toString(),
    totalCollateral: result.totalCollateral.toString(),
  };
}

export function toRedeemView(result: RedeemResult): RedeemView {
  return {
    reducedEntry: toEntryRecord(result.reducedEntry),
    circulatingSupply: result.circulatingSupply.toString(),
    totalCollateral: result.totalCollateral.toString(),
    healthy: result.healthy,
  };
}
