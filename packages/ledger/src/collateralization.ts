/**
 * @ballast/ledger — Collateralization ratio arithmetic.
 *
 * Minimum collateralization: sum(collateral) * 100 >= circulatingSupply * 150.
 *
 * Products are computed in unbounded bigint, so the multiply never
 * overflows even when both operands sit at the top of the u64 range.
 */

/** Minimum collateralization, in percent. */
export const MIN_RATIO = 150n;

/** Percent denominator. */
export const RATIO_BASE = 100n;

/**
 * Exact minimum-ratio check.
 */
export function meetsMinimumRatio(totalCollateral: bigint, circulatingSupply: bigint): boolean {
  return totalCollateral * RATIO_BASE >= circulatingSupply * MIN_RATIO;
}

/**
 * Collateral required to back a supply: supply * 150 / 100.
 *
 * Multiply before divide; the division truncates, so the result can sit
 * up to 99/100 of a unit below the exact requirement.
 */
export function requiredCollateral(circulatingSupply: bigint): bigint {
  return (circulatingSupply * MIN_RATIO) / RATIO_BASE;
}

/**
 * floor(total * 100 / supply), or null when nothing circulates.
 */
export function collateralRatioPercent(
  totalCollateral: bigint,
  circulatingSupply: bigint,
): bigint | null {
  if (circulatingSupply === 0n) {
    return null;
  }
  return (totalCollateral * RATIO_BASE) / circulatingSupply;
}
