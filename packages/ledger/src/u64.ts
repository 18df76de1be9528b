/**
 * @ballast/ledger — Unsigned 64-bit arithmetic.
 *
 * All quantities are bigint constrained to [0, 2^64 - 1]. Results that
 * leave that range are errors, never wrapped or clamped.
 *
 * Rules:
 * - No floating-point operations
 * - Wire values are base-10 digit strings without leading zeros
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

export const U64_MAX = 18_446_744_073_709_551_615n;

/**
 * Assert that a value is a bigint in the u64 range.
 * Returns the value for inline use.
 */
export function assertU64(value: bigint, label: string): bigint {
  if (typeof value !== "bigint") {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a bigint, got ${typeof value}`);
  }
  if (value < 0n || value > U64_MAX) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be between 0 and ${U64_MAX.toString()}, got ${value.toString()}`,
    );
  }
  return value;
}

/**
 * Parse a digit string into a u64 bigint.
 *
 * "15000" → 15000n
 * "-1", "1.5", "007", "" → INVALID_AMOUNT
 */
export function parseU64(raw: string, label: string): bigint {
  if (typeof raw !== "string" || !/^(0|[1-9]\d*)$/.test(raw)) {
    throw new LedgerError("INVALID_AMOUNT", `${label} is not an unsigned integer string: "${String(raw)}"`);
  }
  return assertU64(BigInt(raw), label);
}

/**
 * Format a u64 as its digit string.
 */
export function formatU64(value: bigint): string {
  return value.toString();
}

/**
 * Add two u64 values, failing when the sum leaves the u64 range.
 */
export function checkedAdd(a: bigint, b: bigint, label: string): bigint {
  const sum = a + b;
  if (sum > U64_MAX) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${label} would overflow: ${a.toString()} + ${b.toString()} exceeds ${U64_MAX.toString()}`,
    );
  }
  return sum;
}

/**
 * Sum u64 values with overflow checking at every step.
 */
export function sumU64(values: Iterable<bigint>, label: string): bigint {
  let total = 0n;
  for (const value of values) {
    total = checkedAdd(total, value, label);
  }
  return total;
}
