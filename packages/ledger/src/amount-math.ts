/**
 * @multiledger/ledger — Checked unsigned arithmetic.
 *
 * Amounts are unsigned 128-bit, counters unsigned 64-bit. Every operation
 * that would leave the representable range throws instead of wrapping.
 *
 * Rules:
 * - No floating-point operations
 * - Decimal strings are canonical: digits only, no leading zeros
 * - Zero runtime dependencies
 */

import type { Amount } from "@multiledger/types";
import { LedgerError } from "./types.js";

export const U128_MAX: Amount = (1n << 128n) - 1n;
export const U64_MAX = (1n << 64n) - 1n;

// ─── Parsing ─────────────────────────────────────────────────────────────

/**
 * Parse a canonical decimal string into a u128 amount.
 *
 * "1000" → 1000n
 * "007", "-1", "1.5" → INVALID_AMOUNT
 */
export function parseAmount(value: string): Amount {
  if (!/^(0|[1-9]\d*)$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${value}"`);
  }
  return assertAmount(BigInt(value));
}

/**
 * Render an amount as a canonical decimal string.
 */
export function formatAmount(value: Amount): string {
  return assertAmount(value).toString();
}

/**
 * Assert a bigint lies in [0, U128_MAX].
 */
export function assertAmount(value: Amount, label = "amount"): Amount {
  if (value < 0n || value > U128_MAX) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be an unsigned 128-bit integer, got ${value.toString()}`,
    );
  }
  return value;
}

/**
 * Parse a decimal string into a u64 counter value.
 */
export function parseCounter(value: string): bigint {
  if (!/^(0|[1-9]\d*)$/.test(value)) {
    throw new LedgerError("INVALID_ARGUMENT", `Invalid counter: "${value}"`);
  }
  const parsed = BigInt(value);
  if (parsed > U64_MAX) {
    throw new LedgerError("INVALID_ARGUMENT", `Counter exceeds u64: "${value}"`);
  }
  return parsed;
}

// ─── Checked Operations ──────────────────────────────────────────────────

/**
 * a + b, or OVERFLOW past U128_MAX.
 */
export function checkedAdd(a: Amount, b: Amount, what = "Balance"): Amount {
  const sum = a + b;
  if (sum > U128_MAX) {
    throw new LedgerError("OVERFLOW", `${what} overflow`);
  }
  return sum;
}

/**
 * a - b, or UNDERFLOW below zero.
 */
export function checkedSub(a: Amount, b: Amount, what = "Balance"): Amount {
  if (b > a) {
    throw new LedgerError("UNDERFLOW", `${what} underflow`);
  }
  return a - b;
}

export function minAmount(a: Amount, b: Amount): Amount {
  return a < b ? a : b;
}
