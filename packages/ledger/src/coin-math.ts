/**
 * @matchpool/ledger — Deterministic coin arithmetic.
 *
 * All arithmetic uses bigint internally. Amounts cross the API as
 * Uint128 decimal strings and are range-checked on the way in and out.
 *
 * Rules:
 * - No floating-point operations
 * - Denominations must match for all binary operations
 * - Results outside [0, 2^128 - 1] throw OVERFLOW, never saturate
 * - Zero runtime dependencies
 */

import type { Coin } from "@matchpool/types";
import { LedgerError } from "./types.js";

/** Largest amount representable by a Uint128. */
export const UINT128_MAX = (1n << 128n) - 1n;

const UINT_PATTERN = /^(0|[1-9]\d*)$/;

// ─── Scalar Helpers ──────────────────────────────────────────────────────

/**
 * Parse a Uint128 decimal string into a bigint.
 *
 * "100" → 100n
 * "01" → throws INVALID_AMOUNT
 * "340282366920938463463374607431768211456" → throws OVERFLOW
 */
export function parseUint128(amount: string): bigint {
  if (typeof amount !== "string" || !UINT_PATTERN.test(amount)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }
  return assertUint128(BigInt(amount));
}

/**
 * Assert a bigint fits in a Uint128 and return it unchanged.
 */
export function assertUint128(value: bigint): bigint {
  if (value < 0n) {
    throw new LedgerError("OVERFLOW", `Amount underflow: ${value.toString()} is negative`);
  }
  if (value > UINT128_MAX) {
    throw new LedgerError("OVERFLOW", `Amount overflow: ${value.toString()} exceeds Uint128`);
  }
  return value;
}

/**
 * Add two amounts; the sum must fit in a Uint128.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertUint128(a + b);
}

/**
 * Subtract b from a; the difference must not be negative.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  return assertUint128(a - b);
}

/**
 * Floor integer square root via Newton's method.
 *
 * isqrt(24n) → 4n, isqrt(25n) → 5n. Exact for any size of input.
 */
export function isqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Square root of negative value: ${value.toString()}`,
    );
  }
  if (value < 2n) {
    return value;
  }

  // Start above the root so the sequence decreases monotonically
  let x = 1n << (BigInt(value.toString(2).length + 1) >> 1n);
  for (;;) {
    const next = (x + value / x) >> 1n;
    if (next >= x) {
      return x;
    }
    x = next;
  }
}

/**
 * floor(a * b / d), with the product kept whole until the division.
 */
export function mulDivFloor(a: bigint, b: bigint, d: bigint): bigint {
  if (d <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Divisor must be positive, got ${d.toString()}`);
  }
  if (a < 0n || b < 0n) {
    throw new LedgerError("INVALID_AMOUNT", "mulDivFloor operands must be non-negative");
  }
  return (a * b) / d;
}

// ─── Coin API ────────────────────────────────────────────────────────────

/**
 * Validate that a Coin is well-formed.
 * Throws LedgerError if invalid.
 */
export function validateCoin(coin: Coin): void {
  if (typeof coin.denom !== "string" || coin.denom.trim() === "") {
    throw new LedgerError("INVALID_COIN", `Coin denom must be a non-empty string, got: "${String(coin.denom)}"`);
  }
  parseUint128(coin.amount);
}
