/**
 * @matchpool/ledger — Internal types for the native-asset ledger.
 *
 * Rules:
 * - All types are readonly
 * - Recorded batches are never mutated
 * - Fail-closed: invalid transfers throw, never silently succeed
 */

import type { Address, Coin } from "@matchpool/types";

// ─── Transfer Types ──────────────────────────────────────────────────────

/**
 * A single movement of one coin between two accounts.
 */
export interface Transfer {
  readonly from: Address;
  readonly to: Address;
  readonly coin: Coin;
}

/**
 * Options for applying a batch of transfers.
 */
export interface BatchOptions {
  readonly memo?: string | undefined;
}

/**
 * A committed batch, in application order.
 */
export interface BatchRecord {
  readonly id: number;
  readonly transfers: readonly Transfer[];
  readonly memo?: string | undefined;
}

/**
 * Result of a successful batch application.
 */
export interface BatchResult {
  readonly batchId: number;
  readonly transferCount: number;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface BalanceLine {
  readonly address: Address;
  readonly denom: string;
  readonly amount: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 * Used for persistence and rehydration.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly balances: readonly BalanceLine[];
  readonly batches: readonly BatchRecord[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_COIN"
  | "OVERFLOW"
  | "INSUFFICIENT_FUNDS"
  | "EMPTY_BATCH"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
