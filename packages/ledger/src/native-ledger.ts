/**
 * @matchpool/ledger — NativeLedger.
 *
 * In-process native-asset ledger. Holds per-address, per-denom balances
 * and applies batches of transfers atomically.
 *
 * API surface:
 * - credit() — Genesis credit for an address
 * - balance() / balances() — Balance queries
 * - applyBatch() — Apply transfers all-or-nothing
 * - history() — Committed batches in order
 * - snapshot() / fromSnapshot() — Persistence
 */

import type { Address, Coin } from "@matchpool/types";
import { checkedAdd, checkedSub, parseUint128, validateCoin } from "./coin-math.js";
import type {
  BalanceLine,
  BatchOptions,
  BatchRecord,
  BatchResult,
  LedgerSnapshot,
  Transfer,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Per-address, per-denom balance book.
 *
 * A batch is validated against a working copy of the balances it touches.
 * Nothing is written unless every transfer in the batch succeeds, so a
 * batch may route funds through an account (deposit then payout) within
 * the same application.
 */
export class NativeLedger {
  private readonly _balances = new Map<Address, Map<string, bigint>>();
  private readonly _batches: BatchRecord[] = [];

  // ─── Genesis ─────────────────────────────────────────────────────────

  /**
   * Credit an address out of thin air. Used for genesis balances only.
   */
  credit(address: Address, coin: Coin): Coin {
    validateCoin(coin);
    const next = checkedAdd(this._get(address, coin.denom), parseUint128(coin.amount));
    this._set(address, coin.denom, next);
    return { denom: coin.denom, amount: next.toString() };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balance(address: Address, denom: string): Coin {
    return { denom, amount: this._get(address, denom).toString() };
  }

  /**
   * All non-zero balances of an address, sorted by denom.
   */
  balances(address: Address): readonly Coin[] {
    const byDenom = this._balances.get(address);
    if (byDenom === undefined) {
      return [];
    }
    return [...byDenom.entries()]
      .filter(([, amount]) => amount > 0n)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([denom, amount]) => ({ denom, amount: amount.toString() }));
  }

  history(): readonly BatchRecord[] {
    return [...this._batches];
  }

  // ─── Core Write ──────────────────────────────────────────────────────

  /**
   * Apply a batch of transfers in order, all or nothing.
   *
   * Validation rules (fail-closed):
   * 1. The batch must not be empty
   * 2. Every coin must be well-formed
   * 3. No sender may go below zero at any step
   * 4. No recipient may exceed Uint128
   *
   * Zero-amount transfers are recorded and move nothing.
   */
  applyBatch(transfers: readonly Transfer[], options?: BatchOptions): BatchResult {
    if (transfers.length === 0) {
      throw new LedgerError("EMPTY_BATCH", "Cannot apply an empty batch of transfers");
    }

    const working = new Map<string, BalanceLine>();
    const key = (address: Address, denom: string): string => `${address}\u0000${denom}`;
    const read = (address: Address, denom: string): bigint => {
      const staged = working.get(key(address, denom));
      return staged !== undefined ? BigInt(staged.amount) : this._get(address, denom);
    };
    const write = (address: Address, denom: string, amount: bigint): void => {
      working.set(key(address, denom), { address, denom, amount: amount.toString() });
    };

    for (const transfer of transfers) {
      validateCoin(transfer.coin);
      const amount = parseUint128(transfer.coin.amount);
      if (amount === 0n) {
        continue;
      }

      const { denom } = transfer.coin;
      const available = read(transfer.from, denom);
      if (available < amount) {
        throw new LedgerError(
          "INSUFFICIENT_FUNDS",
          `'${transfer.from}' holds ${available.toString()}${denom}, needs ${amount.toString()}${denom}`,
        );
      }

      write(transfer.from, denom, checkedSub(available, amount));
      write(transfer.to, denom, checkedAdd(read(transfer.to, denom), amount));
    }

    // All validations passed — commit
    for (const line of working.values()) {
      this._set(line.address, line.denom, BigInt(line.amount));
    }

    const record: BatchRecord = {
      id: this._batches.length + 1,
      transfers: [...transfers],
      ...(options?.memo !== undefined ? { memo: options.memo } : {}),
    };
    this._batches.push(record);

    return { batchId: record.id, transferCount: transfers.length };
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const balances: BalanceLine[] = [];
    for (const [address, byDenom] of this._balances) {
      for (const [denom, amount] of byDenom) {
        if (amount > 0n) {
          balances.push({ address, denom, amount: amount.toString() });
        }
      }
    }
    return { version: 1, balances, batches: this.history() };
  }

  static fromSnapshot(snapshot: LedgerSnapshot): NativeLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported ledger snapshot version: ${String(snapshot.version)}`,
      );
    }
    const ledger = new NativeLedger();
    for (const line of snapshot.balances) {
      ledger._set(line.address, line.denom, parseUint128(line.amount));
    }
    ledger._batches.push(...snapshot.batches);
    return ledger;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _get(address: Address, denom: string): bigint {
    return this._balances.get(address)?.get(denom) ?? 0n;
  }

  private _set(address: Address, denom: string, amount: bigint): void {
    let byDenom = this._balances.get(address);
    if (byDenom === undefined) {
      byDenom = new Map();
      this._balances.set(address, byDenom);
    }
    byDenom.set(denom, amount);
  }
}
