/**
 * Block clock — the "now" every pool operation is evaluated against.
 */

import type { BlockInfo } from "@matchpool/types";

export interface BlockClock {
  current(): BlockInfo;
}

export interface SystemBlockClockOptions {
  readonly chainId: string;
  readonly blockTimeMs: number;
  /** Wall-clock ms of block 1. Default: construction time. */
  readonly genesisMs?: number | undefined;
  readonly now?: (() => number) | undefined;
}

/**
 * Derives block height from wall-clock time: one block every
 * `blockTimeMs`, starting at height 1 at genesis. Block time is the
 * wall clock in nanoseconds.
 */
export class SystemBlockClock implements BlockClock {
  private readonly chainId: string;
  private readonly blockTimeMs: number;
  private readonly genesisMs: number;
  private readonly now: () => number;

  constructor(options: SystemBlockClockOptions) {
    if (!Number.isInteger(options.blockTimeMs) || options.blockTimeMs < 1) {
      throw new Error(`blockTimeMs must be a positive integer, got ${String(options.blockTimeMs)}`);
    }
    this.chainId = options.chainId;
    this.blockTimeMs = options.blockTimeMs;
    this.now = options.now ?? Date.now;
    this.genesisMs = options.genesisMs ?? this.now();
  }

  current(): BlockInfo {
    const nowMs = this.now();
    const elapsed = Math.max(0, nowMs - this.genesisMs);
    return {
      chainId: this.chainId,
      height: Math.floor(elapsed / this.blockTimeMs) + 1,
      time: (BigInt(nowMs) * 1_000_000n).toString(),
    };
  }
}

/**
 * A clock that only moves when told to.
 */
export class ManualBlockClock implements BlockClock {
  private block: BlockInfo;

  constructor(initial: BlockInfo = { chainId: "matchpool-local", height: 1, time: "0" }) {
    this.block = initial;
  }

  current(): BlockInfo {
    return this.block;
  }

  set(block: BlockInfo): void {
    this.block = block;
  }

  /** Move forward `blocks` heights, and `blocks` seconds of block time. */
  advance(blocks: number = 1): BlockInfo {
    this.block = {
      chainId: this.block.chainId,
      height: this.block.height + blocks,
      time: (BigInt(this.block.time) + BigInt(blocks) * 1_000_000_000n).toString(),
    };
    return this.block;
  }
}
