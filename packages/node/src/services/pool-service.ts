/**
 * PoolService — hosts one matching pool on the shared ledger.
 *
 * The pool core never moves money; it returns transfer instructions.
 * The service performs the host's side of every call:
 * - reads "now" from the block clock
 * - moves attached funds from the sender into the pool escrow
 * - pays out the emitted instructions from the escrow
 *
 * Funds in and payouts out go to the ledger as one batch, inside the
 * pool's transaction. If the ledger rejects the batch, the pool state is
 * rolled back with it.
 */

import { createHash } from "node:crypto";
import type { Logger } from "pino";
import type { Address, BlockInfo, Coin } from "@matchpool/types";
import type { NativeLedger, Transfer } from "@matchpool/ledger";
import {
  QuadraticFundingPool,
  type AddressValidator,
  type Contribution,
  type CreateProposalMsg,
  type DistributionStatus,
  type InstantiateMsg,
  type MatchingResult,
  type PoolConfig,
  type PoolResponse,
  type Proposal,
} from "@matchpool/funding";
import type { BlockClock } from "../clock.js";

// =============================================================================
// Configuration
// =============================================================================

export interface PoolServiceConfig {
  readonly poolId: string;
  readonly addressPrefix: string;
  readonly ledger: NativeLedger;
  readonly clock: BlockClock;
  readonly validateAddress: AddressValidator;
  readonly logger?: Logger | undefined;
}

/**
 * Deterministic escrow address for a pool: `<prefix>1` followed by the
 * first 38 hex digits of a sha256 digest over the pool id.
 */
export function deriveEscrowAddress(prefix: string, poolId: string): Address {
  const digest = createHash("sha256").update(`matchpool/escrow/${poolId}`).digest("hex");
  return `${prefix}1${digest.slice(0, 38)}`;
}

export interface PoolView {
  readonly id: string;
  readonly escrowAddress: Address;
  readonly config: PoolConfig;
  readonly status: DistributionStatus;
}

// =============================================================================
// Service
// =============================================================================

export class PoolService {
  readonly poolId: string;
  readonly escrowAddress: Address;

  private readonly pool: QuadraticFundingPool;
  private readonly ledger: NativeLedger;
  private readonly clock: BlockClock;
  private readonly logger: Logger | undefined;

  constructor(config: PoolServiceConfig) {
    this.poolId = config.poolId;
    this.escrowAddress = deriveEscrowAddress(config.addressPrefix, config.poolId);
    this.pool = new QuadraticFundingPool({ validateAddress: config.validateAddress });
    this.ledger = config.ledger;
    this.clock = config.clock;
    this.logger = config.logger?.child({ poolId: config.poolId });
  }

  // ─── Execute ─────────────────────────────────────────────────────────

  instantiate(sender: Address, msg: InstantiateMsg, funds: readonly Coin[]): PoolResponse<PoolConfig> {
    const res = this.execute("instantiate", sender, funds, (block) =>
      this.pool.instantiate(sender, msg, funds, block),
    );
    this.logger?.info(
      { admin: res.value.admin, budget: res.value.budget, escrow: this.escrowAddress },
      "Pool instantiated",
    );
    return res;
  }

  createProposal(sender: Address, msg: CreateProposalMsg): PoolResponse<number> {
    const res = this.execute("create_proposal", sender, [], (block) =>
      this.pool.createProposal(sender, msg, block),
    );
    this.logger?.info({ proposalId: res.value, sender }, "Proposal created");
    return res;
  }

  contribute(sender: Address, proposalId: number, funds: readonly Coin[]): PoolResponse<Coin> {
    const res = this.execute("vote_proposal", sender, funds, (block) =>
      this.pool.contribute(sender, proposalId, funds, block),
    );
    this.logger?.info(
      { proposalId, sender, collectedFunds: res.value.amount },
      "Contribution recorded",
    );
    return res;
  }

  triggerDistribution(sender: Address): PoolResponse<MatchingResult> {
    const res = this.execute("trigger_distribution", sender, [], (block) =>
      this.pool.triggerDistribution(sender, block),
    );
    this.logger?.info(
      {
        proposals: res.value.grants.length,
        totalRaw: res.value.totalRaw,
        constrained: res.value.constrained,
        leftover: res.value.leftover,
      },
      "Distribution executed",
    );
    return res;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  view(): PoolView {
    return {
      id: this.poolId,
      escrowAddress: this.escrowAddress,
      config: this.pool.getConfig(),
      status: this.pool.getStatus(),
    };
  }

  getProposal(id: number): Proposal {
    return this.pool.getProposal(id);
  }

  listProposals(): readonly Proposal[] {
    return this.pool.listProposals();
  }

  listContributions(proposalId: number): readonly Contribution[] {
    return this.pool.listContributions(proposalId);
  }

  previewDistribution(): MatchingResult {
    return this.pool.previewDistribution();
  }

  // ─── Private ─────────────────────────────────────────────────────────

  /**
   * Run one core call against the current block and settle it on the
   * ledger. Core errors surface before any balance is checked.
   */
  private execute<T>(
    action: string,
    sender: Address,
    funds: readonly Coin[],
    run: (block: BlockInfo) => PoolResponse<T>,
  ): PoolResponse<T> {
    const block = this.clock.current();

    return this.pool.transaction(() => {
      const response = run(block);

      const transfers: Transfer[] = [
        ...funds.map((coin) => ({ from: sender, to: this.escrowAddress, coin })),
        ...response.transfers.map((t) => ({
          from: this.escrowAddress,
          to: t.toAddress,
          coin: t.coin,
        })),
      ];
      if (transfers.length > 0) {
        const { batchId } = this.ledger.applyBatch(transfers, {
          memo: `${this.poolId}:${action}`,
        });
        this.logger?.debug({ batchId, action, transfers: transfers.length }, "Ledger batch applied");
      }

      return response;
    });
  }
}
