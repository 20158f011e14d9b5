/**
 * DistributionDispatcher — the single-shot payout.
 *
 * Gathers every proposal and its contributions in a fixed order, runs the
 * configured matcher once, and turns the result into transfer
 * instructions: one per proposal with a non-zero payout, then the
 * leftover. The distribution status flips in the same transaction.
 */

import type { Address, BlockInfo, TransferInstruction } from "@matchpool/types";
import { parseUint128 } from "@matchpool/ledger";
import type { ConfigStore } from "./config-store.js";
import { FundingError, arithmetic } from "./errors.js";
import { resolveMatcher, type RawGrant } from "./matching.js";
import type { PoolStore } from "./store.js";
import type { MatchingResult, PoolConfig } from "./types.js";

export interface DistributionOutcome {
  readonly result: MatchingResult;
  readonly transfers: readonly TransferInstruction[];
}

export class DistributionDispatcher {
  private readonly configs: ConfigStore;

  constructor(configs: ConfigStore) {
    this.configs = configs;
  }

  /**
   * Compute the matching result for the pool as it stands. Read-only.
   */
  preview(store: PoolStore, config: PoolConfig): MatchingResult {
    const grants: RawGrant[] = store.listProposals().map((proposal) => ({
      proposalId: proposal.id,
      fundAddress: proposal.fundAddress,
      contributions: store
        .listContributions(proposal.id)
        .map((c) => arithmetic(() => parseUint128(c.fund.amount))),
      collectedFunds: arithmetic(() => parseUint128(proposal.collectedFunds)),
    }));
    return resolveMatcher(config.algorithm)(grants, config.budget);
  }

  /**
   * Distribute the budget. Admin only, after voting closes, once.
   */
  trigger(
    store: PoolStore,
    config: PoolConfig,
    sender: Address,
    block: BlockInfo,
  ): DistributionOutcome {
    if (sender !== config.admin) {
      throw new FundingError("UNAUTHORIZED", `'${sender}' is not the pool admin`);
    }
    if (!this.configs.votingPeriodExpired(config, block)) {
      throw new FundingError("VOTING_PERIOD_NOT_EXPIRED", "Voting period is still open");
    }
    if (store.loadStatus() === "distributed") {
      throw new FundingError("ALREADY_DISTRIBUTED", "Budget has already been distributed");
    }

    const result = this.preview(store, config);
    const { denom } = config.budget;

    const transfers: TransferInstruction[] = [];
    for (const grant of result.grants) {
      if (grant.payout !== "0") {
        transfers.push({ toAddress: grant.fundAddress, coin: { denom, amount: grant.payout } });
      }
    }
    transfers.push({
      toAddress: config.leftoverAddress,
      coin: { denom, amount: result.leftover },
    });

    store.saveStatus("distributed");
    return { result, transfers };
  }
}
