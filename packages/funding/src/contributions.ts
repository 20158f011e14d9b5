/**
 * ContributionLedger — one funded vote per (proposal, contributor).
 */

import type { Address, BlockInfo, Coin } from "@matchpool/types";
import { checkedAdd, parseUint128 } from "@matchpool/ledger";
import type { ConfigStore } from "./config-store.js";
import { FundingError, arithmetic } from "./errors.js";
import type { PoolStore } from "./store.js";
import type { Contribution, PoolConfig, Proposal } from "./types.js";

export class ContributionLedger {
  private readonly configs: ConfigStore;

  constructor(configs: ConfigStore) {
    this.configs = configs;
  }

  /**
   * Record a contribution and add it to the proposal's collected total.
   *
   * Checks, in order:
   * 1. Voter allow-list
   * 2. Voting period still open
   * 3. Exactly one attached coin, in the budget denom, non-zero
   * 4. Proposal exists
   * 5. No earlier contribution from this sender to this proposal
   *
   * Returns the updated proposal.
   */
  record(
    store: PoolStore,
    config: PoolConfig,
    sender: Address,
    proposalId: number,
    funds: readonly Coin[],
    block: BlockInfo,
  ): Proposal {
    if (!this.configs.isVoteAllowed(config, sender)) {
      throw new FundingError("UNAUTHORIZED", `'${sender}' may not vote`);
    }
    if (this.configs.votingPeriodExpired(config, block)) {
      throw new FundingError("VOTING_PERIOD_EXPIRED", "Voting period has ended");
    }

    const fund = this.singleFund(config, funds);

    const proposal = store.loadProposal(proposalId);
    if (proposal === undefined) {
      throw new FundingError("PROPOSAL_NOT_FOUND", `Proposal ${String(proposalId)} not found`);
    }
    if (store.loadContribution(proposalId, sender) !== undefined) {
      throw new FundingError(
        "DUPLICATE_CONTRIBUTION",
        `'${sender}' already contributed to proposal ${String(proposalId)}`,
      );
    }

    const collected = arithmetic(() =>
      checkedAdd(parseUint128(proposal.collectedFunds), parseUint128(fund.amount)),
    );
    const updated: Proposal = { ...proposal, collectedFunds: collected.toString() };

    const contribution: Contribution = { proposalId, contributor: sender, fund };
    store.saveContribution(contribution);
    store.saveProposal(updated);
    return updated;
  }

  list(store: PoolStore, proposalId: number): readonly Contribution[] {
    return store.listContributions(proposalId);
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private singleFund(config: PoolConfig, funds: readonly Coin[]): Coin {
    const [fund, ...extra] = funds;
    if (extra.length > 0) {
      throw new FundingError(
        "WRONG_DENOMINATION",
        `Expected a single coin of ${config.budget.denom}, got ${String(funds.length)} coins`,
      );
    }
    if (fund === undefined) {
      throw new FundingError("ZERO_AMOUNT", "No funds attached");
    }
    if (fund.denom !== config.budget.denom) {
      throw new FundingError(
        "WRONG_DENOMINATION",
        `Expected ${config.budget.denom}, got ${fund.denom}`,
      );
    }
    const amount = arithmetic(() => parseUint128(fund.amount));
    if (amount === 0n) {
      throw new FundingError("ZERO_AMOUNT", "Contribution amount must be greater than zero");
    }
    return { denom: fund.denom, amount: amount.toString() };
  }
}
