/**
 * ConfigStore — pool parameters, fixed at instantiation.
 *
 * Rules:
 * - Admin, leftover and every allow-listed address must be well-formed
 * - The attached funds must be exactly the declared budget
 * - Neither period may already be over, and voting cannot end first
 * - There is no update path; a pool is instantiated once
 */

import type { Address, BlockInfo, Coin } from "@matchpool/types";
import { parseUint128 } from "@matchpool/ledger";
import type { AddressValidator } from "./address.js";
import { FundingError, arithmetic } from "./errors.js";
import { assertOrderedPeriods, isExpired } from "./expiration.js";
import { resolveMatcher } from "./matching.js";
import type { PoolStore } from "./store.js";
import type { InstantiateMsg, PoolConfig } from "./types.js";

export class ConfigStore {
  private readonly validateAddress: AddressValidator;

  constructor(validateAddress: AddressValidator) {
    this.validateAddress = validateAddress;
  }

  /**
   * Validate and persist the pool config, starting the proposal sequence
   * at 0 and the distribution status at `not_distributed`.
   */
  initialize(
    store: PoolStore,
    msg: InstantiateMsg,
    funds: readonly Coin[],
    block: BlockInfo,
  ): PoolConfig {
    if (store.loadConfig() !== undefined) {
      throw new FundingError("ALREADY_INITIALIZED", "Pool is already instantiated");
    }

    this.assertAddress(msg.admin, "admin");
    this.assertAddress(msg.leftoverAddress, "leftover address");

    const budget = this.assertBudget(msg.budget, funds);

    const createProposalWhitelist = this.validateWhitelist(msg.createProposalWhitelist);
    const voteProposalWhitelist = this.validateWhitelist(msg.voteProposalWhitelist);

    // Fail on unknown algorithms now, not at distribution time
    resolveMatcher(msg.algorithm);

    if (isExpired(msg.proposalPeriod, block)) {
      throw new FundingError("PROPOSAL_PERIOD_EXPIRED", "Proposal period is already over");
    }
    if (isExpired(msg.votingPeriod, block)) {
      throw new FundingError("VOTING_PERIOD_EXPIRED", "Voting period is already over");
    }
    assertOrderedPeriods(msg.proposalPeriod, msg.votingPeriod);

    const config: PoolConfig = {
      admin: msg.admin,
      budget,
      leftoverAddress: msg.leftoverAddress,
      proposalPeriod: msg.proposalPeriod,
      votingPeriod: msg.votingPeriod,
      algorithm: msg.algorithm,
      ...(createProposalWhitelist !== undefined ? { createProposalWhitelist } : {}),
      ...(voteProposalWhitelist !== undefined ? { voteProposalWhitelist } : {}),
    };

    store.saveConfig(config);
    store.saveProposalSeq(0);
    store.saveStatus("not_distributed");
    return config;
  }

  load(store: PoolStore): PoolConfig {
    const config = store.loadConfig();
    if (config === undefined) {
      throw new FundingError("NOT_INITIALIZED", "Pool has not been instantiated");
    }
    return config;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Gating queries
  // ───────────────────────────────────────────────────────────────────────

  isCreateAllowed(config: PoolConfig, address: Address): boolean {
    return config.createProposalWhitelist?.includes(address) ?? true;
  }

  isVoteAllowed(config: PoolConfig, address: Address): boolean {
    return config.voteProposalWhitelist?.includes(address) ?? true;
  }

  proposalPeriodExpired(config: PoolConfig, block: BlockInfo): boolean {
    return isExpired(config.proposalPeriod, block);
  }

  votingPeriodExpired(config: PoolConfig, block: BlockInfo): boolean {
    return isExpired(config.votingPeriod, block);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private assertAddress(address: Address, label: string): void {
    if (!this.validateAddress(address)) {
      throw new FundingError("INVALID_ADDRESS", `Invalid ${label}: "${address}"`);
    }
  }

  private assertBudget(budget: Coin, funds: readonly Coin[]): Coin {
    if (budget.denom.trim() === "") {
      throw new FundingError("INVALID_AMOUNT", "Budget denom must be a non-empty string");
    }
    const amount = arithmetic(() => parseUint128(budget.amount));
    if (amount === 0n) {
      throw new FundingError("ZERO_AMOUNT", "Budget amount must be greater than zero");
    }

    const [attached, ...extra] = funds;
    const matches =
      attached !== undefined &&
      extra.length === 0 &&
      attached.denom === budget.denom &&
      attached.amount === amount.toString();
    if (!matches) {
      const sent = funds.map((c) => `${c.amount}${c.denom}`).join(",") || "nothing";
      throw new FundingError(
        "BUDGET_MISMATCH",
        `Attached funds (${sent}) do not match the declared budget ${amount.toString()}${budget.denom}`,
      );
    }

    return { denom: budget.denom, amount: amount.toString() };
  }

  private validateWhitelist(
    whitelist: readonly Address[] | undefined,
  ): readonly Address[] | undefined {
    if (whitelist === undefined) {
      return undefined;
    }
    for (const address of whitelist) {
      this.assertAddress(address, "whitelist address");
    }
    return [...whitelist];
  }
}
