/**
 * QuadraticFundingPool — top-level coordinator for one matching pool.
 *
 * Composes:
 * - ConfigStore (parameters and gating)
 * - ProposalLedger (proposal period)
 * - ContributionLedger (voting period)
 * - DistributionDispatcher (single-shot CLR payout)
 *
 * Every execute call runs inside one store transaction: it either
 * commits all of its writes or, on any error, none of them. Execute
 * calls return a PoolResponse; the transfers in it are instructions for
 * the host ledger, which this class never touches.
 */

import type { Address, BlockInfo, Coin, TransferInstruction } from "@matchpool/types";
import { isCoin, isExpiration, isUintString } from "@matchpool/types";
import { createAddressValidator, type AddressValidator } from "./address.js";
import { ConfigStore } from "./config-store.js";
import { ContributionLedger } from "./contributions.js";
import { DistributionDispatcher } from "./distribution.js";
import { FundingError } from "./errors.js";
import { ProposalLedger } from "./proposals.js";
import { InMemoryPoolStore, type PoolStore } from "./store.js";
import type {
  Contribution,
  CreateProposalMsg,
  DistributionStatus,
  EventAttribute,
  InstantiateMsg,
  MatchingResult,
  PoolConfig,
  PoolResponse,
  PoolSnapshot,
  PoolState,
  Proposal,
} from "./types.js";

export interface PoolOptions {
  /** Backing storage. Defaults to a fresh in-memory store. */
  readonly store?: PoolStore | undefined;
  /** Address syntax check. Defaults to any-prefix validation. */
  readonly validateAddress?: AddressValidator | undefined;
}

function respond<T>(
  value: T,
  action: string,
  attributes: readonly EventAttribute[],
  transfers: readonly TransferInstruction[] = [],
): PoolResponse<T> {
  return { value, transfers, attributes: [{ key: "action", value: action }, ...attributes] };
}

// =============================================================================
// QuadraticFundingPool
// =============================================================================

export class QuadraticFundingPool {
  private readonly store: PoolStore;
  private readonly configs: ConfigStore;
  private readonly proposals: ProposalLedger;
  private readonly contributions: ContributionLedger;
  private readonly dispatcher: DistributionDispatcher;

  constructor(options: PoolOptions = {}) {
    const validateAddress = options.validateAddress ?? createAddressValidator();
    this.store = options.store ?? new InMemoryPoolStore();
    this.configs = new ConfigStore(validateAddress);
    this.proposals = new ProposalLedger(this.configs, validateAddress);
    this.contributions = new ContributionLedger(this.configs);
    this.dispatcher = new DistributionDispatcher(this.configs);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execute
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Instantiate the pool. `funds` must be exactly the declared budget.
   */
  instantiate(
    sender: Address,
    msg: InstantiateMsg,
    funds: readonly Coin[],
    block: BlockInfo,
  ): PoolResponse<PoolConfig> {
    return this.store.transaction((tx) => {
      const config = this.configs.initialize(tx, msg, funds, block);
      return respond(config, "instantiate", [
        { key: "sender", value: sender },
        { key: "admin", value: config.admin },
      ]);
    });
  }

  createProposal(
    sender: Address,
    msg: CreateProposalMsg,
    block: BlockInfo,
  ): PoolResponse<number> {
    return this.store.transaction((tx) => {
      const config = this.configs.load(tx);
      const proposal = this.proposals.create(tx, config, sender, msg, block);
      return respond(proposal.id, "create_proposal", [
        { key: "title", value: proposal.title },
        { key: "proposal_id", value: String(proposal.id) },
      ]);
    });
  }

  /**
   * Record a funded vote. Returns the proposal's new collected total.
   */
  contribute(
    sender: Address,
    proposalId: number,
    funds: readonly Coin[],
    block: BlockInfo,
  ): PoolResponse<Coin> {
    return this.store.transaction((tx) => {
      const config = this.configs.load(tx);
      const proposal = this.contributions.record(tx, config, sender, proposalId, funds, block);
      const collected: Coin = { denom: config.budget.denom, amount: proposal.collectedFunds };
      return respond(collected, "vote_proposal", [
        { key: "proposal_id", value: String(proposal.id) },
        { key: "voter", value: sender },
        { key: "collected_funds", value: `${collected.amount}${collected.denom}` },
      ]);
    });
  }

  triggerDistribution(
    sender: Address,
    block: BlockInfo,
  ): PoolResponse<MatchingResult> {
    return this.store.transaction((tx) => {
      const config = this.configs.load(tx);
      const { result, transfers } = this.dispatcher.trigger(tx, config, sender, block);
      return respond(
        result,
        "trigger_distribution",
        [{ key: "leftover", value: `${result.leftover}${result.budget.denom}` }],
        transfers,
      );
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getConfig(): PoolConfig {
    return this.configs.load(this.store);
  }

  getStatus(): DistributionStatus {
    this.configs.load(this.store);
    return this.store.loadStatus();
  }

  getProposal(id: number): Proposal {
    this.configs.load(this.store);
    return this.proposals.get(this.store, id);
  }

  /** All proposals, ascending by id. Unpaginated. */
  listProposals(): readonly Proposal[] {
    this.configs.load(this.store);
    return this.proposals.list(this.store);
  }

  listContributions(proposalId: number): readonly Contribution[] {
    this.configs.load(this.store);
    this.proposals.get(this.store, proposalId);
    return this.contributions.list(this.store, proposalId);
  }

  /**
   * What a distribution would pay out if triggered now. Changes nothing.
   */
  previewDistribution(): MatchingResult {
    const config = this.configs.load(this.store);
    return this.dispatcher.preview(this.store, config);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` in an outer transaction. Execute calls made inside it are
   * rolled back together if `fn` throws, including after they returned.
   */
  transaction<T>(fn: () => T): T {
    return this.store.transaction(() => fn());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (persistence)
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): PoolSnapshot {
    return {
      version: 1,
      state: this.store.exportState(),
      asOf: new Date().toISOString(),
    };
  }

  static fromSnapshot(
    snapshot: PoolSnapshot,
    options: Omit<PoolOptions, "store"> = {},
  ): QuadraticFundingPool {
    if (snapshot.version !== 1) {
      throw new FundingError(
        "INVALID_SNAPSHOT",
        `Unsupported pool snapshot version: ${String(snapshot.version)}`,
      );
    }
    assertRestorable(snapshot.state);
    return new QuadraticFundingPool({
      ...options,
      store: InMemoryPoolStore.fromState(snapshot.state),
    });
  }
}

/**
 * Shape checks on a deserialized state. Amounts and periods must parse
 * before any operation reads them.
 */
function assertRestorable(state: PoolState): void {
  const { config } = state;
  if (
    config !== undefined &&
    !(isCoin(config.budget) && isExpiration(config.proposalPeriod) && isExpiration(config.votingPeriod))
  ) {
    throw new FundingError("INVALID_SNAPSHOT", "Snapshot config has a malformed budget or period");
  }
  for (const proposal of state.proposals) {
    if (!isUintString(proposal.collectedFunds)) {
      throw new FundingError(
        "INVALID_SNAPSHOT",
        `Proposal ${String(proposal.id)} has malformed collected funds: "${String(proposal.collectedFunds)}"`,
      );
    }
  }
  for (const contribution of state.contributions) {
    if (!isCoin(contribution.fund)) {
      throw new FundingError(
        "INVALID_SNAPSHOT",
        `Contribution by '${contribution.contributor}' to proposal ${String(contribution.proposalId)} has a malformed fund`,
      );
    }
  }
}
