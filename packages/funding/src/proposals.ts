/**
 * ProposalLedger — append-only proposals keyed by a dense id sequence.
 */

import type { Address, BlockInfo } from "@matchpool/types";
import type { AddressValidator } from "./address.js";
import type { ConfigStore } from "./config-store.js";
import { FundingError } from "./errors.js";
import type { PoolStore } from "./store.js";
import type { CreateProposalMsg, PoolConfig, Proposal } from "./types.js";

export class ProposalLedger {
  private readonly configs: ConfigStore;
  private readonly validateAddress: AddressValidator;

  constructor(configs: ConfigStore, validateAddress: AddressValidator) {
    this.configs = configs;
    this.validateAddress = validateAddress;
  }

  /**
   * Create a proposal during the proposal period.
   *
   * Checks, in order: creator allow-list, proposal period, fund address.
   * The new id is `seq + 1`; the sequence and the proposal are saved
   * together.
   */
  create(
    store: PoolStore,
    config: PoolConfig,
    sender: Address,
    msg: CreateProposalMsg,
    block: BlockInfo,
  ): Proposal {
    if (!this.configs.isCreateAllowed(config, sender)) {
      throw new FundingError("UNAUTHORIZED", `'${sender}' may not create proposals`);
    }
    if (this.configs.proposalPeriodExpired(config, block)) {
      throw new FundingError("PROPOSAL_PERIOD_EXPIRED", "Proposal period has ended");
    }
    if (!this.validateAddress(msg.fundAddress)) {
      throw new FundingError("INVALID_ADDRESS", `Invalid fund address: "${msg.fundAddress}"`);
    }

    const id = store.loadProposalSeq() + 1;
    const proposal: Proposal = {
      id,
      title: msg.title,
      description: msg.description,
      fundAddress: msg.fundAddress,
      collectedFunds: "0",
      ...(msg.metadata !== undefined ? { metadata: msg.metadata } : {}),
    };

    store.saveProposal(proposal);
    store.saveProposalSeq(id);
    return proposal;
  }

  get(store: PoolStore, id: number): Proposal {
    const proposal = store.loadProposal(id);
    if (proposal === undefined) {
      throw new FundingError("PROPOSAL_NOT_FOUND", `Proposal ${String(id)} not found`);
    }
    return proposal;
  }

  list(store: PoolStore): readonly Proposal[] {
    return store.listProposals();
  }
}
