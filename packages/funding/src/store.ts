/**
 * Pool storage.
 *
 * Explicit keyed storage for one pool: the config singleton, the
 * proposal-id sequence, proposals by id, contributions by
 * (proposalId, contributor), and the distribution status. Handlers
 * receive the store as an argument; nothing is held in ambient state.
 */

import type { Address } from "@matchpool/types";
import type {
  Contribution,
  DistributionStatus,
  PoolConfig,
  PoolState,
  Proposal,
} from "./types.js";

export interface PoolStore {
  loadConfig(): PoolConfig | undefined;
  saveConfig(config: PoolConfig): void;

  loadProposalSeq(): number;
  saveProposalSeq(seq: number): void;

  loadProposal(id: number): Proposal | undefined;
  saveProposal(proposal: Proposal): void;
  /** All proposals, ascending by id. */
  listProposals(): readonly Proposal[];

  loadContribution(proposalId: number, contributor: Address): Contribution | undefined;
  saveContribution(contribution: Contribution): void;
  /** Contributions to one proposal, ascending by contributor. */
  listContributions(proposalId: number): readonly Contribution[];

  loadStatus(): DistributionStatus;
  saveStatus(status: DistributionStatus): void;

  /**
   * Run `fn` as one transaction: every write it makes commits, or, if it
   * throws, none does. Transactions nest.
   */
  transaction<T>(fn: (tx: PoolStore) => T): T;

  exportState(): PoolState;
}

function compareAddresses(a: Address, b: Address): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * In-memory pool store.
 *
 * A transaction captures the current state before running and restores
 * it if the body throws. Suitable for tests, short-lived processes and
 * hosts that persist through snapshots.
 */
export class InMemoryPoolStore implements PoolStore {
  private _config: PoolConfig | undefined;
  private _proposalSeq = 0;
  private _proposals = new Map<number, Proposal>();
  private _contributions = new Map<number, Map<Address, Contribution>>();
  private _status: DistributionStatus = "not_distributed";

  static fromState(state: PoolState): InMemoryPoolStore {
    const store = new InMemoryPoolStore();
    store._restore(state);
    return store;
  }

  // ─── Config ─────────────────────────────────────────────────────────

  loadConfig(): PoolConfig | undefined {
    return this._config;
  }

  saveConfig(config: PoolConfig): void {
    this._config = config;
  }

  // ─── Proposals ──────────────────────────────────────────────────────

  loadProposalSeq(): number {
    return this._proposalSeq;
  }

  saveProposalSeq(seq: number): void {
    this._proposalSeq = seq;
  }

  loadProposal(id: number): Proposal | undefined {
    return this._proposals.get(id);
  }

  saveProposal(proposal: Proposal): void {
    this._proposals.set(proposal.id, proposal);
  }

  listProposals(): readonly Proposal[] {
    return [...this._proposals.values()].sort((a, b) => a.id - b.id);
  }

  // ─── Contributions ──────────────────────────────────────────────────

  loadContribution(proposalId: number, contributor: Address): Contribution | undefined {
    return this._contributions.get(proposalId)?.get(contributor);
  }

  saveContribution(contribution: Contribution): void {
    let byContributor = this._contributions.get(contribution.proposalId);
    if (byContributor === undefined) {
      byContributor = new Map();
      this._contributions.set(contribution.proposalId, byContributor);
    }
    byContributor.set(contribution.contributor, contribution);
  }

  listContributions(proposalId: number): readonly Contribution[] {
    const byContributor = this._contributions.get(proposalId);
    if (byContributor === undefined) {
      return [];
    }
    return [...byContributor.values()].sort((a, b) =>
      compareAddresses(a.contributor, b.contributor),
    );
  }

  // ─── Status ─────────────────────────────────────────────────────────

  loadStatus(): DistributionStatus {
    return this._status;
  }

  saveStatus(status: DistributionStatus): void {
    this._status = status;
  }

  // ─── Transactions ───────────────────────────────────────────────────

  transaction<T>(fn: (tx: PoolStore) => T): T {
    const before = this.exportState();
    try {
      return fn(this);
    } catch (err) {
      this._restore(before);
      throw err;
    }
  }

  exportState(): PoolState {
    const contributions: Contribution[] = [];
    for (const proposal of this.listProposals()) {
      contributions.push(...this.listContributions(proposal.id));
    }
    return {
      ...(this._config !== undefined ? { config: this._config } : {}),
      proposalSeq: this._proposalSeq,
      proposals: this.listProposals(),
      contributions,
      status: this._status,
    };
  }

  private _restore(state: PoolState): void {
    this._config = state.config;
    this._proposalSeq = state.proposalSeq;
    this._proposals = new Map(state.proposals.map((p) => [p.id, p]));
    this._contributions = new Map();
    for (const contribution of state.contributions) {
      this.saveContribution(contribution);
    }
    this._status = state.status;
  }
}
