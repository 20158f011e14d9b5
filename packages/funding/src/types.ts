/**
 * @matchpool/funding domain types.
 *
 * A matching pool runs through three phases:
 * - Proposal period: proposals are created
 * - Voting period: funded contributions ("votes") are recorded
 * - Distribution: once, after voting closes, the budget is matched
 *   with Capital-Constrained Liberal Radicalism and paid out
 */

import type {
  Address,
  Coin,
  Expiration,
  TransferInstruction,
  Uint128,
} from "@matchpool/types";

// =============================================================================
// Config
// =============================================================================

/**
 * Matching algorithm selector. Only CLR is implemented; the union leaves
 * room for other variants, which must be rejected until they exist.
 */
export type MatchingAlgorithm = {
  readonly kind: "capital_constrained_liberal_radicalism";
  /** Reserved algorithm parameter, carried opaquely. */
  readonly parameter?: string | undefined;
};

export type MatchingAlgorithmKind = MatchingAlgorithm["kind"];

/** Pool configuration. Immutable for the lifetime of the pool. */
export interface PoolConfig {
  readonly admin: Address;
  readonly budget: Coin;
  readonly leftoverAddress: Address;
  readonly proposalPeriod: Expiration;
  readonly votingPeriod: Expiration;
  /** When set, only these addresses may create proposals. */
  readonly createProposalWhitelist?: readonly Address[] | undefined;
  /** When set, only these addresses may contribute. */
  readonly voteProposalWhitelist?: readonly Address[] | undefined;
  readonly algorithm: MatchingAlgorithm;
}

/** The instantiation message declares the config in full. */
export type InstantiateMsg = PoolConfig;

// =============================================================================
// Proposals & contributions
// =============================================================================

export interface CreateProposalMsg {
  readonly title: string;
  readonly description: string;
  /** Opaque blob, base64 encoded. */
  readonly metadata?: string | undefined;
  readonly fundAddress: Address;
}

export interface Proposal {
  readonly id: number;
  readonly title: string;
  readonly description: string;
  readonly metadata?: string | undefined;
  readonly fundAddress: Address;
  /** Sum of all contributions, in the budget denom. */
  readonly collectedFunds: Uint128;
}

/** A recorded contribution, keyed by (proposalId, contributor). */
export interface Contribution {
  readonly proposalId: number;
  readonly contributor: Address;
  readonly fund: Coin;
}

export type DistributionStatus = "not_distributed" | "distributed";

// =============================================================================
// Matching
// =============================================================================

/** Matching outcome for one proposal. */
export interface GrantMatch {
  readonly proposalId: number;
  readonly fundAddress: Address;
  readonly collectedFunds: Uint128;
  /** Uncapped quadratic subsidy; may exceed Uint128. */
  readonly rawMatch: string;
  readonly matched: Uint128;
  /** matched + collectedFunds */
  readonly payout: Uint128;
}

/**
 * The full matching outcome. Σ matched + leftover == budget.amount.
 */
export interface MatchingResult {
  readonly algorithm: MatchingAlgorithmKind;
  readonly budget: Coin;
  readonly totalRaw: string;
  /** True when raw matches exceeded the budget and were scaled down. */
  readonly constrained: boolean;
  readonly grants: readonly GrantMatch[];
  readonly leftover: Uint128;
}

// =============================================================================
// Responses & snapshots
// =============================================================================

export interface EventAttribute {
  readonly key: string;
  readonly value: string;
}

/**
 * Result of an executed operation: its return value, the transfers it
 * asks the ledger to make from the pool escrow, and its event attributes.
 */
export interface PoolResponse<T> {
  readonly value: T;
  readonly transfers: readonly TransferInstruction[];
  readonly attributes: readonly EventAttribute[];
}

/** Complete persisted state of one pool. */
export interface PoolState {
  readonly config?: PoolConfig | undefined;
  readonly proposalSeq: number;
  readonly proposals: readonly Proposal[];
  readonly contributions: readonly Contribution[];
  readonly status: DistributionStatus;
}

export interface PoolSnapshot {
  readonly version: 1;
  readonly state: PoolState;
  readonly asOf: string;
}
