/**
 * @matchpool/sdk — Matchpool Client.
 *
 * Typed methods for every node endpoint, grouped by namespace:
 * client.pools, client.proposals, client.contributions,
 * client.distribution, client.accounts.
 */

import type { Address, Coin, Expiration, TransferInstruction, Uint128 } from "@matchpool/types";
import type { MatchpoolClientConfig, MatchpoolResponse, RequestOptions } from "./types.js";
import { HttpClient } from "./http-client.js";

// =============================================================================
// Domain Types (SDK-side; mirror the server responses)
// =============================================================================

export type DistributionStatus = "not_distributed" | "distributed";

export interface MatchingAlgorithm {
  readonly kind: "capital_constrained_liberal_radicalism";
  readonly parameter?: string | undefined;
}

export interface PoolConfig {
  readonly admin: Address;
  readonly budget: Coin;
  readonly leftoverAddress: Address;
  readonly proposalPeriod: Expiration;
  readonly votingPeriod: Expiration;
  readonly createProposalWhitelist?: readonly Address[] | undefined;
  readonly voteProposalWhitelist?: readonly Address[] | undefined;
  readonly algorithm: MatchingAlgorithm;
}

export interface Pool {
  readonly id: string;
  readonly escrowAddress: Address;
  readonly config: PoolConfig;
  readonly status: DistributionStatus;
}

/**
 * Pool creation parameters. `algorithm` defaults to CLR and `funds`
 * to exactly the budget.
 */
export interface CreatePoolParams {
  readonly id: string;
  readonly admin: Address;
  readonly budget: Coin;
  readonly leftoverAddress: Address;
  readonly proposalPeriod: Expiration;
  readonly votingPeriod: Expiration;
  readonly createProposalWhitelist?: readonly Address[] | undefined;
  readonly voteProposalWhitelist?: readonly Address[] | undefined;
  readonly algorithm?: MatchingAlgorithm | undefined;
  readonly funds?: readonly Coin[] | undefined;
}

export interface CreateProposalParams {
  readonly title: string;
  readonly description: string;
  /** Base64 blob */
  readonly metadata?: string | undefined;
  readonly fundAddress: Address;
}

export interface Proposal {
  readonly id: number;
  readonly title: string;
  readonly description: string;
  readonly metadata?: string | undefined;
  readonly fundAddress: Address;
  readonly collectedFunds: Uint128;
}

export interface Contribution {
  readonly proposalId: number;
  readonly contributor: Address;
  readonly fund: Coin;
}

export interface EventAttribute {
  readonly key: string;
  readonly value: string;
}

export interface GrantMatch {
  readonly proposalId: number;
  readonly fundAddress: Address;
  readonly collectedFunds: Uint128;
  readonly rawMatch: string;
  readonly matched: Uint128;
  readonly payout: Uint128;
}

export interface MatchingResult {
  readonly algorithm: MatchingAlgorithm["kind"];
  readonly budget: Coin;
  readonly totalRaw: string;
  readonly constrained: boolean;
  readonly grants: readonly GrantMatch[];
  readonly leftover: Uint128;
}

export interface ProposalCreated {
  readonly proposalId: number;
  readonly attributes: readonly EventAttribute[];
}

export interface ContributionReceipt {
  /** The proposal's new collected total */
  readonly collectedFunds: Coin;
  readonly attributes: readonly EventAttribute[];
}

export interface DistributionReceipt {
  readonly result: MatchingResult;
  readonly transfers: readonly TransferInstruction[];
  readonly attributes: readonly EventAttribute[];
}

export interface HealthStatus {
  readonly status: string;
  readonly pools: number;
  readonly block: { readonly chainId: string; readonly height: number };
  readonly timestamp: string;
}

function poolPath(poolId: string): string {
  return `/api/v1/pools/${encodeURIComponent(poolId)}`;
}

function proposalPath(poolId: string, proposalId: number): string {
  return `${poolPath(poolId)}/proposals/${String(proposalId)}`;
}

// =============================================================================
// Namespace Classes
// =============================================================================

export class PoolsNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Instantiate a pool. The sender pays the budget into the pool escrow.
   */
  async create(params: CreatePoolParams, options?: RequestOptions): Promise<MatchpoolResponse<Pool>> {
    const body = {
      ...params,
      algorithm: params.algorithm ?? { kind: "capital_constrained_liberal_radicalism" },
      funds: params.funds ?? [params.budget],
    };
    return this.http.post<Pool>("/api/v1/pools", body, options);
  }

  async list(): Promise<MatchpoolResponse<readonly string[]>> {
    return this.http.get<readonly string[]>("/api/v1/pools");
  }

  async get(poolId: string): Promise<MatchpoolResponse<Pool>> {
    return this.http.get<Pool>(poolPath(poolId));
  }
}

export class ProposalsNamespace {
  constructor(private readonly http: HttpClient) {}

  async create(
    poolId: string,
    params: CreateProposalParams,
    options?: RequestOptions,
  ): Promise<MatchpoolResponse<ProposalCreated>> {
    return this.http.post<ProposalCreated>(`${poolPath(poolId)}/proposals`, params, options);
  }

  async list(poolId: string): Promise<MatchpoolResponse<readonly Proposal[]>> {
    return this.http.get<readonly Proposal[]>(`${poolPath(poolId)}/proposals`);
  }

  async get(poolId: string, proposalId: number): Promise<MatchpoolResponse<Proposal>> {
    return this.http.get<Proposal>(proposalPath(poolId, proposalId));
  }
}

export class ContributionsNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Contribute `fund` to a proposal. Each address contributes to a
   * proposal at most once.
   */
  async contribute(
    poolId: string,
    proposalId: number,
    fund: Coin,
    options?: RequestOptions,
  ): Promise<MatchpoolResponse<ContributionReceipt>> {
    return this.http.post<ContributionReceipt>(
      `${proposalPath(poolId, proposalId)}/contributions`,
      { funds: [fund] },
      options,
    );
  }

  /** Contributions to one proposal, ordered by contributor address. */
  async list(poolId: string, proposalId: number): Promise<MatchpoolResponse<readonly Contribution[]>> {
    return this.http.get<readonly Contribution[]>(`${proposalPath(poolId, proposalId)}/contributions`);
  }
}

export class DistributionNamespace {
  constructor(private readonly http: HttpClient) {}

  /** Matching outcome if distribution ran now. Moves nothing. */
  async preview(poolId: string): Promise<MatchpoolResponse<MatchingResult>> {
    return this.http.get<MatchingResult>(`${poolPath(poolId)}/distribution/preview`);
  }

  async trigger(poolId: string, options?: RequestOptions): Promise<MatchpoolResponse<DistributionReceipt>> {
    return this.http.post<DistributionReceipt>(`${poolPath(poolId)}/distribution`, {}, options);
  }
}

export class AccountsNamespace {
  constructor(private readonly http: HttpClient) {}

  async balances(address: Address): Promise<MatchpoolResponse<readonly Coin[]>> {
    return this.http.get<readonly Coin[]>(`/api/v1/accounts/${encodeURIComponent(address)}/balances`);
  }

  async balance(address: Address, denom: string): Promise<MatchpoolResponse<Coin>> {
    return this.http.get<Coin>(
      `/api/v1/accounts/${encodeURIComponent(address)}/balances/${encodeURIComponent(denom)}`,
    );
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Matchpool SDK client.
 *
 * Usage:
 * ```typescript
 * const admin = new MatchpoolClient({ baseUrl: "http://localhost:3000", sender: "wasm1admin0" });
 *
 * await admin.pools.create({
 *   id: "spring-round",
 *   admin: "wasm1admin0",
 *   budget: { denom: "ustake", amount: "1000" },
 *   leftoverAddress: "wasm1treasury",
 *   proposalPeriod: { atHeight: 100 },
 *   votingPeriod: { atHeight: 200 },
 * });
 *
 * const voter = admin.withSender("wasm1alice0");
 * await voter.contributions.contribute("spring-round", 1, { denom: "ustake", amount: "25" });
 * ```
 */
export class MatchpoolClient {
  readonly pools: PoolsNamespace;
  readonly proposals: ProposalsNamespace;
  readonly contributions: ContributionsNamespace;
  readonly distribution: DistributionNamespace;
  readonly accounts: AccountsNamespace;

  private readonly config: MatchpoolClientConfig;
  private readonly http: HttpClient;

  constructor(config: MatchpoolClientConfig) {
    this.config = config;
    this.http = new HttpClient(config);
    this.pools = new PoolsNamespace(this.http);
    this.proposals = new ProposalsNamespace(this.http);
    this.contributions = new ContributionsNamespace(this.http);
    this.distribution = new DistributionNamespace(this.http);
    this.accounts = new AccountsNamespace(this.http);
  }

  /** A client with the same settings acting as another address. */
  withSender(sender: Address): MatchpoolClient {
    return new MatchpoolClient({ ...this.config, sender });
  }

  async health(): Promise<MatchpoolResponse<HealthStatus>> {
    return this.http.get<HealthStatus>("/health");
  }
}
