/**
 * @matchpool/sdk — Typed HTTP client for a matchpool node.
 *
 * @packageDocumentation
 */

// Types
export type {
  MatchpoolClientConfig,
  MatchpoolResponse,
  RequestOptions,
} from "./types.js";

export { MatchpoolError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Client
export {
  MatchpoolClient,
  PoolsNamespace,
  ProposalsNamespace,
  ContributionsNamespace,
  DistributionNamespace,
  AccountsNamespace,
} from "./client.js";

export type {
  DistributionStatus,
  MatchingAlgorithm,
  PoolConfig,
  Pool,
  CreatePoolParams,
  CreateProposalParams,
  Proposal,
  Contribution,
  EventAttribute,
  GrantMatch,
  MatchingResult,
  ProposalCreated,
  ContributionReceipt,
  DistributionReceipt,
  HealthStatus,
} from "./client.js";
