/**
 * @matchpool/funding
 *
 * Quadratic-funding matching pool.
 *
 * Lifecycle:
 * - Instantiate with a budget and two periods
 * - Create proposals during the proposal period
 * - Contribute once per proposal during the voting period
 * - After voting closes, the admin triggers a single CLR distribution
 */

export type {
  MatchingAlgorithm,
  MatchingAlgorithmKind,
  PoolConfig,
  InstantiateMsg,
  CreateProposalMsg,
  Proposal,
  Contribution,
  DistributionStatus,
  GrantMatch,
  MatchingResult,
  EventAttribute,
  PoolResponse,
  PoolState,
  PoolSnapshot,
} from "./types.js";

export {
  FundingError,
  ERROR_CATEGORY,
  arithmetic,
} from "./errors.js";
export type { FundingErrorCode, FundingErrorCategory } from "./errors.js";

export { createAddressValidator } from "./address.js";
export type { AddressValidator } from "./address.js";

export { isExpired, describeExpiration, assertOrderedPeriods } from "./expiration.js";

export { InMemoryPoolStore } from "./store.js";
export type { PoolStore } from "./store.js";

export { ConfigStore } from "./config-store.js";
export { ProposalLedger } from "./proposals.js";
export { ContributionLedger } from "./contributions.js";

export { SQRT_SCALE, rawMatch, calculateClr, resolveMatcher } from "./matching.js";
export type { RawGrant, Matcher } from "./matching.js";

export { DistributionDispatcher } from "./distribution.js";
export type { DistributionOutcome } from "./distribution.js";

export { QuadraticFundingPool } from "./pool.js";
export type { PoolOptions } from "./pool.js";
