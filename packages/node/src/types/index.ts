/**
 * Type barrel — re-exports all public types from @matchpool/node.
 */

// DTOs
export {
  CoinSchema,
  FundsSchema,
  ExpirationSchema,
  AlgorithmSchema,
  CreatePoolSchema,
  CreateProposalSchema,
  ContributeSchema,
  ProposalIdSchema,
} from "./dto.js";
export type {
  CreatePoolDto,
  CreateProposalDto,
  ContributeDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
