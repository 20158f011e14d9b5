/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation. Address syntax
 * and fund rules are checked by the pool itself, not here.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const CoinSchema = z.object({
  denom: z.string().min(1).max(128),
  amount: z.string().regex(/^(0|[1-9]\d*)$/, "must be a non-negative integer string"),
});

export const FundsSchema = z.array(CoinSchema).max(16);

export const ExpirationSchema = z.union([
  z.object({ atHeight: z.number().int().min(0) }).strict(),
  z.object({ atTime: z.string().regex(/^(0|[1-9]\d*)$/, "must be nanoseconds since epoch") }).strict(),
  z.object({ never: z.literal(true) }).strict(),
]);

export const AlgorithmSchema = z.object({
  kind: z.literal("capital_constrained_liberal_radicalism"),
  parameter: z.string().optional(),
});

// =============================================================================
// Pool DTOs
// =============================================================================

export const CreatePoolSchema = z.object({
  id: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]{0,63}$/, "must be lowercase alphanumerics and dashes"),
  admin: z.string().min(1),
  budget: CoinSchema,
  leftoverAddress: z.string().min(1),
  proposalPeriod: ExpirationSchema,
  votingPeriod: ExpirationSchema,
  createProposalWhitelist: z.array(z.string()).optional(),
  voteProposalWhitelist: z.array(z.string()).optional(),
  algorithm: AlgorithmSchema,
  funds: FundsSchema,
});

export type CreatePoolDto = z.infer<typeof CreatePoolSchema>;

export const CreateProposalSchema = z.object({
  title: z.string().min(1).max(256),
  description: z.string().max(4096),
  metadata: z
    .string()
    .regex(/^[A-Za-z0-9+/]*={0,2}$/, "must be base64")
    .optional(),
  fundAddress: z.string().min(1),
});

export type CreateProposalDto = z.infer<typeof CreateProposalSchema>;

export const ContributeSchema = z.object({
  funds: FundsSchema,
});

export type ContributeDto = z.infer<typeof ContributeSchema>;

// =============================================================================
// Path Params
// =============================================================================

export const ProposalIdSchema = z.coerce.number().int().min(1).max(Number.MAX_SAFE_INTEGER);
