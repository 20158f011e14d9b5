/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (FundingError, LedgerError, RegistryError)
 * to HTTP status codes by their `code`.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

interface DomainError extends Error {
  readonly code: string;
}

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Funding: authorization
  UNAUTHORIZED: 403,

  // Funding: period violations
  PROPOSAL_PERIOD_EXPIRED: 409,
  VOTING_PERIOD_EXPIRED: 409,
  VOTING_PERIOD_NOT_EXPIRED: 409,

  // Funding: validation
  INVALID_ADDRESS: 400,
  WRONG_DENOMINATION: 400,
  ZERO_AMOUNT: 400,
  BUDGET_MISMATCH: 400,
  INVALID_PERIOD: 400,
  UNSUPPORTED_ALGORITHM: 400,
  INVALID_SNAPSHOT: 400,

  // Funding: not found / conflict
  PROPOSAL_NOT_FOUND: 404,
  NOT_INITIALIZED: 404,
  DUPLICATE_CONTRIBUTION: 409,
  ALREADY_DISTRIBUTED: 409,
  ALREADY_INITIALIZED: 409,

  // Funding + ledger: arithmetic
  OVERFLOW: 422,

  // Ledger errors
  INVALID_AMOUNT: 400,
  INVALID_COIN: 400,
  EMPTY_BATCH: 400,
  INSUFFICIENT_FUNDS: 422,

  // Registry errors
  POOL_NOT_FOUND: 404,
  POOL_EXISTS: 409,
};

function isDomainError(err: Error): err is DomainError {
  return "code" in err && typeof err.code === "string";
}

function getStatusCode(error: DomainError): ErrorStatus {
  return STATUS_MAP[error.code] ?? 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: formatZodErrors(err),
      }),
      400,
    );
  }

  if (!isDomainError(err)) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const status = getStatusCode(err);

  // Don't leak internal details for unmapped errors
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(err.code, err.message), status);
}
