/**
 * Funding errors.
 *
 * Every failure aborts the enclosing transaction. Codes are grouped into
 * the categories callers branch on (HTTP status, retry decisions).
 */

import { LedgerError } from "@matchpool/ledger";

export type FundingErrorCode =
  | "UNAUTHORIZED"
  | "PROPOSAL_PERIOD_EXPIRED"
  | "VOTING_PERIOD_EXPIRED"
  | "VOTING_PERIOD_NOT_EXPIRED"
  | "INVALID_ADDRESS"
  | "WRONG_DENOMINATION"
  | "ZERO_AMOUNT"
  | "BUDGET_MISMATCH"
  | "INVALID_AMOUNT"
  | "INVALID_PERIOD"
  | "UNSUPPORTED_ALGORITHM"
  | "INVALID_SNAPSHOT"
  | "PROPOSAL_NOT_FOUND"
  | "NOT_INITIALIZED"
  | "DUPLICATE_CONTRIBUTION"
  | "ALREADY_DISTRIBUTED"
  | "ALREADY_INITIALIZED"
  | "OVERFLOW";

export type FundingErrorCategory =
  | "Unauthorized"
  | "PeriodViolation"
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "ArithmeticError";

export const ERROR_CATEGORY: Readonly<Record<FundingErrorCode, FundingErrorCategory>> = {
  UNAUTHORIZED: "Unauthorized",
  PROPOSAL_PERIOD_EXPIRED: "PeriodViolation",
  VOTING_PERIOD_EXPIRED: "PeriodViolation",
  VOTING_PERIOD_NOT_EXPIRED: "PeriodViolation",
  INVALID_ADDRESS: "ValidationError",
  WRONG_DENOMINATION: "ValidationError",
  ZERO_AMOUNT: "ValidationError",
  BUDGET_MISMATCH: "ValidationError",
  INVALID_AMOUNT: "ValidationError",
  INVALID_PERIOD: "ValidationError",
  UNSUPPORTED_ALGORITHM: "ValidationError",
  INVALID_SNAPSHOT: "ValidationError",
  PROPOSAL_NOT_FOUND: "NotFoundError",
  NOT_INITIALIZED: "NotFoundError",
  DUPLICATE_CONTRIBUTION: "ConflictError",
  ALREADY_DISTRIBUTED: "ConflictError",
  ALREADY_INITIALIZED: "ConflictError",
  OVERFLOW: "ArithmeticError",
} as const;

export class FundingError extends Error {
  public readonly code: FundingErrorCode;
  constructor(code: FundingErrorCode, message: string) {
    super(message);
    this.name = "FundingError";
    this.code = code;
  }

  get category(): FundingErrorCategory {
    return ERROR_CATEGORY[this.code];
  }
}

/**
 * Run coin arithmetic, surfacing ledger math failures as funding errors.
 * Range failures become OVERFLOW; malformed amounts become INVALID_AMOUNT.
 */
export function arithmetic<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof LedgerError) {
      const code: FundingErrorCode = err.code === "OVERFLOW" ? "OVERFLOW" : "INVALID_AMOUNT";
      throw new FundingError(code, err.message);
    }
    throw err;
  }
}
