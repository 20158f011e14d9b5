/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * API-level error codes. Domain errors pass their own codes through.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
