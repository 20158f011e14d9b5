/**
 * @matchpool/sdk — SDK types.
 *
 * Types specific to the SDK client layer.
 * Coin and chain primitives are imported from @matchpool/types.
 */

// =============================================================================
// Client Configuration
// =============================================================================

export interface MatchpoolClientConfig {
  /** Base URL of the node API (e.g., "http://localhost:3000") */
  readonly baseUrl: string;
  /** Address sent as X-Sender on every request */
  readonly sender?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

/**
 * Per-request options.
 *
 * A POST is only retried when it carries an idempotency key; without
 * one a retried contribution could be applied twice.
 */
export interface RequestOptions {
  readonly idempotencyKey?: string | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

export interface MatchpoolResponse<T> {
  /** Response payload, unwrapped from the `data` envelope */
  readonly data: T;
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the node API, or a transport failure.
 *
 * `statusCode` is 0 for timeouts and network errors.
 */
export class MatchpoolError extends Error {
  /** Error code from the API (e.g., "DUPLICATE_CONTRIBUTION", "VALIDATION_ERROR") */
  readonly code: string;
  readonly statusCode: number;
  /** Additional error details (validation issues, etc.) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "MatchpoolError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
