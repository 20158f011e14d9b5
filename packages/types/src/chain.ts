/**
 * Chain Types
 *
 * Block context and expiration predicates used for period gating.
 *
 * Rules:
 * - Heights are non-negative integers
 * - Times are nanoseconds since the Unix epoch, as decimal strings
 * - An expiration compares against one clock only (height or time)
 */

/**
 * Account address. Syntax is checked by an injected validator,
 * never by the type.
 */
export type Address = string;

/**
 * Chain identifier (e.g., "matchpool-local").
 */
export type ChainId = string;

/**
 * The current block, as seen by the operation being executed.
 */
export interface BlockInfo {
  readonly chainId: ChainId;
  readonly height: number;
  /** Nanoseconds since epoch */
  readonly time: string;
}

/**
 * End of a window. A window is open until its expiration is reached.
 */
export type Expiration =
  | { readonly atHeight: number }
  | { readonly atTime: string }
  | { readonly never: true };
