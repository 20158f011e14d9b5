/**
 * @matchpool/ledger — Native-asset ledger and deterministic coin math.
 *
 * A pure TypeScript ledger with zero runtime dependencies:
 * - Per-address, per-denom balances
 * - Atomic transfer batches (all or nothing)
 * - All arithmetic uses bigint, range-checked to Uint128
 * - Exact integer square root and floor scaling for matching math
 */

// Core ledger
export { NativeLedger } from "./native-ledger.js";

// Coin arithmetic
export {
  UINT128_MAX,
  parseUint128,
  assertUint128,
  checkedAdd,
  checkedSub,
  isqrt,
  mulDivFloor,
  validateCoin,
} from "./coin-math.js";

// Types
export type {
  Transfer,
  BatchOptions,
  BatchRecord,
  BatchResult,
  BalanceLine,
  LedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
