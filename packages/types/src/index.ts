/**
 * @matchpool/types — Shared domain types for the matchpool stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts travel as integer strings; arithmetic lives in @matchpool/ledger
 */

// Coin types
export type {
  Coin,
  Denom,
  Uint128,
  TransferInstruction,
} from "./coin.js";

// Chain types
export type {
  Address,
  BlockInfo,
  ChainId,
  Expiration,
} from "./chain.js";

// Runtime type guards
export {
  isUintString,
  isCoin,
  isExpiration,
} from "./guards.js";
