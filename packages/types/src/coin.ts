/**
 * Coin Types
 *
 * Native-asset primitives shared by the pool core and the ledger.
 *
 * Rules:
 * - Amounts are base-10 integer strings (no sign, no fraction)
 * - Amounts fit in an unsigned 128-bit integer
 * - A coin always names its denomination
 */

/**
 * Denomination of a native asset (e.g., "ujuno", "uatom").
 */
export type Denom = string;

/**
 * Unsigned 128-bit integer carried as a decimal string.
 * Strings keep amounts exact across JSON boundaries.
 */
export type Uint128 = string;

/**
 * An amount of a single denomination.
 */
export interface Coin {
  readonly denom: Denom;
  readonly amount: Uint128;
}

/**
 * A send from the emitting account to `toAddress`.
 * The ledger collaborator applies a batch of these atomically.
 */
export interface TransferInstruction {
  readonly toAddress: string;
  readonly coin: Coin;
}
