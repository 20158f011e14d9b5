/**
 * Shared fixtures for @matchpool/funding tests.
 */

import { expect } from "vitest";
import type { BlockInfo, Coin } from "@matchpool/types";
import { FundingError, type FundingErrorCode } from "../src/errors.js";
import { QuadraticFundingPool } from "../src/pool.js";
import type { InstantiateMsg } from "../src/types.js";

export const DENOM = "ustake";

export const ADMIN = "wasm1admin0";
export const LEFTOVER = "wasm1leftover";
export const ALICE = "wasm1alice0";
export const BOB = "wasm1bob000";
export const CAROL = "wasm1carol0";
export const DAVE = "wasm1dave00";
export const FUND_1 = "wasm1fund01";
export const FUND_2 = "wasm1fund02";

/** Proposal period ends at height 100, voting at height 200. */
export const PROPOSAL_END = 100;
export const VOTING_END = 200;

export function block(height: number): BlockInfo {
  return {
    chainId: "matchpool-test",
    height,
    time: `${String(1_700_000_000 + height * 5)}000000000`,
  };
}

export function coins(amount: string, denom: string = DENOM): Coin[] {
  return [{ denom, amount }];
}

export function instantiateMsg(overrides: Partial<InstantiateMsg> = {}): InstantiateMsg {
  return {
    admin: ADMIN,
    budget: { denom: DENOM, amount: "1000" },
    leftoverAddress: LEFTOVER,
    proposalPeriod: { atHeight: PROPOSAL_END },
    votingPeriod: { atHeight: VOTING_END },
    algorithm: { kind: "capital_constrained_liberal_radicalism" },
    ...overrides,
  };
}

/**
 * A pool instantiated at height 1 with the given config overrides.
 */
export function createPool(overrides: Partial<InstantiateMsg> = {}): QuadraticFundingPool {
  const pool = new QuadraticFundingPool();
  const msg = instantiateMsg(overrides);
  pool.instantiate(ADMIN, msg, [msg.budget], block(1));
  return pool;
}

/**
 * Assert that `fn` throws a FundingError carrying `code`.
 */
export function expectFundingError(fn: () => unknown, code: FundingErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(FundingError);
  if (caught instanceof FundingError) {
    expect(caught.code).toBe(code);
  }
}
