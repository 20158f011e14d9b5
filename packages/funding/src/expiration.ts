/**
 * Period predicates.
 *
 * A period is open until its expiration is reached: an `atHeight` bound
 * expires at that height, an `atTime` bound at that nanosecond.
 */

import type { BlockInfo, Expiration } from "@matchpool/types";
import { FundingError } from "./errors.js";

export function isExpired(expiration: Expiration, block: BlockInfo): boolean {
  if ("atHeight" in expiration) {
    return block.height >= expiration.atHeight;
  }
  if ("atTime" in expiration) {
    return BigInt(block.time) >= BigInt(expiration.atTime);
  }
  return false;
}

export function describeExpiration(expiration: Expiration): string {
  if ("atHeight" in expiration) {
    return `height ${String(expiration.atHeight)}`;
  }
  if ("atTime" in expiration) {
    return `time ${expiration.atTime}`;
  }
  return "never";
}

/**
 * Assert the voting period does not end before the proposal period.
 *
 * Bounds on different clocks cannot be ordered, and a voting period that
 * never expires would leave the budget undistributable.
 */
export function assertOrderedPeriods(proposal: Expiration, voting: Expiration): void {
  if ("never" in voting) {
    throw new FundingError("INVALID_PERIOD", "Voting period must expire");
  }
  if ("never" in proposal) {
    throw new FundingError(
      "INVALID_PERIOD",
      `Voting period ends at ${describeExpiration(voting)}, before a proposal period that never ends`,
    );
  }

  let ordered: boolean;
  if ("atHeight" in proposal && "atHeight" in voting) {
    ordered = voting.atHeight >= proposal.atHeight;
  } else if ("atTime" in proposal && "atTime" in voting) {
    ordered = BigInt(voting.atTime) >= BigInt(proposal.atTime);
  } else {
    throw new FundingError(
      "INVALID_PERIOD",
      `Cannot order ${describeExpiration(proposal)} against ${describeExpiration(voting)}`,
    );
  }

  if (!ordered) {
    throw new FundingError(
      "INVALID_PERIOD",
      `Voting period ends at ${describeExpiration(voting)}, before the proposal period (${describeExpiration(proposal)})`,
    );
  }
}
