/**
 * MatchingEngine — Capital-Constrained Liberal Radicalism.
 *
 * Pure computation over integers. For each proposal:
 *
 *   raw(p) = (Σ √cᵢ)² − Σ cᵢ = 2 · Σ_{i<j} √(cᵢ · cⱼ)
 *
 * Each pair root is taken at a fixed scale (√(cᵢcⱼ · 10^36) = √(cᵢcⱼ) · 10^18)
 * and the sum is floored once at the end, so a pair whose product is a
 * perfect square contributes exactly. When the raw matches exceed the
 * budget they are scaled by budget / Σ raw with a single floor division
 * per proposal, and every unit lost to flooring falls to the leftover.
 */

import type { Address, Coin } from "@matchpool/types";
import { assertUint128, checkedAdd, isqrt, mulDivFloor, parseUint128 } from "@matchpool/ledger";
import { FundingError, arithmetic } from "./errors.js";
import type { GrantMatch, MatchingAlgorithm, MatchingResult } from "./types.js";

/** Fixed-point scale of a pair root. Applied squared under the root. */
export const SQRT_SCALE = 10n ** 18n;

/** Input to the matcher: one proposal and its contributions. */
export interface RawGrant {
  readonly proposalId: number;
  readonly fundAddress: Address;
  readonly contributions: readonly bigint[];
  readonly collectedFunds: bigint;
}

export type Matcher = (grants: readonly RawGrant[], budget: Coin) => MatchingResult;

// =============================================================================
// Algorithm selection
// =============================================================================

/**
 * Resolve the matcher for a configured algorithm. Unknown kinds are
 * rejected rather than defaulted.
 */
export function resolveMatcher(algorithm: MatchingAlgorithm): Matcher {
  const kind: string = algorithm.kind;
  switch (kind) {
    case "capital_constrained_liberal_radicalism":
      return calculateClr;
    default:
      throw new FundingError("UNSUPPORTED_ALGORITHM", `Unsupported matching algorithm: "${kind}"`);
  }
}

// =============================================================================
// CLR
// =============================================================================

/**
 * Uncapped quadratic subsidy for one set of contributions.
 *
 * rawMatch([100n]) → 0n
 * rawMatch([25n, 25n]) → 50n
 */
export function rawMatch(contributions: readonly bigint[]): bigint {
  // Equal amounts pair up exactly: √(c · c) = c
  const counts = new Map<bigint, bigint>();
  for (const amount of contributions) {
    assertUint128(amount);
    counts.set(amount, (counts.get(amount) ?? 0n) + 1n);
  }

  const groups = [...counts.entries()];
  let scaledPairRoots = 0n;
  for (let i = 0; i < groups.length; i++) {
    const [a, m] = groups[i] ?? [0n, 0n];
    scaledPairRoots += ((m * (m - 1n)) / 2n) * a * SQRT_SCALE;
    for (let j = i + 1; j < groups.length; j++) {
      const [b, n] = groups[j] ?? [0n, 0n];
      scaledPairRoots += m * n * isqrt(a * b * SQRT_SCALE * SQRT_SCALE);
    }
  }

  return (2n * scaledPairRoots) / SQRT_SCALE;
}

export function calculateClr(grants: readonly RawGrant[], budget: Coin): MatchingResult {
  return arithmetic(() => {
    const budgetAmount = parseUint128(budget.amount);

    const raws = grants.map((grant) => {
      assertUint128(grant.collectedFunds);
      return rawMatch(grant.contributions);
    });
    const totalRaw = raws.reduce((acc, raw) => acc + raw, 0n);
    const constrained = totalRaw > budgetAmount;

    let distributed = 0n;
    const matches: GrantMatch[] = grants.map((grant, i) => {
      const raw = raws[i] ?? 0n;
      const matched = constrained ? mulDivFloor(raw, budgetAmount, totalRaw) : raw;
      distributed += matched;
      return {
        proposalId: grant.proposalId,
        fundAddress: grant.fundAddress,
        collectedFunds: grant.collectedFunds.toString(),
        rawMatch: raw.toString(),
        matched: matched.toString(),
        payout: checkedAdd(matched, grant.collectedFunds).toString(),
      };
    });

    const leftover = budgetAmount - distributed;
    assertBudgetConserved(budgetAmount, distributed, leftover);

    return {
      algorithm: "capital_constrained_liberal_radicalism",
      budget: { denom: budget.denom, amount: budgetAmount.toString() },
      totalRaw: totalRaw.toString(),
      constrained,
      grants: matches,
      leftover: leftover.toString(),
    };
  });
}

function assertBudgetConserved(budget: bigint, distributed: bigint, leftover: bigint): void {
  if (leftover < 0n || distributed + leftover !== budget) {
    throw new FundingError(
      "OVERFLOW",
      `Matching distributed ${distributed.toString()} of a ${budget.toString()} budget`,
    );
  }
}
