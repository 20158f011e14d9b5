/**
 * Property-Based Tests for @matchpool/funding
 *
 * 1. Σ matched + leftover == budget for any contributions and budget
 * 2. Unconstrained matches equal their raw values
 * 3. A second contribution to the same proposal is always rejected
 * 4. Collected funds equal the sum of recorded contributions
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { calculateClr, type RawGrant } from "../src/matching.js";
import { ALICE, DENOM, FUND_1, block, coins, createPool, expectFundingError } from "./fixtures.js";

const arbContributions = fc.array(fc.bigInt({ min: 1n, max: 10n ** 12n }), {
  minLength: 0,
  maxLength: 6,
});

const arbGrants = fc
  .array(arbContributions, { minLength: 0, maxLength: 5 })
  .map((sets): RawGrant[] =>
    sets.map((contributions, i) => ({
      proposalId: i + 1,
      fundAddress: FUND_1,
      contributions,
      collectedFunds: contributions.reduce((a, b) => a + b, 0n),
    })),
  );

describe("calculateClr", () => {
  it("conserves the budget exactly", () => {
    fc.assert(
      fc.property(arbGrants, fc.bigInt({ min: 1n, max: 10n ** 15n }), (grants, budget) => {
        const result = calculateClr(grants, { denom: DENOM, amount: budget.toString() });
        const matched = result.grants.reduce((acc, g) => acc + BigInt(g.matched), 0n);

        expect(matched + BigInt(result.leftover)).toBe(budget);
        expect(BigInt(result.leftover) >= 0n).toBe(true);
      }),
    );
  });

  it("never matches more than the raw subsidy", () => {
    fc.assert(
      fc.property(arbGrants, fc.bigInt({ min: 1n, max: 10n ** 15n }), (grants, budget) => {
        const result = calculateClr(grants, { denom: DENOM, amount: budget.toString() });
        for (const g of result.grants) {
          if (result.constrained) {
            expect(BigInt(g.matched) <= BigInt(g.rawMatch)).toBe(true);
          } else {
            expect(g.matched).toBe(g.rawMatch);
          }
        }
      }),
    );
  });
});

describe("contributions", () => {
  it("reject a duplicate for any pair of amounts", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 10n ** 20n }),
        fc.bigInt({ min: 1n, max: 10n ** 20n }),
        (first, second) => {
          const pool = createPool();
          pool.createProposal(ALICE, { title: "t", description: "d", fundAddress: FUND_1 }, block(2));
          pool.contribute(ALICE, 1, coins(first.toString()), block(110));

          expectFundingError(
            () => pool.contribute(ALICE, 1, coins(second.toString()), block(111)),
            "DUPLICATE_CONTRIBUTION",
          );
          expect(pool.getProposal(1).collectedFunds).toBe(first.toString());
        },
      ),
      { numRuns: 50 },
    );
  });

  it("keep collected funds equal to the sum of contributions", () => {
    fc.assert(
      fc.property(
        fc.array(fc.bigInt({ min: 1n, max: 10n ** 18n }), { minLength: 1, maxLength: 8 }),
        (amounts) => {
          const pool = createPool();
          pool.createProposal(ALICE, { title: "t", description: "d", fundAddress: FUND_1 }, block(2));
          amounts.forEach((amount, i) => {
            pool.contribute(`wasm1voter${String(i).padStart(2, "0")}`, 1, coins(amount.toString()), block(110));
          });

          const recorded = pool
            .listContributions(1)
            .reduce((acc, c) => acc + BigInt(c.fund.amount), 0n);
          expect(pool.getProposal(1).collectedFunds).toBe(recorded.toString());
          expect(recorded).toBe(amounts.reduce((a, b) => a + b, 0n));
        },
      ),
      { numRuns: 50 },
    );
  });
});
