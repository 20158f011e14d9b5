/**
 * End-to-end tests for the pool routes.
 *
 * Drives a whole round over HTTP against the in-process app and checks
 * both the responses and the resulting ledger balances.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { deriveEscrowAddress } from "../src/services/pool-service.js";
import {
  ADMIN,
  ALICE,
  BOB,
  CAROL,
  DAVE,
  DENOM,
  FUND_1,
  FUND_2,
  LEFTOVER,
  createTestApp,
  jsonRequest,
  poolBody,
  postAs,
  type ErrorBody,
  type TestApp,
} from "./setup.js";

const POOLS = "/api/v1/pools";
const ROUND = `${POOLS}/garden-round`;
const ESCROW = deriveEscrowAddress("wasm", "garden-round");

function proposal(fundAddress: string, title: string) {
  return { title, description: `${title} description`, fundAddress };
}

function funds(amount: string) {
  return { funds: [{ denom: DENOM, amount }] };
}

async function balanceOf(t: TestApp, address: string): Promise<string> {
  const res = await t.app.request(jsonRequest(`/api/v1/accounts/${address}/balances/${DENOM}`));
  const body = (await res.json()) as { data: { denom: string; amount: string } };
  return body.data.amount;
}

async function errorOf(res: Response): Promise<ErrorBody["error"]> {
  const body = (await res.json()) as ErrorBody;
  return body.error;
}

// =============================================================================
// Full round
// =============================================================================

describe("matching round", () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  it("runs a constrained round from instantiation to payout", async () => {
    const created = await t.app.request(
      postAs(ADMIN, POOLS, poolBody({
        budget: { denom: DENOM, amount: "60" },
        funds: [{ denom: DENOM, amount: "60" }],
      })),
    );
    expect(created.status).toBe(201);
    const pool = (await created.json()) as {
      data: { id: string; escrowAddress: string; status: string };
    };
    expect(pool.data.id).toBe("garden-round");
    expect(pool.data.escrowAddress).toBe(ESCROW);
    expect(pool.data.status).toBe("not_distributed");
    expect(await balanceOf(t, ESCROW)).toBe("60");
    expect(await balanceOf(t, ADMIN)).toBe("9940");

    const p1 = await t.app.request(postAs(ALICE, `${ROUND}/proposals`, proposal(FUND_1, "Garden")));
    const p2 = await t.app.request(postAs(BOB, `${ROUND}/proposals`, proposal(FUND_2, "Library")));
    expect(p1.status).toBe(201);
    expect(((await p1.json()) as { data: { proposalId: number } }).data.proposalId).toBe(1);
    expect(((await p2.json()) as { data: { proposalId: number } }).data.proposalId).toBe(2);

    // Proposal period over, voting open
    t.clock.advance(10);

    for (const [sender, id, amount] of [
      [ALICE, 1, "16"],
      [BOB, 1, "100"],
      [CAROL, 2, "4"],
      [DAVE, 2, "100"],
    ] as const) {
      const res = await t.app.request(
        postAs(sender, `${ROUND}/proposals/${String(id)}/contributions`, funds(amount)),
      );
      expect(res.status).toBe(200);
    }
    expect(await balanceOf(t, ESCROW)).toBe("280");

    const preview = await t.app.request(jsonRequest(`${ROUND}/distribution/preview`));
    const previewBody = (await preview.json()) as {
      data: { constrained: boolean; grants: { matched: string }[]; leftover: string };
    };
    expect(previewBody.data.constrained).toBe(true);
    expect(previewBody.data.grants.map((g) => g.matched)).toEqual(["40", "20"]);

    // Voting over
    t.clock.advance(10);

    const distributed = await t.app.request(postAs(ADMIN, `${ROUND}/distribution`));
    expect(distributed.status).toBe(200);
    const body = (await distributed.json()) as {
      data: { transfers: { toAddress: string; coin: { amount: string } }[] };
    };
    expect(body.data.transfers).toEqual([
      { toAddress: FUND_1, coin: { denom: DENOM, amount: "156" } },
      { toAddress: FUND_2, coin: { denom: DENOM, amount: "124" } },
      { toAddress: LEFTOVER, coin: { denom: DENOM, amount: "0" } },
    ]);

    expect(await balanceOf(t, FUND_1)).toBe("156");
    expect(await balanceOf(t, FUND_2)).toBe("124");
    expect(await balanceOf(t, LEFTOVER)).toBe("0");
    expect(await balanceOf(t, ESCROW)).toBe("0");

    const view = await t.app.request(jsonRequest(ROUND));
    expect(((await view.json()) as { data: { status: string } }).data.status).toBe("distributed");

    const again = await t.app.request(postAs(ADMIN, `${ROUND}/distribution`));
    expect(again.status).toBe(409);
    expect((await errorOf(again)).code).toBe("ALREADY_DISTRIBUTED");
  });

  it("sends an unmatched budget to the leftover address", async () => {
    await t.app.request(postAs(ADMIN, POOLS, poolBody()));
    await t.app.request(postAs(ALICE, `${ROUND}/proposals`, proposal(FUND_1, "Garden")));
    t.clock.advance(10);
    await t.app.request(postAs(ALICE, `${ROUND}/proposals/1/contributions`, funds("100")));
    t.clock.advance(10);

    await t.app.request(postAs(ADMIN, `${ROUND}/distribution`));

    expect(await balanceOf(t, FUND_1)).toBe("100");
    expect(await balanceOf(t, LEFTOVER)).toBe("1000");
  });
});

// =============================================================================
// Pools
// =============================================================================

describe("POST /api/v1/pools", () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  it("requires X-Sender", async () => {
    const res = await t.app.request(jsonRequest(POOLS, "POST", poolBody()));
    expect(res.status).toBe(401);
    expect((await errorOf(res)).code).toBe("UNAUTHORIZED");
  });

  it("rejects a malformed body", async () => {
    const res = await t.app.request(postAs(ADMIN, POOLS, { ...poolBody(), votingPeriod: { atHeight: -1 } }));
    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("VALIDATION_ERROR");
  });

  it("rejects funds that do not match the budget", async () => {
    const res = await t.app.request(
      postAs(ADMIN, POOLS, poolBody({ funds: [{ denom: DENOM, amount: "999" }] })),
    );
    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("BUDGET_MISMATCH");
  });

  it("rejects addresses under another prefix", async () => {
    const res = await t.app.request(postAs(ADMIN, POOLS, poolBody({ leftoverAddress: "cosmos1leftover" })));
    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("INVALID_ADDRESS");
  });

  it("does not register a pool the admin cannot fund", async () => {
    const res = await t.app.request(
      postAs(ADMIN, POOLS, poolBody({
        budget: { denom: DENOM, amount: "20000" },
        funds: [{ denom: DENOM, amount: "20000" }],
      })),
    );
    expect(res.status).toBe(422);
    expect((await errorOf(res)).code).toBe("INSUFFICIENT_FUNDS");

    const list = await t.app.request(jsonRequest(POOLS));
    expect(((await list.json()) as { data: string[] }).data).toEqual([]);
    expect(await balanceOf(t, ADMIN)).toBe("10000");
  });

  it("rejects a duplicate pool id", async () => {
    await t.app.request(postAs(ADMIN, POOLS, poolBody()));
    const res = await t.app.request(postAs(ADMIN, POOLS, poolBody()));
    expect(res.status).toBe(409);
    expect((await errorOf(res)).code).toBe("POOL_EXISTS");
  });

  it("lists pools in creation order", async () => {
    await t.app.request(postAs(ADMIN, POOLS, poolBody({ id: "round-b" })));
    await t.app.request(postAs(ADMIN, POOLS, poolBody({ id: "round-a" })));

    const res = await t.app.request(jsonRequest(POOLS));
    expect(((await res.json()) as { data: string[] }).data).toEqual(["round-b", "round-a"]);
  });

  it("returns 404 for an unknown pool", async () => {
    const res = await t.app.request(jsonRequest(`${POOLS}/missing`));
    expect(res.status).toBe(404);
    expect((await errorOf(res)).code).toBe("POOL_NOT_FOUND");
  });
});

// =============================================================================
// Proposals & contributions
// =============================================================================

describe("proposals and contributions", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await t.app.request(postAs(ADMIN, POOLS, poolBody()));
    await t.app.request(postAs(ALICE, `${ROUND}/proposals`, proposal(FUND_1, "Garden")));
  });

  it("returns a stored proposal", async () => {
    const res = await t.app.request(jsonRequest(`${ROUND}/proposals/1`));
    expect(res.status).toBe(200);
    expect(((await res.json()) as { data: unknown }).data).toEqual({
      id: 1,
      title: "Garden",
      description: "Garden description",
      fundAddress: FUND_1,
      collectedFunds: "0",
    });
  });

  it("returns 404 for a missing proposal and 400 for a bad id", async () => {
    const missing = await t.app.request(jsonRequest(`${ROUND}/proposals/7`));
    expect(missing.status).toBe(404);
    expect((await errorOf(missing)).code).toBe("PROPOSAL_NOT_FOUND");

    const bad = await t.app.request(jsonRequest(`${ROUND}/proposals/abc`));
    expect(bad.status).toBe(400);
    expect((await errorOf(bad)).code).toBe("VALIDATION_ERROR");
  });

  it("rejects proposals after the proposal period", async () => {
    t.clock.advance(9);
    const res = await t.app.request(postAs(BOB, `${ROUND}/proposals`, proposal(FUND_2, "Late")));
    expect(res.status).toBe(409);
    expect((await errorOf(res)).code).toBe("PROPOSAL_PERIOD_EXPIRED");
  });

  it("returns the collected total and lists contributions", async () => {
    await t.app.request(postAs(BOB, `${ROUND}/proposals/1/contributions`, funds("30")));
    const res = await t.app.request(postAs(ALICE, `${ROUND}/proposals/1/contributions`, funds("12")));

    const body = (await res.json()) as { data: { collectedFunds: { amount: string } } };
    expect(body.data.collectedFunds).toEqual({ denom: DENOM, amount: "42" });

    const list = await t.app.request(jsonRequest(`${ROUND}/proposals/1/contributions`));
    const contributions = (await list.json()) as { data: { contributor: string }[] };
    expect(contributions.data.map((c) => c.contributor)).toEqual([ALICE, BOB]);
  });

  it("rejects a duplicate contribution", async () => {
    await t.app.request(postAs(BOB, `${ROUND}/proposals/1/contributions`, funds("30")));
    const res = await t.app.request(postAs(BOB, `${ROUND}/proposals/1/contributions`, funds("5")));
    expect(res.status).toBe(409);
    expect((await errorOf(res)).code).toBe("DUPLICATE_CONTRIBUTION");
    expect(await balanceOf(t, BOB)).toBe("9970");
  });

  it("leaves the pool untouched when the contributor cannot pay", async () => {
    const res = await t.app.request(
      postAs("wasm1poorvoter", `${ROUND}/proposals/1/contributions`, funds("5")),
    );
    expect(res.status).toBe(422);
    expect((await errorOf(res)).code).toBe("INSUFFICIENT_FUNDS");

    const stored = await t.app.request(jsonRequest(`${ROUND}/proposals/1`));
    expect(((await stored.json()) as { data: { collectedFunds: string } }).data.collectedFunds).toBe("0");

    // The failed call left no contribution behind
    const retry = await t.app.request(postAs(CAROL, `${ROUND}/proposals/1/contributions`, funds("5")));
    expect(retry.status).toBe(200);
  });

  it("rejects funds in the wrong denomination", async () => {
    const res = await t.app.request(
      postAs(BOB, `${ROUND}/proposals/1/contributions`, { funds: [{ denom: "uatom", amount: "5" }] }),
    );
    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("WRONG_DENOMINATION");
  });
});

// =============================================================================
// Distribution
// =============================================================================

describe("POST /api/v1/pools/:poolId/distribution", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await t.app.request(postAs(ADMIN, POOLS, poolBody()));
  });

  it("is admin only", async () => {
    t.clock.advance(19);
    const res = await t.app.request(postAs(ALICE, `${ROUND}/distribution`));
    expect(res.status).toBe(403);
    expect((await errorOf(res)).code).toBe("UNAUTHORIZED");
  });

  it("waits for the voting period to end", async () => {
    t.clock.advance(18);
    const res = await t.app.request(postAs(ADMIN, `${ROUND}/distribution`));
    expect(res.status).toBe(409);
    expect((await errorOf(res)).code).toBe("VOTING_PERIOD_NOT_EXPIRED");
  });
});
