/**
 * SDK Integration Tests
 *
 * Wires the MatchpoolClient to a real createApp() Hono instance
 * (in-memory, no HTTP server). Proves the SDK and server agree on
 * paths and payloads across a whole matching round.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { NativeLedger } from "@matchpool/ledger";
import { createApp, deriveEscrowAddress, ManualBlockClock } from "@matchpool/node";
import type { AppInstance } from "@matchpool/node";
import { MatchpoolClient } from "../src/client.js";
import { MatchpoolError } from "../src/types.js";

const DENOM = "ustake";
const ADMIN = "wasm1admin0";
const ALICE = "wasm1alice0";
const BOB = "wasm1bob000";
const FUND = "wasm1fund01";
const LEFTOVER = "wasm1leftover";

// =============================================================================
// Setup
// =============================================================================

let instance: AppInstance;
let clock: ManualBlockClock;
let admin: MatchpoolClient;

/** Routes SDK fetches to the Hono app; no server needed. */
function appFetch(app: AppInstance["app"]): typeof fetch {
  return async (input, init) => app.request(input, init);
}

beforeEach(() => {
  clock = new ManualBlockClock({ chainId: "matchpool-test", height: 1, time: "0" });
  const ledger = new NativeLedger();
  for (const address of [ADMIN, ALICE, BOB]) {
    ledger.credit(address, { denom: DENOM, amount: "1000" });
  }
  instance = createApp({ clock, ledger });

  admin = new MatchpoolClient({
    baseUrl: "http://localhost",
    sender: ADMIN,
    fetchFn: appFetch(instance.app),
    retries: 0,
  });
});

async function createRound(budget: string): Promise<void> {
  await admin.pools.create({
    id: "round-1",
    admin: ADMIN,
    budget: { denom: DENOM, amount: budget },
    leftoverAddress: LEFTOVER,
    proposalPeriod: { atHeight: 5 },
    votingPeriod: { atHeight: 10 },
  });
}

// =============================================================================
// Round lifecycle
// =============================================================================

describe("SDK → Server integration: matching round", () => {
  it("creates a pool and reads it back", async () => {
    await createRound("100");

    const pool = await admin.pools.get("round-1");
    expect(pool.data.escrowAddress).toBe(deriveEscrowAddress("wasm", "round-1"));
    expect(pool.data.config.algorithm.kind).toBe("capital_constrained_liberal_radicalism");
    expect(pool.data.status).toBe("not_distributed");
    expect((await admin.pools.list()).data).toEqual(["round-1"]);
  });

  it("runs proposal, contribution and distribution phases", async () => {
    await createRound("100");
    const alice = admin.withSender(ALICE);
    const bob = admin.withSender(BOB);

    const created = await alice.proposals.create("round-1", {
      title: "Garden",
      description: "Raised beds",
      fundAddress: FUND,
    });
    expect(created.data.proposalId).toBe(1);

    clock.advance(5);
    await alice.contributions.contribute("round-1", 1, { denom: DENOM, amount: "1" });
    const receipt = await bob.contributions.contribute("round-1", 1, { denom: DENOM, amount: "4" });
    expect(receipt.data.collectedFunds).toEqual({ denom: DENOM, amount: "5" });

    // (1 + 2)^2 - 5 = 4, under budget
    const preview = await admin.distribution.preview("round-1");
    expect(preview.data.constrained).toBe(false);
    expect(preview.data.grants[0]?.matched).toBe("4");
    expect(preview.data.leftover).toBe("96");

    clock.advance(5);
    const distributed = await admin.distribution.trigger("round-1");
    expect(distributed.data.transfers).toEqual([
      { toAddress: FUND, coin: { denom: DENOM, amount: "9" } },
      { toAddress: LEFTOVER, coin: { denom: DENOM, amount: "96" } },
    ]);

    expect((await admin.accounts.balance(FUND, DENOM)).data.amount).toBe("9");
    expect((await admin.accounts.balances(LEFTOVER)).data).toEqual([{ denom: DENOM, amount: "96" }]);
    expect((await admin.pools.get("round-1")).data.status).toBe("distributed");
  });

  it("lists contributions by contributor", async () => {
    await createRound("100");
    await admin.proposals.create("round-1", { title: "Garden", description: "", fundAddress: FUND });
    clock.advance(5);
    await admin.withSender(BOB).contributions.contribute("round-1", 1, { denom: DENOM, amount: "2" });
    await admin.withSender(ALICE).contributions.contribute("round-1", 1, { denom: DENOM, amount: "3" });

    const list = await admin.contributions.list("round-1", 1);
    expect(list.data.map((c) => c.contributor)).toEqual([ALICE, BOB]);
  });

  it("reports health", async () => {
    const health = await admin.health();
    expect(health.data.block).toEqual({ chainId: "matchpool-test", height: 1 });
  });
});

// =============================================================================
// Errors
// =============================================================================

describe("SDK → Server integration: errors", () => {
  it("surfaces a missing pool as POOL_NOT_FOUND", async () => {
    await expect(admin.pools.get("missing")).rejects.toMatchObject({
      code: "POOL_NOT_FOUND",
      statusCode: 404,
    });
  });

  it("surfaces validation errors with details", async () => {
    try {
      await admin.proposals.create("round-1", { title: "", description: "", fundAddress: FUND });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MatchpoolError);
      expect(err).toMatchObject({ code: "VALIDATION_ERROR", statusCode: 400 });
    }
  });

  it("rejects distribution by anyone but the admin", async () => {
    await createRound("100");
    clock.advance(10);

    await expect(admin.withSender(ALICE).distribution.trigger("round-1")).rejects.toMatchObject({
      code: "UNAUTHORIZED",
      statusCode: 403,
    });
  });

  it("replays an idempotent contribution instead of voting twice", async () => {
    await createRound("100");
    await admin.proposals.create("round-1", { title: "Garden", description: "", fundAddress: FUND });
    clock.advance(5);
    const alice = admin.withSender(ALICE);

    const first = await alice.contributions.contribute("round-1", 1, { denom: DENOM, amount: "3" }, { idempotencyKey: "a-1" });
    const replay = await alice.contributions.contribute("round-1", 1, { denom: DENOM, amount: "3" }, { idempotencyKey: "a-1" });

    expect(replay.data).toEqual(first.data);
    expect(replay.headers["x-idempotent-replay"]).toBe("true");
    expect((await alice.accounts.balance(ALICE, DENOM)).data.amount).toBe("997");
  });
});
