/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { PoolRegistry } from "../services/pool-registry.js";
import type { BlockClock } from "../clock.js";

export function createHealthRoutes(
  registry: PoolRegistry,
  clock: BlockClock,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const block = clock.current();
    return c.json({
      status: "ok",
      pools: registry.poolIds().length,
      block: { chainId: block.chainId, height: block.height },
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
