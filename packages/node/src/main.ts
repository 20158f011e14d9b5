/**
 * @matchpool/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, credits genesis balances,
 * starts the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { NativeLedger } from "@matchpool/ledger";
import { loadConfig, parseGenesisBalances } from "./config.js";
import { createApp } from "./app.js";
import { SystemBlockClock } from "./clock.js";

// =============================================================================
// Bootstrap
// =============================================================================

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const ledger = new NativeLedger();
  const genesis = parseGenesisBalances(config.GENESIS_BALANCES);
  for (const { address, denom, amount } of genesis) {
    ledger.credit(address, { denom, amount });
  }
  if (genesis.length > 0) {
    logger.info({ accounts: genesis.length }, "Genesis balances credited");
  }

  const clock = new SystemBlockClock({
    chainId: config.CHAIN_ID,
    blockTimeMs: config.BLOCK_TIME_MS,
  });

  const { app } = createApp({
    clock,
    ledger,
    addressPrefix: config.ADDRESS_PREFIX,
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, chainId: config.CHAIN_ID },
    "Matchpool node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
