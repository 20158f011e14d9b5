/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import { NativeLedger } from "@matchpool/ledger";
import type { AppEnv } from "./types/api-contract.js";
import { PoolRegistry } from "./services/pool-registry.js";
import type { BlockClock } from "./clock.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPoolRoutes } from "./routes/pools.js";
import { createAccountRoutes } from "./routes/accounts.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly clock: BlockClock;
  /** Shared ledger. Default: an empty NativeLedger. */
  readonly ledger?: NativeLedger | undefined;
  /** Address prefix every pool validates against. Default: "wasm" */
  readonly addressPrefix?: string | undefined;
  /** Request log sink */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Pool lifecycle logger */
  readonly logger?: Logger | undefined;
  readonly idempotencyTtlMs?: number | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly registry: PoolRegistry;
  readonly ledger: NativeLedger;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const ledger = options.ledger ?? new NativeLedger();
  const registry = new PoolRegistry({
    ledger,
    clock: options.clock,
    addressPrefix: options.addressPrefix ?? "wasm",
    logger: options.logger,
  });
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(registry, options.clock));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  app.route("/api/v1/pools", createPoolRoutes(registry));
  app.route("/api/v1/accounts", createAccountRoutes(ledger));

  return { app, registry, ledger, idempotencyStore };
}
