/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by (X-Sender, Idempotency-Key).
 * A retried mutation carrying the same key within the TTL replays the
 * cached response instead of moving funds a second time.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SENDER_HEADER } from "./sender.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
  /** Clock that stamps `cachedAt`. */
  now(): number;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._isExpired(entry, this._now())) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  /** Stores the response and drops every entry past the TTL. */
  set(key: string, response: CachedResponse): void {
    const now = this._now();
    for (const [cachedKey, entry] of this._cache) {
      if (this._isExpired(entry, now)) {
        this._cache.delete(cachedKey);
      }
    }
    this._cache.set(key, response);
  }

  now(): number {
    return this._now();
  }

  get size(): number {
    return this._cache.size;
  }

  private _isExpired(entry: CachedResponse, now: number): boolean {
    return now - entry.cachedAt > this._ttlMs;
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    // Keys are per caller; two senders may reuse the same key
    const cacheKey = `${c.req.header(SENDER_HEADER) ?? ""}\u0000${c.req.path}\u0000${idempotencyKey}`;

    const cached = store.get(cacheKey);
    if (cached !== undefined) {
      return new Response(cached.body, {
        status: cached.status,
        headers: { ...cached.headers, [REPLAY_HEADER]: "true" },
      });
    }

    await next();

    if (c.res.status < 400) {
      const clonedRes = c.res.clone();
      const body = await clonedRes.text();
      const headers: Record<string, string> = {};
      clonedRes.headers.forEach((value, key) => {
        headers[key] = value;
      });

      store.set(cacheKey, {
        status: clonedRes.status,
        body,
        headers,
        cachedAt: store.now(),
      });
    }
  };
}
