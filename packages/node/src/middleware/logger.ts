/**
 * Request logging middleware.
 *
 * Emits one entry per request to the supplied sink (pino in main.ts).
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SENDER_HEADER } from "./sender.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** X-Sender of the request, when present. */
  readonly sender?: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const sender = c.req.header(SENDER_HEADER);
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(sender !== undefined ? { sender } : {}),
    });
  };
}
