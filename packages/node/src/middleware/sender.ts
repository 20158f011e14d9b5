/**
 * Sender middleware.
 *
 * The caller's address travels in the X-Sender header. Mutations
 * (POST) require it; reads do not. Whether the address is well-formed
 * or allowed to act is decided by the pool.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const SENDER_HEADER = "X-Sender";

export function senderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const sender = c.req.header(SENDER_HEADER)?.trim();
    if (sender === undefined || sender === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing ${SENDER_HEADER} header`),
        401,
      );
    }

    c.set("sender", sender);
    return next();
  };
}
