/**
 * Request ID middleware.
 *
 * Propagates a caller-supplied X-Request-Id when it is a plausible
 * token (1-128 chars of [A-Za-z0-9._-]); otherwise generates a UUID.
 * The id is echoed on every response, errors included.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
