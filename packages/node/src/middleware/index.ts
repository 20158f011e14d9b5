/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { senderMiddleware, SENDER_HEADER } from "./sender.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
