/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

/**
 * Hono environment type for the Matchpool app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Caller address from X-Sender (set by sender middleware on POST) */
    sender: string;

    /** Parsed request body (set by validateBody) */
    validatedBody: unknown;
  };
}
