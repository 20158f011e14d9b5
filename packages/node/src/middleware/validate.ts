/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` in context variables.
 * On failure, returns 400 with one issue per offending field.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(body)",
    message: issue.message,
  }));
}
