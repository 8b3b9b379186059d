/**
 * Request Validation Middleware
 *
 * Validates request bodies, query strings and path parameters against Zod
 * schemas. Failures are thrown as ValidationError carrying a
 * `{ field: reason }` map, so they reach clients through the same error
 * handler as every other failure.
 */

import type { z, ZodError, ZodSchema } from "zod";
import type { MiddlewareHandler } from "hono";
import { ValidationError, type FieldErrors } from "./errors";

/**
 * One reason per field: the first issue reported for each path
 */
export function toFieldErrors(error: ZodError): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const issue of error.issues) {
    const path = issue.path.join(".") || "(root)";
    if (!Object.hasOwn(fieldErrors, path)) {
      fieldErrors[path] = issue.message;
    }
  }
  return fieldErrors;
}

/**
 * Body validation middleware
 * Validates the JSON request body and stores the parsed value
 */
export function validateBody<T extends ZodSchema>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedBody: z.infer<T> } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new ValidationError({ "(root)": "Could not parse JSON" }, "Invalid JSON in request body");
      }
      throw err;
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ValidationError(toFieldErrors(result.error));
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

/**
 * Query parameter validation middleware
 */
export function validateQuery<T extends ZodSchema>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedQuery: z.infer<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      throw new ValidationError(toFieldErrors(result.error), "Invalid query parameters");
    }

    c.set("validatedQuery", result.data);
    await next();
  };
}

/**
 * Path parameter validation middleware
 */
export function validateParams<T extends ZodSchema>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedParams: z.infer<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.param());
    if (!result.success) {
      throw new ValidationError(toFieldErrors(result.error), "Invalid path parameters");
    }

    c.set("validatedParams", result.data);
    await next();
  };
}
