/**
 * Zod-backed request validation.
 *
 * `validateBody` parses the JSON body and `validateQuery` the query string.
 * Either one answers 400 VALIDATION_ERROR with the zod issues when the
 * input does not fit, and otherwise stores the parsed value for the route.
 */

import type { Context, Env, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface ValidatedEnv<T> extends Env {
  Variables: {
    validatedBody: T;
  };
}

export interface ValidatedQueryEnv<T> extends Env {
  Variables: {
    validatedQuery: T;
  };
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map(({ path, message }) => ({ path: path.join("."), message }));
}

function rejectInput(c: Context, message: string, error?: ZodError): Response {
  const details = error === undefined ? undefined : { issues: formatZodErrors(error) };
  return c.json(createErrorEnvelope("VALIDATION_ERROR", message, details), 400);
}

export function validateBody<T>(schema: Schema<T>): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return rejectInput(c, "Invalid JSON in request body");
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return rejectInput(c, "Request body validation failed", parsed.error);
    }
    c.set("validatedBody", parsed.data);
    return next();
  };
}

export function validateQuery<T>(schema: Schema<T>): MiddlewareHandler<ValidatedQueryEnv<T>> {
  return async (c, next) => {
    const parsed = schema.safeParse(c.req.query());
    if (!parsed.success) {
      return rejectInput(c, "Invalid query parameters", parsed.error);
    }
    c.set("validatedQuery", parsed.data);
    return next();
  };
}
