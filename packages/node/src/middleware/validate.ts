/**
 * Zod request parsing.
 *
 * Parses the JSON body or query string against a schema and returns the
 * typed result. Failures throw RequestValidationError, which the error
 * handler renders as 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodTypeAny, output } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestValidationError } from "../types/error.js";
import type { ValidationIssue } from "../types/error.js";

function formatZodErrors(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parse the JSON request body. An empty body is treated as `{}`.
 */
export async function parseBody<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<output<S>> {
  const text = await c.req.text();
  let body: unknown = {};
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      throw new RequestValidationError("Invalid JSON in request body");
    }
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(
      "Request body validation failed",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}

export function parseQuery<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): output<S> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError(
      "Invalid query parameters",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}
