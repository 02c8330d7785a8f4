/**
 * Zod validation helpers.
 *
 * Parse the JSON body or the query string of a request against a Zod
 * schema. Failures throw RequestValidationError, which the error
 * handler turns into a 400 VALIDATION_ERROR envelope.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    readonly issues: readonly ValidationIssue[] = [],
  ) {
    super(message);
    this.name = "RequestValidationError";
  }
}

/**
 * Validate the JSON request body.
 *
 * @throws RequestValidationError on malformed JSON or a schema mismatch
 */
export async function parseJsonBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err: unknown) {
    throw new RequestValidationError("Invalid JSON in request body", [
      { path: "", message: err instanceof Error ? err.message : String(err) },
    ]);
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError("Request body validation failed", formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Validate the query string.
 *
 * @throws RequestValidationError on a schema mismatch
 */
export function parseQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError("Query validation failed", formatZodErrors(result.error));
  }
  return result.data;
}

function formatZodErrors(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
