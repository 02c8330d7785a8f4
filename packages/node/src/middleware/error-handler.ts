/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Request errors map to 400; collaborator failures that escape a
 * verdict (batch lookups, listings) map to 502/503/504. Anything else
 * is a 500 whose details stay in the server log.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import {
  EncodingError,
  InvalidHintError,
  VerificationError,
} from "@ledgerproof/types";
import { API_ERROR_STATUS, createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode, ErrorEnvelope } from "../types/error.js";
import { RequestValidationError } from "./validate.js";

// =============================================================================
// Error → Envelope
// =============================================================================

function envelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): { status: ContentfulStatusCode; envelope: ErrorEnvelope } {
  return { status: API_ERROR_STATUS[code], envelope: createErrorEnvelope(code, message, details) };
}

function toEnvelope(err: Error): { status: ContentfulStatusCode; envelope: ErrorEnvelope } {
  if (err instanceof RequestValidationError || err instanceof InvalidHintError) {
    return envelope(err.code, err.message, { issues: err.issues });
  }
  if (err instanceof EncodingError) {
    return envelope(err.code, err.message, { column: err.column });
  }
  if (err instanceof VerificationError) {
    return envelope(err.code, err.message);
  }
  return envelope("INTERNAL_ERROR", "Internal server error");
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const { status, envelope: body } = toEnvelope(err);
  return c.json(body, status);
}

/**
 * 404 for unmatched routes, in the same envelope.
 */
export function handleNotFound(c: Context): Response {
  const { status, envelope: body } = envelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`);
  return c.json(body, status);
}
