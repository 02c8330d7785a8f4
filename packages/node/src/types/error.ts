/**
 * API error codes, their HTTP statuses and the error envelope
 * `{ error: { code, message, details? } }`.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { VerificationErrorCode } from "@ledgerproof/types";

/**
 * Every code the service sends: request-shape failures, the domain
 * error codes, route misses and hidden internal faults.
 */
export type ApiErrorCode = "VALIDATION_ERROR" | VerificationErrorCode | "NOT_FOUND" | "INTERNAL_ERROR";

export const API_ERROR_STATUS: Readonly<Record<ApiErrorCode, ContentfulStatusCode>> = {
  VALIDATION_ERROR: 400,
  INVALID_HINT: 400,
  ENCODING_ERROR: 400,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
  COLLABORATOR_FAILURE: 502,
  RETRY_EXHAUSTED: 503,
  CANCELLED: 504,
};

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}
