/**
 * @ledgerproof/ledger-client — Retry with exponential backoff.
 *
 * Policy object wrapped around ledger and storage calls. Transient
 * failures are retried; permanent ones and cancellations surface at once.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

import {
  CollaboratorError,
  RetryExhaustedError,
  VerificationError,
  isCancellation,
  throwIfAborted,
} from "@ledgerproof/types";
import { sleep } from "./signals.js";

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 250 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 5000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 100 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  jitterMs: 100,
};

/**
 * Details of a failed attempt that is about to be retried.
 */
export interface RetryAttempt {
  /** 1-based number of the attempt that failed */
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: unknown;
}

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 */
export function computeDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/**
 * Default retry predicate.
 *
 * Transient: CollaboratorError flagged transient, socket-level error
 * codes. Everything else (cancellation, domain errors, unknown errors)
 * is permanent.
 */
export function isTransientError(err: unknown): boolean {
  if (isCancellation(err)) return false;
  if (err instanceof CollaboratorError) return err.transient;
  if (err instanceof VerificationError) return false;
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return TRANSIENT_CODES.has(err.code);
  }
  return false;
}

/**
 * Execute a function with retry on failure.
 *
 * @param fn - The async function to execute
 * @param config - Retry configuration
 * @param shouldRetry - Predicate to determine if an error is retryable
 * @param sleepFn - Sleep function (injectable for testing)
 * @param signal - Aborts between attempts and during backoff
 * @param onRetry - Called before each backoff sleep
 * @returns The result of the function
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = isTransientError,
  sleepFn: (ms: number, signal?: AbortSignal) => Promise<void> = sleep,
  signal?: AbortSignal,
  onRetry?: (attempt: RetryAttempt) => void,
  random: () => number = Math.random,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (signal?.aborted === true || !shouldRetry(err)) {
        throw err;
      }

      // If this was the last attempt, skip the sleep and throw
      if (attempt < config.maxAttempts - 1) {
        const delayMs = computeDelay(attempt, config, random);
        onRetry?.({ attempt: attempt + 1, delayMs, error: err });
        await sleepFn(delayMs, signal);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

export interface RetryPolicyOptions {
  readonly config?: RetryConfig;
  readonly shouldRetry?: (err: unknown) => boolean;
  readonly sleepFn?: (ms: number, signal?: AbortSignal) => Promise<void>;
  readonly random?: () => number;
  readonly onRetry?: (attempt: RetryAttempt) => void;
}

/**
 * Reusable retry policy: one instance is shared by the ledger and the
 * storage client wrappers.
 */
export class RetryPolicy {
  readonly config: RetryConfig;
  private readonly shouldRetry: (err: unknown) => boolean;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly onRetry: ((attempt: RetryAttempt) => void) | undefined;

  constructor(options: RetryPolicyOptions = {}) {
    this.config = options.config ?? DEFAULT_RETRY_CONFIG;
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new Error(`RetryPolicy: maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
    }
    this.shouldRetry = options.shouldRetry ?? isTransientError;
    this.sleepFn = options.sleepFn ?? sleep;
    this.random = options.random ?? Math.random;
    this.onRetry = options.onRetry;
  }

  execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(fn, this.config, this.shouldRetry, this.sleepFn, signal, this.onRetry, this.random);
  }
}
