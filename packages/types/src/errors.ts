/**
 * Error taxonomy for the verification stack.
 *
 * Only request-shape problems and collaborator failures are errors.
 * NotFound, Ambiguous and Tampered are verdicts, never thrown.
 */

export type VerificationErrorCode =
  | "INVALID_HINT"
  | "ENCODING_ERROR"
  | "COLLABORATOR_FAILURE"
  | "RETRY_EXHAUSTED"
  | "CANCELLED";

/**
 * Base class of every error thrown by the verification packages.
 */
export class VerificationError extends Error {
  public readonly code: VerificationErrorCode;

  constructor(code: VerificationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VerificationError";
    this.code = code;
  }
}

/**
 * One rejected hint field.
 */
export interface HintIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * A caller-supplied hint is malformed or contradictory. Never retried.
 */
export class InvalidHintError extends VerificationError {
  public readonly issues: readonly HintIssue[];

  constructor(issues: readonly HintIssue[]) {
    super(
      "INVALID_HINT",
      `Invalid hint: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
    );
    this.name = "InvalidHintError";
    this.issues = issues;
  }

  /** Names of the offending fields, in order of detection. */
  get fields(): readonly string[] {
    return this.issues.map((i) => i.field);
  }
}

/**
 * A column value has a type the canonical encoding does not support.
 */
export class EncodingError extends VerificationError {
  public readonly column: string;

  constructor(column: string, detail: string) {
    super("ENCODING_ERROR", `Cannot encode column "${column}": ${detail}`);
    this.name = "EncodingError";
    this.column = column;
  }
}

/**
 * A ledger or storage call failed.
 *
 * `transient` failures (timeouts, resets, 5xx) may succeed on retry;
 * permanent ones (malformed responses, 4xx) never will.
 */
export class CollaboratorError extends VerificationError {
  public readonly transient: boolean;
  public readonly collaborator: "ledger" | "storage";

  constructor(
    collaborator: "ledger" | "storage",
    message: string,
    transient: boolean,
    cause?: unknown,
  ) {
    super("COLLABORATOR_FAILURE", message, { cause });
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    this.transient = transient;
  }
}

/**
 * Every retry attempt of a transient failure was used up.
 */
export class RetryExhaustedError extends VerificationError {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super("RETRY_EXHAUSTED", `All ${attempts} retry attempts exhausted. Last error: ${msg}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
  }
}

/**
 * The operation was aborted by its deadline or by the caller.
 */
export class CancelledError extends VerificationError {
  constructor(message = "cancelled") {
    super("CANCELLED", message);
    this.name = "CancelledError";
  }
}

/**
 * Throw a CancelledError if the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) {
    throw new CancelledError();
  }
}

/**
 * Whether an error represents cancellation, either our own or a
 * platform AbortError/TimeoutError.
 */
export function isCancellation(err: unknown): boolean {
  if (err instanceof CancelledError) return true;
  if (err instanceof Error) {
    return err.name === "AbortError" || err.name === "TimeoutError";
  }
  return false;
}
