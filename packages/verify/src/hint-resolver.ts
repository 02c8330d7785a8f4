/**
 * @ledgerproof/verify — Hint Resolver.
 *
 * Validates caller hints and reduces them to a search constraint.
 *
 * Rules:
 * - A batch identifier short-circuits to a direct lookup; every other
 *   hint is kept as advisory
 * - Timestamps must carry `Z` or an explicit offset
 * - Either side of the time window may be open; when both are given
 *   start must precede end
 * - Every malformed field is reported, not only the first
 */

import { InvalidHintError, isOperationKind } from "@ledgerproof/types";
import type { HintIssue, OperationKind, VerificationHint } from "@ledgerproof/types";

/**
 * Normalised hints. Times are canonical ISO 8601 UTC strings.
 */
export interface ConstraintFields {
  readonly databaseName?: string | undefined;
  readonly tableName?: string | undefined;
  readonly timeStart?: string | undefined;
  readonly timeEnd?: string | undefined;
  readonly expectedOperation?: OperationKind | undefined;
}

export interface DirectConstraint {
  readonly kind: "direct";
  readonly batchId: string;
  /** Hints that accompany the identifier; reported on conflict, never filtered on */
  readonly advisory: ConstraintFields;
}

export interface ScanConstraint extends ConstraintFields {
  readonly kind: "scan";
  /** No field was set */
  readonly unconstrained: boolean;
}

export type ResolvedConstraint = DirectConstraint | ScanConstraint;

export const BATCH_ID_PATTERN = /^BATCH-(\d{4})-(\d{2})-(\d{2})-[A-Za-z0-9]+$/;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Whether an identifier has the batch identifier shape and embeds a
 * real calendar date.
 */
export function isBatchId(value: string): boolean {
  const match = BATCH_ID_PATTERN.exec(value);
  if (match === null) return false;
  return isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Parse an offset-qualified ISO 8601 timestamp.
 * @returns Epoch milliseconds, or null when malformed or naive
 */
export function parseTimestamp(value: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (match === null) return null;
  const [, y, mo, d, h, mi, s] = match;
  if (!isCalendarDate(Number(y), Number(mo), Number(d))) return null;
  if (Number(h) > 23 || Number(mi) > 59 || Number(s ?? "0") > 59) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function nonEmpty(
  field: keyof VerificationHint,
  value: string | undefined,
  issues: HintIssue[],
): string | undefined {
  if (value === undefined) return undefined;
  if (value.trim().length === 0) {
    issues.push({ field, message: "must not be empty" });
    return undefined;
  }
  return value;
}

/**
 * Resolve raw hints into a constraint.
 *
 * @throws InvalidHintError listing every offending field
 */
export function resolveHint(raw: VerificationHint = {}): ResolvedConstraint {
  const issues: HintIssue[] = [];

  const batchId = nonEmpty("batchId", raw.batchId, issues);
  if (batchId !== undefined && !isBatchId(batchId)) {
    issues.push({
      field: "batchId",
      message: `expected BATCH-YYYY-MM-DD-<suffix> with a valid date, got "${batchId}"`,
    });
  }

  const databaseName = nonEmpty("databaseName", raw.databaseName, issues);
  const tableName = nonEmpty("tableName", raw.tableName, issues);

  let expectedOperation: OperationKind | undefined;
  const operation = nonEmpty("expectedOperation", raw.expectedOperation, issues);
  if (operation !== undefined) {
    if (isOperationKind(operation)) {
      expectedOperation = operation;
    } else {
      issues.push({
        field: "expectedOperation",
        message: `expected one of INSERT, UPDATE, DELETE, got "${operation}"`,
      });
    }
  }

  const start = resolveTime("timeStart", raw.timeStart, issues);
  const end = resolveTime("timeEnd", raw.timeEnd, issues);
  if (start !== undefined && end !== undefined && start >= end) {
    issues.push({ field: "timeStart", message: "must be earlier than timeEnd" });
  }

  if (issues.length > 0) {
    throw new InvalidHintError(issues);
  }

  const fields: ConstraintFields = {
    databaseName,
    tableName,
    timeStart: start !== undefined ? new Date(start).toISOString() : undefined,
    timeEnd: end !== undefined ? new Date(end).toISOString() : undefined,
    expectedOperation,
  };

  if (batchId !== undefined) {
    return { kind: "direct", batchId, advisory: fields };
  }

  const unconstrained = Object.values(fields).every((v) => v === undefined);
  return { kind: "scan", ...fields, unconstrained };
}

function resolveTime(
  field: "timeStart" | "timeEnd",
  value: string | undefined,
  issues: HintIssue[],
): number | undefined {
  const text = nonEmpty(field, value, issues);
  if (text === undefined) return undefined;
  const ms = parseTimestamp(text);
  if (ms === null) {
    issues.push({
      field,
      message: `expected ISO 8601 timestamp with Z or UTC offset, got "${text}"`,
    });
    return undefined;
  }
  return ms;
}

/** Expected operation of a constraint, wherever it sits. */
export function constraintOperation(constraint: ResolvedConstraint): OperationKind | undefined {
  return constraint.kind === "direct"
    ? constraint.advisory.expectedOperation
    : constraint.expectedOperation;
}
