/**
 * Transaction Record Types
 *
 * A single database change as captured by the recording pipeline.
 *
 * Rules:
 * - Records are immutable once constructed
 * - Identity is the canonical digest, never an assigned ID
 * - Column order carries no meaning
 */

/**
 * Database operation that produced the record.
 */
export type OperationKind = "INSERT" | "UPDATE" | "DELETE";

/**
 * All supported operation kinds, in declaration order.
 */
export const OPERATION_KINDS: readonly OperationKind[] = ["INSERT", "UPDATE", "DELETE"];

/**
 * A typed column value.
 *
 * Integers are `number` (safe integers) or `bigint`; any other finite
 * number is a float. `Date` is a timestamp.
 */
export type ColumnValue = null | boolean | number | bigint | string | Date;

/**
 * A database transaction record.
 */
export interface TransactionRecord {
  /** Source database name */
  readonly databaseName: string;

  /** Source table name */
  readonly tableName: string;

  /** Operation that produced this row image */
  readonly operation: OperationKind;

  /** Column name → value */
  readonly columns: Readonly<Record<string, ColumnValue>>;

  /**
   * Client-side timestamp (ISO 8601). Informational only; the ledger's
   * batch timestamp is authoritative and this field is not hashed.
   */
  readonly localTimestamp?: string | undefined;
}

/**
 * SHA-256 digest as 64 lowercase hex characters.
 */
export type Digest = string;
