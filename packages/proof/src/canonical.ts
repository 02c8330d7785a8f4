/**
 * @ledgerproof/proof — Canonical record hashing.
 *
 * Serializes a transaction record into a versioned, order-independent
 * form and hashes it.
 *
 * Encoding (version 1):
 * - Columns sorted by name (UTF-16 code unit order)
 * - Every value carries a type tag: null, bool, int, float, str, ts
 * - Integers (safe or not, number or bigint) are decimal strings
 * - Timestamps are ISO 8601 UTC strings
 * - The envelope is serialized with RFC 8785 (JCS) and hashed with SHA-256
 *
 * `localTimestamp` is not part of the encoding.
 */

import { canonicalize } from "json-canonicalize";
import { EncodingError } from "@ledgerproof/types";
import type { ColumnValue, Digest, TransactionRecord } from "@ledgerproof/types";
import { sha256 } from "./digest.js";

/** Version of the canonical encoding. */
export const CANONICAL_ENCODING_VERSION = 1;

type TaggedValue =
  | { readonly t: "null" }
  | { readonly t: "bool"; readonly v: boolean }
  | { readonly t: "int"; readonly v: string }
  | { readonly t: "float"; readonly v: string }
  | { readonly t: "str"; readonly v: string }
  | { readonly t: "ts"; readonly v: string };

/**
 * Attach an explicit type tag to a column value.
 *
 * @throws EncodingError for non-finite numbers, invalid dates and
 *   unsupported types (objects, arrays, undefined, symbols, functions)
 */
export function tagValue(column: string, value: ColumnValue): TaggedValue {
  if (value === null) {
    return { t: "null" };
  }
  if (typeof value === "boolean") {
    return { t: "bool", v: value };
  }
  if (typeof value === "bigint") {
    return { t: "int", v: value.toString() };
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new EncodingError(column, `non-finite number ${String(value)}`);
    }
    if (Number.isInteger(value)) {
      return { t: "int", v: BigInt(value).toString() };
    }
    return { t: "float", v: String(value) };
  }
  if (typeof value === "string") {
    return { t: "str", v: value };
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new EncodingError(column, "invalid date");
    }
    return { t: "ts", v: value.toISOString() };
  }
  const kind: string = Array.isArray(value) ? "array" : typeof value;
  throw new EncodingError(column, `unsupported type ${kind}`);
}

/**
 * Canonical string form of a record.
 */
export function encodeRecord(record: TransactionRecord): string {
  const columns = Object.keys(record.columns)
    .sort()
    .map((name): [string, TaggedValue] => {
      const value = record.columns[name];
      // A declared-but-undefined column is as unsupported as any other type
      if (value === undefined) {
        throw new EncodingError(name, "unsupported type undefined");
      }
      return [name, tagValue(name, value)];
    });

  return canonicalize({
    v: CANONICAL_ENCODING_VERSION,
    db: record.databaseName,
    table: record.tableName,
    op: record.operation,
    columns,
  });
}

/**
 * Content digest of a record: SHA-256 of its canonical encoding.
 */
export function digestRecord(record: TransactionRecord): Digest {
  return sha256(encodeRecord(record));
}
