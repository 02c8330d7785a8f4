/**
 * Runtime Type Guards
 *
 * Narrowing functions for verification domain types.
 * Used at system boundaries (ledger responses, stored batch contents,
 * API inputs).
 */

import type { BatchDescriptor, BatchLeaf, MerkleProof, StorageRef } from "./batch.js";
import type { Digest, OperationKind } from "./record.js";
import { OPERATION_KINDS } from "./record.js";

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;
const OPERATIONS = new Set<string>(OPERATION_KINDS);

export function isDigest(value: unknown): value is Digest {
  return typeof value === "string" && DIGEST_PATTERN.test(value);
}

export function isOperationKind(value: unknown): value is OperationKind {
  return typeof value === "string" && OPERATIONS.has(value);
}

export function isStorageRef(value: unknown): value is StorageRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.bucket === "string" &&
    v.bucket.length > 0 &&
    typeof v.key === "string" &&
    v.key.length > 0 &&
    typeof v.region === "string"
  );
}

export function isMerkleProof(value: unknown): value is MerkleProof {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.leafIndex === "number" &&
    Number.isInteger(v.leafIndex) &&
    v.leafIndex >= 0 &&
    Array.isArray(v.siblings) &&
    v.siblings.every((step: unknown) => {
      if (step === null || typeof step !== "object") return false;
      const s = step as Record<string, unknown>;
      return isDigest(s.hash) && (s.direction === "left" || s.direction === "right");
    })
  );
}

export function isBatchLeaf(value: unknown): value is BatchLeaf {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isDigest(v.digest) && isMerkleProof(v.proof);
}

export function isBatchDescriptor(value: unknown): value is BatchDescriptor {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.batchId === "string" &&
    isDigest(v.merkleRoot) &&
    typeof v.createdAt === "string" &&
    !Number.isNaN(Date.parse(v.createdAt)) &&
    typeof v.databaseName === "string" &&
    Array.isArray(v.tableNames) &&
    v.tableNames.every((t: unknown) => typeof t === "string") &&
    typeof v.transactionCount === "number" &&
    Number.isInteger(v.transactionCount) &&
    v.transactionCount >= 0 &&
    isStorageRef(v.storageRef)
  );
}
