/**
 * @ledgerproof/proof — Merkle Tree.
 *
 * Binary hash tree over record digests, and the verifier that checks an
 * inclusion proof against a ledger-anchored root.
 *
 * Design:
 * - Caller provides pre-hashed leaves (64-char hex SHA-256)
 * - Internal nodes: SHA-256(left || right) — concatenation of hex strings
 * - Odd node count at a level: the last node is paired with itself
 * - Empty tree: null root
 * - Single leaf: leaf IS the root (no internal nodes)
 */

import { isMerkleProof, isDigest } from "@ledgerproof/types";
import type { Digest, MerkleProof, MerkleProofStep } from "@ledgerproof/types";
import { digestsEqual, hashPair } from "./digest.js";

/**
 * Compute the next level up from a level of node hashes.
 */
function parentLevel(level: readonly Digest[]): Digest[] {
  const next: Digest[] = [];
  for (let i = 0; i < level.length; i += 2) {
    const left = level[i];
    if (left === undefined) break;
    const right = level[i + 1] ?? left;
    next.push(hashPair(left, right));
  }
  return next;
}

/**
 * Immutable Merkle tree built from pre-hashed leaves.
 *
 * Usage:
 * ```ts
 * const tree = MerkleTree.build(["aabb...", "ccdd...", ...]);
 * const root = tree.getRoot();          // root hash or null
 * const proof = tree.getProof(0);       // inclusion proof for leaf 0
 * verifyMerkleProof(leaf, proof, root); // true/false
 * ```
 */
export class MerkleTree {
  /** levels[0] are the leaves, the last level holds the root */
  private readonly levels: readonly (readonly Digest[])[];

  private constructor(leaves: readonly Digest[]) {
    const levels: Digest[][] = [[...leaves]];
    let current: Digest[] = [...leaves];
    while (current.length > 1) {
      current = parentLevel(current);
      levels.push(current);
    }
    this.levels = levels;
  }

  /**
   * Build a Merkle tree from pre-hashed leaf values.
   *
   * @throws Error if any leaf is not a 64-char lowercase hex digest
   */
  static build(leaves: readonly Digest[]): MerkleTree {
    const bad = leaves.findIndex((leaf) => !isDigest(leaf));
    if (bad !== -1) {
      throw new Error(`MerkleTree: leaf ${bad} is not a SHA-256 hex digest`);
    }
    return new MerkleTree(leaves);
  }

  /**
   * Root hash of the tree, or null for an empty tree.
   */
  getRoot(): Digest | null {
    const top = this.levels[this.levels.length - 1];
    return top?.length === 1 ? (top[0] ?? null) : null;
  }

  getLeafCount(): number {
    return this.levels[0]?.length ?? 0;
  }

  getLeaves(): readonly Digest[] {
    return this.levels[0] ?? [];
  }

  /**
   * Generate an inclusion proof for the leaf at the given index.
   *
   * @returns MerkleProof or null if index is out of range or tree is empty
   */
  getProof(leafIndex: number): MerkleProof | null {
    if (
      !Number.isInteger(leafIndex) ||
      leafIndex < 0 ||
      leafIndex >= this.getLeafCount()
    ) {
      return null;
    }

    const siblings: MerkleProofStep[] = [];
    let index = leafIndex;

    // Every level except the root contributes one sibling
    for (const level of this.levels.slice(0, -1)) {
      const isLeft = index % 2 === 0;
      const siblingIndex = isLeft ? index + 1 : index - 1;
      const sibling = level[siblingIndex] ?? level[index];
      if (sibling === undefined) {
        return null;
      }
      siblings.push({ hash: sibling, direction: isLeft ? "right" : "left" });
      index = Math.floor(index / 2);
    }

    return { leafIndex, siblings };
  }
}

/**
 * Verify that `leafDigest` is included under `expectedRoot`.
 *
 * Walks the path leaf → root and compares the result with the expected
 * root in constant time. Returns false, never throws, for malformed
 * input: non-digest leaf, root or sibling; negative or fractional index;
 * an empty path with a nonzero index; an index beyond the path's
 * capacity; or a sibling direction that contradicts the index bit at
 * that level.
 */
export function verifyMerkleProof(
  leafDigest: string,
  proof: MerkleProof,
  expectedRoot: string,
): boolean {
  if (!isDigest(leafDigest) || !isDigest(expectedRoot) || !isMerkleProof(proof)) {
    return false;
  }

  const depth = proof.siblings.length;
  if (proof.leafIndex >= 2 ** depth) {
    return false;
  }

  let current = leafDigest;
  let index = proof.leafIndex;

  for (const step of proof.siblings) {
    const expectedDirection = index % 2 === 0 ? "right" : "left";
    if (step.direction !== expectedDirection) {
      return false;
    }
    current =
      step.direction === "left"
        ? hashPair(step.hash, current)
        : hashPair(current, step.hash);
    index = Math.floor(index / 2);
  }

  return digestsEqual(current, expectedRoot);
}
