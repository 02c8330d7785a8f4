/**
 * Property-based tests for digests and Merkle proofs.
 *
 * Uses fast-check to verify invariants:
 * 1. Field-value-equal records → identical digests, whatever the key order
 * 2. Honest proofs always verify
 * 3. Flipping one bit of the leaf, any sibling or the root breaks the proof
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { ColumnValue, Digest } from "@ledgerproof/types";
import { digestRecord } from "../src/canonical.js";
import { sha256 } from "../src/digest.js";
import { MerkleTree, verifyMerkleProof } from "../src/merkle-tree.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbColumnValue: fc.Arbitrary<ColumnValue> = fc.oneof(
  fc.constant(null),
  fc.boolean(),
  fc.integer(),
  fc.double({ noNaN: true, noDefaultInfinity: true }),
  fc.string(),
  fc.bigInt(),
);

const arbColumns = fc.uniqueArray(fc.tuple(fc.string({ minLength: 1 }), arbColumnValue), {
  selector: ([name]) => name,
  maxLength: 12,
});

/** Flip one bit of a hex digest. */
function flipBit(digest: Digest, bit: number): Digest {
  const charIndex = Math.floor(bit / 4) % digest.length;
  const nibble = parseInt(digest.charAt(charIndex), 16) ^ (1 << (bit % 4));
  return digest.slice(0, charIndex) + nibble.toString(16) + digest.slice(charIndex + 1);
}

// =============================================================================
// Tests
// =============================================================================

describe("canonical digest properties", () => {
  it("insertion order never changes the digest", () => {
    fc.assert(
      fc.property(arbColumns, fc.func(fc.integer()), (entries, rank) => {
        const shuffled = [...entries].sort((a, b) => rank(a[0]) - rank(b[0]));
        const digestA = digestRecord({
          databaseName: "db",
          tableName: "t",
          operation: "UPDATE",
          columns: Object.fromEntries(entries),
        });
        const digestB = digestRecord({
          databaseName: "db",
          tableName: "t",
          operation: "UPDATE",
          columns: Object.fromEntries(shuffled),
        });
        expect(digestA).toBe(digestB);
      }),
    );
  });
});

describe("Merkle proof properties", () => {
  const arbTree = fc
    .integer({ min: 1, max: 40 })
    .chain((count) =>
      fc.record({
        leaves: fc.constant(Array.from({ length: count }, (_, i) => sha256(`leaf-${count}-${i}`))),
        index: fc.integer({ min: 0, max: count - 1 }),
        bit: fc.integer({ min: 0, max: 255 }),
      }),
    );

  it("honest proofs verify", () => {
    fc.assert(
      fc.property(arbTree, ({ leaves, index }) => {
        const tree = MerkleTree.build(leaves);
        const proof = tree.getProof(index);
        const root = tree.getRoot();
        const leaf = leaves[index];
        expect(proof).not.toBeNull();
        if (proof === null || root === null || leaf === undefined) return;
        expect(verifyMerkleProof(leaf, proof, root)).toBe(true);
      }),
    );
  });

  it("a single flipped bit anywhere fails verification", () => {
    fc.assert(
      fc.property(arbTree, ({ leaves, index, bit }) => {
        const tree = MerkleTree.build(leaves);
        const proof = tree.getProof(index);
        const root = tree.getRoot();
        const leaf = leaves[index];
        if (proof === null || root === null || leaf === undefined) return;

        expect(verifyMerkleProof(flipBit(leaf, bit), proof, root)).toBe(false);
        expect(verifyMerkleProof(leaf, proof, flipBit(root, bit))).toBe(false);

        proof.siblings.forEach((step, level) => {
          const siblings = proof.siblings.map((s, i) =>
            i === level ? { ...s, hash: flipBit(step.hash, bit) } : s,
          );
          expect(verifyMerkleProof(leaf, { ...proof, siblings }, root)).toBe(false);
        });
      }),
    );
  });
});
