/**
 * Merkle Tree Tests
 *
 * Verifies:
 * - Build from various leaf counts (0, 1, 2, 3, 4, 7, 8, 1000)
 * - Proof generation + verification for each leaf
 * - Tampered leaf, sibling or root fails
 * - Malformed proofs fail closed
 * - Deterministic (same leaves → same root)
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import type { MerkleProof } from "@ledgerproof/types";
import { MerkleTree, verifyMerkleProof } from "../src/merkle-tree.js";

// =============================================================================
// Helpers
// =============================================================================

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

/** Generate N distinct leaf hashes */
function makeLeaves(count: number): string[] {
  return Array.from({ length: count }, (_, i) => sha256(`leaf-${i}`));
}

function rootOf(tree: MerkleTree): string {
  const root = tree.getRoot();
  if (root === null) throw new Error("empty tree");
  return root;
}

function proofAt(tree: MerkleTree, index: number): MerkleProof {
  const proof = tree.getProof(index);
  if (proof === null) throw new Error(`no proof for ${index}`);
  return proof;
}

function leafAt(leaves: readonly string[], index: number): string {
  const leaf = leaves[index];
  if (leaf === undefined) throw new Error(`no leaf ${index}`);
  return leaf;
}

// =============================================================================
// Construction
// =============================================================================

describe("MerkleTree construction", () => {
  it("empty tree has null root", () => {
    const tree = MerkleTree.build([]);
    expect(tree.getRoot()).toBeNull();
    expect(tree.getLeafCount()).toBe(0);
  });

  it("single leaf — leaf IS the root", () => {
    const leaf = sha256("only-one");
    const tree = MerkleTree.build([leaf]);

    expect(tree.getRoot()).toBe(leaf);
    expect(tree.getLeafCount()).toBe(1);
  });

  it("two leaves — root is hash of pair", () => {
    const leaves = makeLeaves(2);
    const tree = MerkleTree.build(leaves);

    expect(tree.getRoot()).toBe(sha256(leafAt(leaves, 0) + leafAt(leaves, 1)));
  });

  it("three leaves — odd count handled by duplication", () => {
    const leaves = makeLeaves(3);
    const tree = MerkleTree.build(leaves);

    // H(H(L0,L1), H(L2,L2))
    const h01 = sha256(leafAt(leaves, 0) + leafAt(leaves, 1));
    const h22 = sha256(leafAt(leaves, 2) + leafAt(leaves, 2));
    expect(tree.getRoot()).toBe(sha256(h01 + h22));
  });

  it("four leaves — perfect binary tree", () => {
    const leaves = makeLeaves(4);
    const tree = MerkleTree.build(leaves);

    const h01 = sha256(leafAt(leaves, 0) + leafAt(leaves, 1));
    const h23 = sha256(leafAt(leaves, 2) + leafAt(leaves, 3));
    expect(tree.getRoot()).toBe(sha256(h01 + h23));
  });

  it("1000 leaves — large tree", () => {
    const tree = MerkleTree.build(makeLeaves(1000));
    expect(rootOf(tree)).toHaveLength(64);
    expect(tree.getLeafCount()).toBe(1000);
  });

  it("rejects leaves that are not digests", () => {
    expect(() => MerkleTree.build([sha256("a"), "not-a-digest"])).toThrow(
      "leaf 1 is not a SHA-256 hex digest",
    );
  });
});

// =============================================================================
// Determinism
// =============================================================================

describe("MerkleTree determinism", () => {
  it("same leaves produce same root", () => {
    const leaves = makeLeaves(10);
    expect(MerkleTree.build(leaves).getRoot()).toBe(MerkleTree.build(leaves).getRoot());
  });

  it("root changes when any single leaf changes", () => {
    const leaves = makeLeaves(8);
    const originalRoot = MerkleTree.build(leaves).getRoot();

    for (let i = 0; i < leaves.length; i++) {
      const modified = [...leaves];
      modified[i] = sha256(`tampered-${i}`);
      expect(MerkleTree.build(modified).getRoot()).not.toBe(originalRoot);
    }
  });

  it("leaf order matters", () => {
    const leaves = makeLeaves(4);
    const reversed = [...leaves].reverse();
    expect(MerkleTree.build(leaves).getRoot()).not.toBe(MerkleTree.build(reversed).getRoot());
  });
});

// =============================================================================
// Proof Generation
// =============================================================================

describe("MerkleTree proof generation", () => {
  it("returns null for empty tree", () => {
    expect(MerkleTree.build([]).getProof(0)).toBeNull();
  });

  it("returns null for out-of-range or fractional index", () => {
    const tree = MerkleTree.build(makeLeaves(5));
    expect(tree.getProof(-1)).toBeNull();
    expect(tree.getProof(5)).toBeNull();
    expect(tree.getProof(1.5)).toBeNull();
  });

  it("single leaf — proof has no siblings", () => {
    const tree = MerkleTree.build([sha256("single")]);
    expect(tree.getProof(0)).toEqual({ leafIndex: 0, siblings: [] });
  });

  it("two leaves — proof has one sibling on the opposite side", () => {
    const leaves = makeLeaves(2);
    const tree = MerkleTree.build(leaves);

    expect(tree.getProof(0)).toEqual({
      leafIndex: 0,
      siblings: [{ hash: leafAt(leaves, 1), direction: "right" }],
    });
    expect(tree.getProof(1)).toEqual({
      leafIndex: 1,
      siblings: [{ hash: leafAt(leaves, 0), direction: "left" }],
    });
  });

  it("last odd leaf is paired with itself", () => {
    const leaves = makeLeaves(3);
    const proof = proofAt(MerkleTree.build(leaves), 2);
    expect(proof.siblings[0]).toEqual({ hash: leafAt(leaves, 2), direction: "right" });
  });

  for (const count of [2, 3, 4, 7, 8]) {
    it(`every leaf of a ${count}-leaf tree verifies`, () => {
      const leaves = makeLeaves(count);
      const tree = MerkleTree.build(leaves);
      const root = rootOf(tree);

      for (let i = 0; i < count; i++) {
        expect(verifyMerkleProof(leafAt(leaves, i), proofAt(tree, i), root)).toBe(true);
      }
    });
  }

  it("spot-checks a 1000-leaf tree", () => {
    const leaves = makeLeaves(1000);
    const tree = MerkleTree.build(leaves);
    const root = rootOf(tree);

    for (const i of [0, 1, 499, 500, 998, 999]) {
      expect(verifyMerkleProof(leafAt(leaves, i), proofAt(tree, i), root)).toBe(true);
    }
  });

  it("proof path length is log2(n) for power-of-2 trees", () => {
    expect(proofAt(MerkleTree.build(makeLeaves(8)), 0).siblings).toHaveLength(3);
    expect(proofAt(MerkleTree.build(makeLeaves(4)), 0).siblings).toHaveLength(2);
    expect(proofAt(MerkleTree.build(makeLeaves(2)), 0).siblings).toHaveLength(1);
  });
});

// =============================================================================
// Proof Verification
// =============================================================================

describe("verifyMerkleProof", () => {
  const leaves = makeLeaves(8);
  const tree = MerkleTree.build(leaves);
  const root = rootOf(tree);
  const proof = proofAt(tree, 3);
  const leaf = leafAt(leaves, 3);

  it("valid proof verifies", () => {
    expect(verifyMerkleProof(leaf, proof, root)).toBe(true);
  });

  it("wrong leaf fails", () => {
    expect(verifyMerkleProof(sha256("tampered"), proof, root)).toBe(false);
  });

  it("another leaf of the same tree fails with this proof", () => {
    expect(verifyMerkleProof(leafAt(leaves, 2), proof, root)).toBe(false);
  });

  it("tampered sibling fails", () => {
    const siblings = proof.siblings.map((s, i) =>
      i === 1 ? { ...s, hash: sha256("tampered-sibling") } : s,
    );
    expect(verifyMerkleProof(leaf, { ...proof, siblings }, root)).toBe(false);
  });

  it("wrong root fails", () => {
    expect(verifyMerkleProof(leaf, proof, sha256("wrong-root"))).toBe(false);
  });

  it("proof from one tree fails against another tree's root", () => {
    const other = MerkleTree.build(makeLeaves(8).map((_, i) => sha256(`other-${i}`)));
    expect(verifyMerkleProof(leaf, proof, rootOf(other))).toBe(false);
  });

  it("swapped sibling direction fails", () => {
    const siblings = proof.siblings.map((s, i) =>
      i === 0 ? { ...s, direction: s.direction === "left" ? ("right" as const) : ("left" as const) } : s,
    );
    expect(verifyMerkleProof(leaf, { ...proof, siblings }, root)).toBe(false);
  });

  it("a correct path under a different leaf index fails", () => {
    expect(verifyMerkleProof(leaf, { ...proof, leafIndex: 7 }, root)).toBe(false);
  });
});

// =============================================================================
// Fail-closed on malformed input
// =============================================================================

describe("verifyMerkleProof on malformed proofs", () => {
  const leaves = makeLeaves(4);
  const tree = MerkleTree.build(leaves);
  const root = rootOf(tree);
  const leaf = leafAt(leaves, 0);
  const proof = proofAt(tree, 0);

  it("empty path with nonzero index fails", () => {
    expect(verifyMerkleProof(leaf, { leafIndex: 1, siblings: [] }, leaf)).toBe(false);
  });

  it("empty path at index 0 verifies only against the leaf itself", () => {
    expect(verifyMerkleProof(leaf, { leafIndex: 0, siblings: [] }, leaf)).toBe(true);
    expect(verifyMerkleProof(leaf, { leafIndex: 0, siblings: [] }, root)).toBe(false);
  });

  it("truncated path fails", () => {
    expect(verifyMerkleProof(leaf, { ...proof, siblings: proof.siblings.slice(0, 1) }, root)).toBe(false);
  });

  it("index beyond path capacity fails", () => {
    expect(verifyMerkleProof(leaf, { ...proof, leafIndex: 4 }, root)).toBe(false);
  });

  it("short sibling digest fails", () => {
    const siblings = proof.siblings.map((s, i) => (i === 0 ? { ...s, hash: s.hash.slice(0, 62) } : s));
    expect(verifyMerkleProof(leaf, { ...proof, siblings }, root)).toBe(false);
  });

  it("negative index fails", () => {
    expect(verifyMerkleProof(leaf, { ...proof, leafIndex: -1 }, root)).toBe(false);
  });

  it("malformed leaf or root fails", () => {
    expect(verifyMerkleProof(leaf.toUpperCase(), proof, root)).toBe(false);
    expect(verifyMerkleProof(leaf, proof, root.slice(2))).toBe(false);
  });
});
