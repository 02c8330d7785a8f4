/**
 * @ledgerproof/proof — Cryptographic primitives for batch verification.
 *
 * Canonical record digests, Merkle trees over record digests, and
 * inclusion-proof verification against ledger-anchored roots.
 *
 * @packageDocumentation
 */

// Digests
export { sha256, hashPair, digestsEqual } from "./digest.js";

// Canonical hashing
export {
  CANONICAL_ENCODING_VERSION,
  tagValue,
  encodeRecord,
  digestRecord,
} from "./canonical.js";

// Merkle tree
export { MerkleTree, verifyMerkleProof } from "./merkle-tree.js";
