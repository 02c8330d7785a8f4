/**
 * @ledgerproof/proof — Digest primitives.
 *
 * SHA-256 hex digests and their comparison.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { isDigest } from "@ledgerproof/types";
import type { Digest } from "@ledgerproof/types";

export function sha256(data: string): Digest {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Hash two child hashes to produce a parent hash.
 * Uses SHA-256(leftHex + rightHex) — concatenation of hex strings.
 */
export function hashPair(left: Digest, right: Digest): Digest {
  return sha256(left + right);
}

/**
 * Compare two digests without an early exit on the first differing byte.
 *
 * Both sides must be well-formed 64-char hex digests; anything else
 * compares unequal.
 */
export function digestsEqual(a: string, b: string): boolean {
  if (!isDigest(a) || !isDigest(b)) {
    return false;
  }
  return timingSafeEqual(Buffer.from(a, "hex"), Buffer.from(b, "hex"));
}
