/**
 * Fingerprint hashers
 *
 * Every algorithm is a node:crypto digest rendered as lowercase hex, so keys
 * have a fixed length per algorithm. Choosing one is a collision trade-off:
 * by the birthday bound, n keys of b bits collide with probability about
 * n² / 2^(b+1).
 *
 * - sha256 (default): 256 bits, negligible risk at any realistic corpus size
 * - sha512: 512 bits, larger keys, no practical gain over sha256 here
 * - sha1: 160 bits, still negligible for accidental collisions, slightly faster
 * - md5: 128 bits, about 1 in 10^20 at 10^9 documents; fastest, smallest keys
 *
 * None of this defends against crafted collisions. Verification mode compares
 * full documents before anything is deleted.
 */

import { createHash } from 'node:crypto';
import type { HashAlgorithm } from '../../core/types.js';

export interface Hasher {
  readonly algorithm: HashAlgorithm;
  /** Hex digest of the UTF-8 encoding of the input */
  hash(input: string): string;
}

/** Hex characters per key for each algorithm */
export const DIGEST_HEX_LENGTH: Record<HashAlgorithm, number> = {
  md5: 32,
  sha1: 40,
  sha256: 64,
  sha512: 128,
};

export function createHasher(algorithm: HashAlgorithm = 'sha256'): Hasher {
  return {
    algorithm,
    hash(input: string): string {
      return createHash(algorithm).update(input, 'utf8').digest('hex');
    },
  };
}
