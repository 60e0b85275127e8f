/**
 * FILE PURPOSE: Near-dedup via Hamming distance between perceptual hashes
 * WHY: Catches recompressed/resized reposts whose bytes differ.
 *      Threshold: distance < 5 bits (of 64) = near-duplicate. Tuned by hand,
 *      not derived.
 */

import type { Outcome } from '../../outcome.js';
import { fail, succeed } from '../../outcome.js';

export const NEAR_DUPLICATE_THRESHOLD = 5;

const HEX = /^[0-9a-f]+$/i;

/** Set bits per nibble value. */
const NIBBLE_BITS = [0, 1, 1, 2, 1, 2, 2, 3, 1, 2, 2, 3, 2, 3, 3, 4];

export function isPerceptualHash(value: string): boolean {
  return HEX.test(value);
}

/**
 * Count of differing bits between two hex-encoded bit vectors.
 * Fails for non-hex input or hashes of different bit length; those pairs
 * are not comparable.
 */
export function hammingDistance(a: string, b: string): Outcome<number> {
  if (!isPerceptualHash(a) || !isPerceptualHash(b)) {
    return fail('not a hex string');
  }
  if (a.length !== b.length) {
    return fail(`bit length mismatch (${a.length * 4} vs ${b.length * 4})`);
  }

  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = parseInt(a.charAt(i), 16) ^ parseInt(b.charAt(i), 16);
    distance += NIBBLE_BITS[diff] ?? 0;
  }
  return succeed(distance);
}
