/**
 * FILE PURPOSE: Duplicate resolver: exact, near or unique
 *
 * Rules (in priority order, first match wins):
 *   1. Exact hash in the index         → exact-duplicate (no further checks)
 *   2. Perceptual distance < threshold → near-duplicate, first match in index order
 *   3. Otherwise                       → unique
 *
 * Equidistant matches are not ranked; callers must not rely on which one
 * is returned. The near scan is linear in the number of known items, fine for
 * a few thousand stored memes. A larger store needs a bucketed index with
 * the same threshold and first-match semantics.
 */

import type { DuplicateVerdict, ImageHashes } from '../types.js';
import type { KnownItemIndex } from './known-item-index.js';
import { hammingDistance, isPerceptualHash, NEAR_DUPLICATE_THRESHOLD } from './near.js';

export function resolveDuplicate(
  hashes: ImageHashes,
  index: KnownItemIndex,
  threshold = NEAR_DUPLICATE_THRESHOLD,
): DuplicateVerdict {
  const exactMatch = index.exactLookup(hashes.exactHash);
  if (exactMatch !== undefined) {
    return { kind: 'exact-duplicate', matchedId: exactMatch };
  }

  const { perceptualHash } = hashes;
  if (!perceptualHash || !isPerceptualHash(perceptualHash)) {
    return { kind: 'unique' };
  }

  for (const known of index.nearCandidates()) {
    // Malformed or different-length stored hashes are skipped, not fatal
    const distance = hammingDistance(perceptualHash, known.perceptualHash);
    if (distance.ok && distance.value < threshold) {
      return { kind: 'near-duplicate', matchedId: known.id, distance: distance.value };
    }
  }

  return { kind: 'unique' };
}
