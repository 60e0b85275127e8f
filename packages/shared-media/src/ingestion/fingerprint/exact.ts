/**
 * FILE PURPOSE: Exact content hash over raw image bytes
 * WHY: Fast, always-on first pass. Byte-identical reposts share a digest;
 *      no decoding or normalisation happens before hashing.
 */

import { createHash } from 'node:crypto';

export function computeExactHash(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}
