/**
 * FILE PURPOSE: Content fingerprinter: exact + perceptual hash for one image
 *
 * WHY: One bad image must not abort the batch. The exact hash never fails;
 *      a decode failure only costs the item its near-duplicate signal.
 */

import type { ImageHashes } from '../types.js';
import type { LogSink } from '../../log.js';
import { stderrLog } from '../../log.js';
import type { FallbackMonitor } from '../../fallback-monitor.js';
import { computeExactHash } from './exact.js';
import { computePerceptualHash } from './perceptual.js';

export { computeExactHash } from './exact.js';
export { computePerceptualHash, perceptualHashFromPixels, HASH_SIZE, SAMPLE_SIZE } from './perceptual.js';

export interface FingerprintOptions {
  /** Used in log lines; usually the image URL. */
  label?: string;
  log?: LogSink;
  monitor?: FallbackMonitor;
}

export async function fingerprintImage(bytes: Buffer, options: FingerprintOptions = {}): Promise<ImageHashes> {
  const { label = 'image', log = stderrLog, monitor } = options;
  const exactHash = computeExactHash(bytes);

  const perceptual = await computePerceptualHash(bytes);
  if (!perceptual.ok) {
    log('WARN', `Failed to compute perceptual hash for ${label}: ${perceptual.reason}`);
    monitor?.recordFallback('phash', perceptual.reason);
    return { exactHash, perceptualHash: null };
  }

  monitor?.recordPrimary('phash');
  return { exactHash, perceptualHash: perceptual.value };
}
