/**
 * FILE PURPOSE: DCT perceptual hash (pHash) for near-duplicate detection
 *
 * WHY: Recompressed or resized reposts have different bytes but nearly the
 *      same low-frequency structure, so their hashes differ in a few bits.
 *
 * HOW: decode → drop alpha → greyscale → 32×32 → 2-D DCT-II →
 *      top-left 8×8 block → bit = coefficient > block median →
 *      64 bits row-major, most significant first → 16 hex chars.
 */

import sharp from 'sharp';
import type { Outcome } from '../../outcome.js';
import { describeError, fail, succeed } from '../../outcome.js';

/** Side length of the low-frequency block; the hash has HASH_SIZE² bits. */
export const HASH_SIZE = 8;

/** Side length of the greyscale thumbnail the DCT runs on. */
export const SAMPLE_SIZE = HASH_SIZE * 4;

const cosineTables = new Map<number, Float64Array>();

/** cos(π·k·(2n+1) / 2N) for k < HASH_SIZE, n < N; row k starts at k·N. */
function cosineTable(n: number): Float64Array {
  const cached = cosineTables.get(n);
  if (cached) return cached;
  const table = new Float64Array(HASH_SIZE * n);
  for (let k = 0; k < HASH_SIZE; k++) {
    for (let i = 0; i < n; i++) {
      table[k * n + i] = Math.cos((Math.PI * k * (2 * i + 1)) / (2 * n));
    }
  }
  cosineTables.set(n, table);
  return table;
}

function median(values: Float64Array): number {
  const sorted = Float64Array.from(values).sort();
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 0
    ? ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2
    : (sorted[mid] ?? 0);
}

function bitsToHex(bits: readonly boolean[]): string {
  let hex = '';
  for (let i = 0; i < bits.length; i += 4) {
    let nibble = 0;
    for (let j = 0; j < 4; j++) nibble = (nibble << 1) | (bits[i + j] ? 1 : 0);
    hex += nibble.toString(16);
  }
  return hex;
}

/**
 * Hash a `size`×`size` greyscale image given row-major.
 * Only the low-frequency coefficients are computed; the rest are never read.
 */
export function perceptualHashFromPixels(pixels: ArrayLike<number>, size = SAMPLE_SIZE): string {
  if (size < HASH_SIZE) {
    throw new RangeError(`Sample size ${size} is smaller than hash size ${HASH_SIZE}`);
  }
  if (pixels.length !== size * size) {
    throw new RangeError(`Expected ${size * size} pixels, got ${pixels.length}`);
  }

  const cos = cosineTable(size);

  // Along each row: rows[r][k] for horizontal frequency k
  const rows = new Float64Array(size * HASH_SIZE);
  for (let r = 0; r < size; r++) {
    for (let k = 0; k < HASH_SIZE; k++) {
      let sum = 0;
      for (let c = 0; c < size; c++) sum += (pixels[r * size + c] ?? 0) * (cos[k * size + c] ?? 0);
      rows[r * HASH_SIZE + k] = sum;
    }
  }

  // Down each column: low[j][k] for vertical frequency j
  const low = new Float64Array(HASH_SIZE * HASH_SIZE);
  for (let j = 0; j < HASH_SIZE; j++) {
    for (let k = 0; k < HASH_SIZE; k++) {
      let sum = 0;
      for (let r = 0; r < size; r++) sum += (cos[j * size + r] ?? 0) * (rows[r * HASH_SIZE + k] ?? 0);
      low[j * HASH_SIZE + k] = sum;
    }
  }

  const threshold = median(low);
  return bitsToHex(Array.from(low, (v) => v > threshold));
}

/** First channel of each pixel in an interleaved raw buffer. */
function firstChannel(data: Buffer, channels: number): Uint8Array {
  if (channels === 1) return data;
  const out = new Uint8Array(data.length / channels);
  for (let i = 0; i < out.length; i++) out[i] = data[i * channels] ?? 0;
  return out;
}

/** Decode `bytes` and hash them; a decode failure comes back as `{ ok: false }`. */
export async function computePerceptualHash(bytes: Buffer): Promise<Outcome<string>> {
  try {
    const { data, info } = await sharp(bytes)
      .removeAlpha()
      .greyscale()
      .resize(SAMPLE_SIZE, SAMPLE_SIZE, { fit: 'fill' })
      .raw()
      .toBuffer({ resolveWithObject: true });
    return succeed(perceptualHashFromPixels(firstChannel(data, info.channels), SAMPLE_SIZE));
  } catch (err) {
    return fail(describeError(err));
  }
}
