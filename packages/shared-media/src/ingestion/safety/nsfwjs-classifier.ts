/**
 * FILE PURPOSE: NSFWJS-backed SafetyClassifier
 * WHY: Open-source MobileNetV2 model running on TensorFlow.js, no native
 *      TensorFlow build needed. Loaded lazily: the model weighs megabytes
 *      and tfjs takes seconds to initialise.
 *
 * Routing:
 *   model loads      → classifier returned, reused for every image in the process
 *   model fails      → null (scoring disabled, every image scores 0)
 */

import sharp from 'sharp';
import type * as tfjs from '@tensorflow/tfjs';
import type { NSFWJS } from 'nsfwjs';
import type { SafetyClassifier } from '../types.js';
import type { LogSink } from '../../log.js';
import { stderrLog } from '../../log.js';
import { describeError } from '../../outcome.js';

/** NSFWJS models take a 224×224 RGB input. */
const INPUT_SIZE = 224;

type TensorFlow = typeof tfjs;

export class NsfwjsClassifier implements SafetyClassifier {
  constructor(
    private readonly model: NSFWJS,
    private readonly tf: TensorFlow,
  ) {}

  async classify(bytes: Buffer): Promise<Record<string, number>> {
    const { data, info } = await sharp(bytes)
      .removeAlpha()
      .resize(INPUT_SIZE, INPUT_SIZE, { fit: 'cover' })
      .raw()
      .toBuffer({ resolveWithObject: true });

    const input = this.tf.tensor3d(Int32Array.from(data), [info.height, info.width, info.channels], 'int32');
    try {
      const predictions = await this.model.classify(input);
      const distribution: Record<string, number> = {};
      for (const p of predictions) distribution[p.className.toLowerCase()] = p.probability;
      return distribution;
    } finally {
      input.dispose();
    }
  }
}

/** Load the model once per process. Returns null when it cannot be loaded. */
export async function loadNsfwClassifier(log: LogSink = stderrLog): Promise<SafetyClassifier | null> {
  try {
    const tf = await import('@tensorflow/tfjs');
    const nsfwjs = await import('nsfwjs');
    tf.enableProdMode();
    const model = await nsfwjs.load();
    log('INFO', 'NSFW classifier loaded');
    return new NsfwjsClassifier(model, tf);
  } catch (err) {
    log('WARN', `NSFW classifier unavailable, scoring disabled: ${describeError(err)}`);
    return null;
  }
}
