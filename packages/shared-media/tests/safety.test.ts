import { describe, it, expect, vi, beforeEach } from 'vitest';
import sharp from 'sharp';
import type * as tfjs from '@tensorflow/tfjs';
import type { NSFWJS } from 'nsfwjs';

const mockLoad = vi.fn();
const mockEnableProdMode = vi.fn();

vi.mock('nsfwjs', () => ({
  load: (...args: unknown[]) => mockLoad(...args),
}));
vi.mock('@tensorflow/tfjs', () => ({
  enableProdMode: () => mockEnableProdMode(),
}));

import { loadNsfwClassifier, NsfwjsClassifier } from '../src/ingestion/safety/nsfwjs-classifier.js';
import { scoreSafety, unsafeProbability } from '../src/ingestion/safety/scorer.js';
import { applySafetyPolicy, isSafetyMode, DEFAULT_SAFETY_POLICY } from '../src/ingestion/pipeline/policy.js';
import type { SafetyPolicy } from '../src/ingestion/pipeline/policy.js';
import { FallbackMonitor } from '../src/fallback-monitor.js';
import type { SafetyClassifier } from '../src/ingestion/types.js';

const BYTES = Buffer.from('image-bytes');

describe('unsafeProbability', () => {
  it('sums the explicit categories', () => {
    const score = unsafeProbability({ Drawing: 0.1, Hentai: 0.05, Neutral: 0.6, Porn: 0.1, Sexy: 0.15 });
    expect(score).toBeCloseTo(0.3, 10);
  });

  it('clamps to 1', () => {
    expect(unsafeProbability({ porn: 0.7, sexy: 0.6 })).toBe(1);
  });

  it('ignores non-finite probabilities', () => {
    expect(unsafeProbability({ porn: Number.NaN, sexy: 0.25 })).toBe(0.25);
  });

  it('returns 0 when no explicit category is present', () => {
    expect(unsafeProbability({ neutral: 0.9, drawing: 0.1 })).toBe(0);
  });
});

describe('scoreSafety', () => {
  it('returns 0 without calling anything when no classifier is loaded', async () => {
    expect(await scoreSafety(BYTES, null)).toBe(0);
  });

  it('returns the classifier score and records a primary outcome', async () => {
    const classifier: SafetyClassifier = { classify: vi.fn().mockResolvedValue({ porn: 0.5, neutral: 0.5 }) };
    const monitor = new FallbackMonitor();
    const score = await scoreSafety(BYTES, classifier, { monitor });
    expect(score).toBe(0.5);
    expect(classifier.classify).toHaveBeenCalledWith(BYTES);
    expect(monitor.getStats('nsfw-classifier').primaryCount).toBe(1);
  });

  it('scores 0 and logs when the classifier throws', async () => {
    const classifier: SafetyClassifier = { classify: vi.fn().mockRejectedValue(new Error('tensor shape mismatch')) };
    const log = vi.fn();
    const monitor = new FallbackMonitor();
    const score = await scoreSafety(BYTES, classifier, { label: 'https://i.example.com/a.png', log, monitor });
    expect(score).toBe(0);
    expect(log).toHaveBeenCalledWith(
      'WARN',
      'Failed to run NSFW classifier on https://i.example.com/a.png: tensor shape mismatch',
    );
    expect(monitor.getStats('nsfw-classifier').fallbackCount).toBe(1);
  });
});

describe('applySafetyPolicy', () => {
  const policy = (mode: SafetyPolicy['mode']): SafetyPolicy => ({ ...DEFAULT_SAFETY_POLICY, mode });

  it('approves everything in record-only mode', () => {
    expect(applySafetyPolicy(0.99, policy('record-only'))).toEqual({
      action: 'insert',
      status: 'approved',
      heldForReview: false,
    });
  });

  it('holds unsafe items for review at the threshold', () => {
    expect(applySafetyPolicy(0.4, policy('review'))).toEqual({ action: 'insert', status: 'pending', heldForReview: true });
    expect(applySafetyPolicy(0.39, policy('review'))).toEqual({
      action: 'insert',
      status: 'approved',
      heldForReview: false,
    });
  });

  it('rejects unsafe items in reject mode', () => {
    expect(applySafetyPolicy(0.8, policy('reject'))).toEqual({ action: 'reject' });
    expect(applySafetyPolicy(0.1, policy('reject'))).toEqual({
      action: 'insert',
      status: 'approved',
      heldForReview: false,
    });
  });

  it('recognises the configured modes', () => {
    expect(isSafetyMode('review')).toBe(true);
    expect(isSafetyMode('block')).toBe(false);
  });
});

describe('NsfwjsClassifier', () => {
  it('feeds a 224x224 RGB tensor to the model and lower-cases labels', async () => {
    const png = await sharp({ create: { width: 40, height: 30, channels: 4, background: { r: 10, g: 20, b: 30, alpha: 1 } } })
      .png()
      .toBuffer();
    const tensor = { dispose: vi.fn() };
    const tf = { tensor3d: vi.fn().mockReturnValue(tensor) };
    const model = {
      classify: vi.fn().mockResolvedValue([
        { className: 'Neutral', probability: 0.7 },
        { className: 'Porn', probability: 0.2 },
      ]),
    };

    const classifier = new NsfwjsClassifier(model as unknown as NSFWJS, tf as unknown as typeof tfjs);
    const distribution = await classifier.classify(png);

    expect(distribution).toEqual({ neutral: 0.7, porn: 0.2 });
    const [values, shape, dtype] = tf.tensor3d.mock.calls[0]!;
    expect(shape).toEqual([224, 224, 3]);
    expect(dtype).toBe('int32');
    expect(values).toHaveLength(224 * 224 * 3);
    expect(model.classify).toHaveBeenCalledWith(tensor);
    expect(tensor.dispose).toHaveBeenCalledOnce();
  });
});

describe('loadNsfwClassifier', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns a classifier wrapping the loaded model', async () => {
    mockLoad.mockResolvedValue({ classify: vi.fn() });
    const log = vi.fn();

    const classifier = await loadNsfwClassifier(log);

    expect(classifier).toBeInstanceOf(NsfwjsClassifier);
    expect(mockEnableProdMode).toHaveBeenCalledOnce();
    expect(mockLoad).toHaveBeenCalledOnce();
    expect(log).toHaveBeenCalledWith('INFO', 'NSFW classifier loaded');
  });

  it('returns null and warns when the model cannot load', async () => {
    mockLoad.mockRejectedValue(new Error('no model'));
    const log = vi.fn();

    expect(await loadNsfwClassifier(log)).toBeNull();
    expect(log).toHaveBeenCalledWith('WARN', 'NSFW classifier unavailable, scoring disabled: no model');
  });
});
