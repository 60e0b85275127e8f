/**
 * FILE PURPOSE: Safety scorer: unsafe-content score in [0, 1] for one image
 *
 * WHY: Scoring is measurement only. Whether a score gates insertion is the
 *      SafetyPolicy's decision (pipeline/policy.ts), not this module's.
 *
 * Policy when no classifier is loaded: every image scores 0 (assume safe).
 * A missing model must never block ingestion. Classifier errors degrade the
 * same way for the one image that triggered them.
 */

import type { SafetyClassifier } from '../types.js';
import type { Outcome } from '../../outcome.js';
import { describeError, fail, succeed } from '../../outcome.js';
import type { LogSink } from '../../log.js';
import { stderrLog } from '../../log.js';
import type { FallbackMonitor } from '../../fallback-monitor.js';

/** Categories that denote explicit or sexualised content (NSFWJS / Open NSFW labels). */
export const EXPLICIT_CATEGORIES: readonly string[] = ['porn', 'hentai', 'sexy'];

/** Sum of the explicit-category probabilities, clamped to [0, 1]. Labels match case-insensitively. */
export function unsafeProbability(distribution: Record<string, number>): number {
  let total = 0;
  for (const [label, probability] of Object.entries(distribution)) {
    if (!EXPLICIT_CATEGORIES.includes(label.toLowerCase())) continue;
    if (!Number.isFinite(probability)) continue;
    total += probability;
  }
  return Math.min(1, Math.max(0, total));
}

async function classifyImage(bytes: Buffer, classifier: SafetyClassifier): Promise<Outcome<number>> {
  try {
    const distribution = await classifier.classify(bytes);
    return succeed(unsafeProbability(distribution));
  } catch (err) {
    return fail(describeError(err));
  }
}

export interface ScoreOptions {
  label?: string;
  log?: LogSink;
  monitor?: FallbackMonitor;
}

export async function scoreSafety(
  bytes: Buffer,
  classifier: SafetyClassifier | null,
  options: ScoreOptions = {},
): Promise<number> {
  if (!classifier) return 0;

  const { label = 'image', log = stderrLog, monitor } = options;
  const result = await classifyImage(bytes, classifier);
  if (!result.ok) {
    log('WARN', `Failed to run NSFW classifier on ${label}: ${result.reason}`);
    monitor?.recordFallback('nsfw-classifier', result.reason);
    return 0;
  }

  monitor?.recordPrimary('nsfw-classifier');
  return result.value;
}
