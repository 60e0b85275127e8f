/**
 * FILE PURPOSE: Ingestion decision pipeline: candidates in, one insert batch out
 *
 * HOW: For each candidate, in input order:
 *      1. Download (failure → drop, log, continue)
 *      2. Fingerprint + safety score + duplicate verdict
 *      3. exact-duplicate → skip; unique / near-duplicate → policy → queue
 *         (near-duplicates carry `duplicateOf` so lineage stays visible)
 *      After the loop: one insertRecords() call with the queue in input order,
 *      or no store call at all when the queue is empty.
 *
 * Per-item failures never escape a step. A failed batch write does
 * (BatchWriteError); there is no partial retry.
 */

import type {
  Candidate,
  DuplicateVerdict,
  Downloader,
  Fingerprint,
  MemeRecord,
  RecordSink,
  SafetyClassifier,
} from '../types.js';
import type { KnownItemIndex } from '../dedup/known-item-index.js';
import { resolveDuplicate } from '../dedup/resolver.js';
import { NEAR_DUPLICATE_THRESHOLD } from '../dedup/near.js';
import { fingerprintImage } from '../fingerprint/index.js';
import { scoreSafety } from '../safety/scorer.js';
import type { SafetyPolicy } from './policy.js';
import { applySafetyPolicy, DEFAULT_SAFETY_POLICY } from './policy.js';
import { BatchWriteError } from '../../errors.js';
import { describeError } from '../../outcome.js';
import type { LogSink } from '../../log.js';
import { stderrLog } from '../../log.js';
import type { FallbackMonitor } from '../../fallback-monitor.js';

export interface IngestionDeps {
  sink: RecordSink;
  download: Downloader;
  policy?: SafetyPolicy;
  /** Hamming distance below which two perceptual hashes are near-duplicates. */
  nearThreshold?: number;
  log?: LogSink;
  monitor?: FallbackMonitor;
}

export interface IngestionReport {
  candidates: number;
  /** Rows the store acknowledged. */
  inserted: number;
  queued: number;
  /** Download failures. */
  dropped: number;
  exactDuplicates: number;
  nearDuplicates: number;
  heldForReview: number;
  rejectedUnsafe: number;
}

export function emptyReport(candidates = 0): IngestionReport {
  return {
    candidates,
    inserted: 0,
    queued: 0,
    dropped: 0,
    exactDuplicates: 0,
    nearDuplicates: 0,
    heldForReview: 0,
    rejectedUnsafe: 0,
  };
}

export function buildRecord(
  candidate: Candidate,
  fingerprint: Fingerprint,
  verdict: DuplicateVerdict,
  status: string,
): MemeRecord {
  return {
    title: candidate.title,
    imageUrl: candidate.imageUrl,
    sourceUrl: candidate.sourceUrl,
    author: candidate.author,
    score: candidate.score,
    exactHash: fingerprint.exactHash,
    perceptualHash: fingerprint.perceptualHash,
    unsafeScore: fingerprint.unsafeScore,
    duplicateOf: verdict.kind === 'near-duplicate' ? verdict.matchedId : null,
    status,
  };
}

export async function runIngestion(
  candidates: readonly Candidate[],
  index: KnownItemIndex,
  classifier: SafetyClassifier | null,
  deps: IngestionDeps,
): Promise<IngestionReport> {
  const {
    sink,
    download,
    policy = DEFAULT_SAFETY_POLICY,
    nearThreshold = NEAR_DUPLICATE_THRESHOLD,
    log = stderrLog,
    monitor,
  } = deps;

  const report = emptyReport(candidates.length);
  const queue: MemeRecord[] = [];

  for (const candidate of candidates) {
    const label = candidate.imageUrl;

    const bytes = await download(candidate.imageUrl);
    if (!bytes.ok) {
      log('WARN', `Failed to download ${label}: ${bytes.reason}`);
      monitor?.recordFallback('download', bytes.reason);
      report.dropped++;
      continue;
    }
    monitor?.recordPrimary('download');

    const hashes = await fingerprintImage(bytes.value, { label, log, monitor });
    const unsafeScore = await scoreSafety(bytes.value, classifier, { label, log, monitor });
    const verdict = resolveDuplicate(hashes, index, nearThreshold);

    if (verdict.kind === 'exact-duplicate') {
      log('INFO', `Skipping exact duplicate of ${verdict.matchedId}: ${label}`);
      report.exactDuplicates++;
      continue;
    }
    if (verdict.kind === 'near-duplicate') {
      log('INFO', `Near duplicate of ${verdict.matchedId} (distance ${verdict.distance}): ${label}`);
      report.nearDuplicates++;
    }

    const decision = applySafetyPolicy(unsafeScore, policy);
    if (decision.action === 'reject') {
      log('INFO', `Rejected unsafe image (score ${unsafeScore.toFixed(3)}): ${label}`);
      report.rejectedUnsafe++;
      continue;
    }
    if (decision.heldForReview) report.heldForReview++;

    queue.push(buildRecord(candidate, { ...hashes, unsafeScore }, verdict, decision.status));
  }

  report.queued = queue.length;
  if (queue.length === 0) {
    log('INFO', 'No new memes to insert.');
    return report;
  }

  try {
    report.inserted = await sink.insertRecords(queue);
  } catch (err) {
    throw new BatchWriteError(queue.length, describeError(err), { cause: err });
  }
  return report;
}
