/**
 * FILE PURPOSE: Wires config, Reddit feed, downloader and Postgres store into one run
 * WHY: The worker processor and the one-shot script both call runMemeIngestion(),
 *      so a run behaves the same whichever way it was triggered.
 */

import {
  RedditFeedSource,
  createDownloader,
  executeIngestionRun,
  loadNsfwClassifier,
  stderrLog,
} from '@memefeed/shared-media';
import type { IngestionReport, IngestRunPayload, KnownItemSource, LogSink, RecordSink, SafetyClassifier } from '@memefeed/shared-media';
import type { IngesterConfig } from '../config.js';

export interface MemeIngestionOptions {
  classifier: SafetyClassifier | null;
  store: KnownItemSource & RecordSink;
  /** Per-run overrides from a queued job. */
  overrides?: IngestRunPayload;
  log?: LogSink;
}

export async function runMemeIngestion(
  config: IngesterConfig,
  options: MemeIngestionOptions,
): Promise<IngestionReport> {
  const { classifier, store, overrides = {}, log = stderrLog } = options;
  const sources = overrides.sources && overrides.sources.length > 0 ? overrides.sources : config.subreddits;

  return executeIngestionRun({
    feed: new RedditFeedSource({ userAgent: config.redditUserAgent, timeoutMs: config.downloadTimeoutMs, log }),
    sources,
    limit: overrides.limit ?? config.limit,
    store,
    classifier,
    download: createDownloader({
      timeoutMs: config.downloadTimeoutMs,
      headers: { 'User-Agent': config.redditUserAgent },
    }),
    policy: config.safetyPolicy,
    log,
  });
}

/** Load the classifier when enabled. Null means every image scores 0. */
export async function prepareClassifier(
  config: IngesterConfig,
  log: LogSink = stderrLog,
): Promise<SafetyClassifier | null> {
  if (!config.nsfwEnabled) {
    log('INFO', 'NSFW scoring disabled (NSFW_ENABLED=false)');
    return null;
  }
  return loadNsfwClassifier(log);
}

/** Memoize classifier loading so a long-lived worker loads the model once. */
export function lazyClassifier(load: () => Promise<SafetyClassifier | null>): () => Promise<SafetyClassifier | null> {
  let pending: Promise<SafetyClassifier | null> | undefined;
  return () => {
    pending ??= load();
    return pending;
  };
}
