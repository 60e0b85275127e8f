/**
 * FILE PURPOSE: One full ingestion run: index load, feed fetch, decision pipeline
 *
 * WHY: Both the one-shot script and the BullMQ worker run the same sequence.
 *      The index is loaded before anything else so a store outage aborts the
 *      run before any feed or image request goes out.
 */

import type { FeedSource, KnownItemSource, RecordSink, SafetyClassifier, Downloader, Candidate } from '../types.js';
import { KnownItemIndex } from '../dedup/known-item-index.js';
import type { SafetyPolicy } from './policy.js';
import type { IngestionReport } from './run.js';
import { emptyReport, runIngestion } from './run.js';
import type { LogSink } from '../../log.js';
import { stderrLog } from '../../log.js';
import { FallbackMonitor } from '../../fallback-monitor.js';

export interface IngestionRunOptions {
  feed: FeedSource;
  sources: readonly string[];
  limit: number;
  store: KnownItemSource & RecordSink;
  classifier: SafetyClassifier | null;
  download: Downloader;
  policy?: SafetyPolicy;
  nearThreshold?: number;
  log?: LogSink;
  monitor?: FallbackMonitor;
}

export async function executeIngestionRun(options: IngestionRunOptions): Promise<IngestionReport> {
  const { feed, sources, limit, store, classifier, log = stderrLog } = options;
  const monitor = options.monitor ?? new FallbackMonitor();

  // Fatal on failure (IndexLoadError)
  const index = await KnownItemIndex.load(store);
  log('INFO', `Loaded ${index.size} known items (${index.nearCandidates().length} with perceptual hashes)`);

  const candidates: Candidate[] = [];
  for (const source of sources) {
    log('INFO', `Fetching top posts from ${source}…`);
    const posts = await feed.fetchCandidates(source, limit);
    log('INFO', `Retrieved ${posts.length} candidates from ${source}.`);
    candidates.push(...posts);
  }

  if (candidates.length === 0) {
    log('INFO', 'No candidates found.');
    return emptyReport();
  }

  log('INFO', `Processing ${candidates.length} total candidates…`);
  const report = await runIngestion(candidates, index, classifier, {
    sink: store,
    download: options.download,
    policy: options.policy,
    nearThreshold: options.nearThreshold,
    log,
    monitor,
  });

  for (const line of monitor.summarize()) {
    log(line.endsWith('(ok)') ? 'INFO' : 'WARN', `Stage health: ${line}`);
  }
  return report;
}
