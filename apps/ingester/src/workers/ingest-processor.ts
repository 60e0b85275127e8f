/**
 * FILE PURPOSE: INGEST_RUN processor: one full ingestion run per job
 */

import type { Job } from 'bullmq';
import type {
  IngestionJobData,
  IngestionReport,
  JobProcessor,
  KnownItemSource,
  RecordSink,
  SafetyClassifier,
} from '@memefeed/shared-media';
import type { IngesterConfig } from '../config.js';
import { runMemeIngestion } from '../services/meme-ingestion.js';

export function createIngestRunProcessor(
  config: IngesterConfig,
  store: KnownItemSource & RecordSink,
  getClassifier: () => Promise<SafetyClassifier | null>,
): JobProcessor {
  return async (job: Job<IngestionJobData>): Promise<IngestionReport> => {
    const classifier = await getClassifier();
    const report = await runMemeIngestion(config, { classifier, store, overrides: job.data.payload });
    await job.log(
      `Inserted ${report.inserted} of ${report.candidates} candidates ` +
      `(${report.exactDuplicates} exact duplicates, ${report.nearDuplicates} near duplicates, ${report.dropped} dropped)`,
    );
    return report;
  };
}
