/**
 * FILE PURPOSE: Worker processors barrel: builds the processors map for the BullMQ worker
 */

import type { KnownItemSource, ProcessorMap, RecordSink, SafetyClassifier } from '@memefeed/shared-media';
import { JobType } from '@memefeed/shared-media';
import type { IngesterConfig } from '../config.js';
import { createIngestRunProcessor } from './ingest-processor.js';

/** Build the complete processors map for createIngestionWorker(). */
export function buildProcessors(
  config: IngesterConfig,
  store: KnownItemSource & RecordSink,
  getClassifier: () => Promise<SafetyClassifier | null>,
): ProcessorMap {
  return {
    [JobType.INGEST_RUN]: createIngestRunProcessor(config, store, getClassifier),
  };
}
