/**
 * FILE PURPOSE: BullMQ worker definitions for the ingestion queue
 * WHY: Processors come from the app (they need the store and config);
 *      this module only dispatches by job type.
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { IngestionJobData } from './jobs.js';
import type { JobTypeValue } from './queue.js';
import { QUEUE_NAME } from './queue.js';
import { redisConnectionFromUrl } from './connection.js';

export type JobProcessor = (job: Job<IngestionJobData>) => Promise<unknown>;

export type ProcessorMap = Partial<Record<JobTypeValue, JobProcessor>>;

export async function processIngestionJob(
  job: Job<IngestionJobData>,
  processors: ProcessorMap,
): Promise<unknown> {
  const processor = processors[job.data.type];
  if (!processor) {
    throw new Error(`Unknown job type: ${job.data.type}`);
  }
  return processor(job);
}

export function createIngestionWorker(
  processors: ProcessorMap,
  redisUrl: string,
  concurrency = 1,
): Worker<IngestionJobData> {
  return new Worker<IngestionJobData>(
    QUEUE_NAME,
    (job) => processIngestionJob(job, processors),
    {
      connection: redisConnectionFromUrl(redisUrl),
      concurrency,
    },
  );
}
