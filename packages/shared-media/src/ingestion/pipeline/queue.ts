/**
 * FILE PURPOSE: BullMQ queue factory for scheduled ingestion runs
 * WHY: Runs are triggered on a schedule (repeatable job) or on demand.
 *      Jobs are not retried: a fatal run error must surface, and the next
 *      scheduled run starts from a fresh index anyway.
 */

import { Queue } from 'bullmq';
import type { IngestionJobData, IngestRunPayload } from './jobs.js';
import { redisConnectionFromUrl } from './connection.js';

export const JobType = {
  INGEST_RUN: 'ingest-run',
} as const;

export type JobTypeValue = (typeof JobType)[keyof typeof JobType];

export const QUEUE_NAME = 'meme-ingestion';

const SCHEDULED_JOB_ID = 'scheduled-ingest-run';

export function createIngestionQueue(redisUrl: string): Queue<IngestionJobData> {
  return new Queue<IngestionJobData>(QUEUE_NAME, {
    connection: redisConnectionFromUrl(redisUrl),
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 500 },
    },
  });
}

export function buildIngestRunJob(payload: IngestRunPayload = {}, now = new Date()): IngestionJobData {
  return { type: JobType.INGEST_RUN, payload, requestedAt: now.toISOString() };
}

/** Queue a single run now. */
export async function enqueueIngestionRun(
  queue: Queue<IngestionJobData>,
  payload: IngestRunPayload = {},
): Promise<string | undefined> {
  const job = await queue.add(JobType.INGEST_RUN, buildIngestRunJob(payload));
  return job.id;
}

/** Register (or replace) the repeatable run, e.g. `0 * * * *` for hourly. */
export async function scheduleIngestionRun(
  queue: Queue<IngestionJobData>,
  cronPattern: string,
  payload: IngestRunPayload = {},
): Promise<void> {
  await queue.add(JobType.INGEST_RUN, buildIngestRunJob(payload), {
    repeat: { pattern: cronPattern },
    jobId: SCHEDULED_JOB_ID,
  });
}
