/**
 * FILE PURPOSE: Standalone BullMQ worker process for scheduled meme ingestion
 * WHY: Long-lived process so the NSFW model loads once and every run reuses it.
 *      Start via `npm run worker`. Registers the INGEST_CRON schedule on boot
 *      when one is configured.
 */

import {
  createIngestionQueue,
  createIngestionWorker,
  describeError,
  scheduleIngestionRun,
} from '@memefeed/shared-media';
import type { IngesterConfig } from './config.js';
import { loadConfig } from './config.js';
import { createDatabase } from './db/index.js';
import { initSentry, reportError, reportFatal } from './observability.js';
import { lazyClassifier, prepareClassifier } from './services/meme-ingestion.js';
import { MemeStore } from './store/meme-store.js';
import { buildProcessors } from './workers/index.js';

let config: IngesterConfig;
try {
  config = loadConfig();
} catch (err) {
  process.stderr.write(`FATAL: ${describeError(err)}\n`);
  process.exit(1);
}

initSentry(config.sentryDsn);

const REDIS_URL = config.redisUrl;

if (!REDIS_URL) {
  process.stderr.write('FATAL: REDIS_URL is required to start the worker\n');
  process.exit(1);
}

const database = createDatabase(config.databaseUrl);
const store = new MemeStore(database.db);
const getClassifier = lazyClassifier(() => prepareClassifier(config));

const worker = createIngestionWorker(buildProcessors(config, store, getClassifier), REDIS_URL, config.workerConcurrency);
const queue = createIngestionQueue(REDIS_URL);

worker.on('completed', (job) => {
  process.stderr.write(`INFO: Job ${job.id} (${job.data.type}) completed\n`);
});

worker.on('failed', (job, err) => {
  process.stderr.write(`ERROR: Job ${job?.id} (${job?.data.type}) failed: ${err.message}\n`);
  reportError(err);
});

worker.on('error', (err) => {
  process.stderr.write(`ERROR: Worker error: ${err.message}\n`);
});

if (config.cron) {
  try {
    await scheduleIngestionRun(queue, config.cron);
    process.stderr.write(`INFO: Scheduled ingestion run (${config.cron})\n`);
  } catch (err) {
    process.stderr.write(`FATAL: Could not register schedule: ${describeError(err)}\n`);
    await reportFatal(err);
    process.exit(1);
  }
}

process.stderr.write(`INFO: Ingestion worker started (concurrency=${config.workerConcurrency})\n`);

async function shutdown(): Promise<void> {
  process.stderr.write('INFO: Shutting down worker…\n');
  await worker.close();
  await queue.close();
  await database.close();
  process.exit(0);
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
