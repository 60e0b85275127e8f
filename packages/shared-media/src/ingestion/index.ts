export type {
  Candidate,
  ImageHashes,
  Fingerprint,
  KnownItem,
  NearCandidate,
  DuplicateVerdict,
  MemeRecord,
  FeedSource,
  KnownItemSource,
  RecordSink,
  SafetyClassifier,
  Downloader,
} from './types.js';
export {
  fingerprintImage,
  computeExactHash,
  computePerceptualHash,
  perceptualHashFromPixels,
  HASH_SIZE,
  SAMPLE_SIZE,
} from './fingerprint/index.js';
export type { FingerprintOptions } from './fingerprint/index.js';
export { scoreSafety, unsafeProbability, EXPLICIT_CATEGORIES } from './safety/scorer.js';
export type { ScoreOptions } from './safety/scorer.js';
export { loadNsfwClassifier, NsfwjsClassifier } from './safety/nsfwjs-classifier.js';
export { KnownItemIndex, resolveDuplicate, hammingDistance, isPerceptualHash, NEAR_DUPLICATE_THRESHOLD } from './dedup/index.js';
export { downloadImage, createDownloader, DEFAULT_DOWNLOAD_TIMEOUT_MS } from './download.js';
export type { DownloadOptions } from './download.js';
export { RedditFeedSource, toCandidate, DEFAULT_SUBREDDITS, DEFAULT_FEED_LIMIT } from './adapters/reddit-feed.js';
export type { RedditFeedOptions } from './adapters/reddit-feed.js';
export { applySafetyPolicy, isSafetyMode, DEFAULT_SAFETY_POLICY, SAFETY_MODES } from './pipeline/policy.js';
export type { SafetyPolicy, SafetyMode, PolicyDecision } from './pipeline/policy.js';
export { runIngestion, buildRecord, emptyReport } from './pipeline/run.js';
export type { IngestionDeps, IngestionReport } from './pipeline/run.js';
export { executeIngestionRun } from './pipeline/ingest-run.js';
export type { IngestionRunOptions } from './pipeline/ingest-run.js';
export {
  createIngestionQueue,
  enqueueIngestionRun,
  scheduleIngestionRun,
  buildIngestRunJob,
  JobType,
  QUEUE_NAME,
} from './pipeline/queue.js';
export type { JobTypeValue } from './pipeline/queue.js';
export type { IngestionJobData, IngestRunPayload, IngestionPayload } from './pipeline/jobs.js';
export { createIngestionWorker, processIngestionJob } from './pipeline/workers.js';
export type { JobProcessor, ProcessorMap } from './pipeline/workers.js';
export { redisConnectionFromUrl } from './pipeline/connection.js';
export type { RedisConnectionOptions } from './pipeline/connection.js';
