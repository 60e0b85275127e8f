/**
 * FILE PURPOSE: Environment configuration for the ingester
 *
 * HOW: Every env var is read here, once, by loadConfig(). Missing required
 *      values and malformed numbers throw ConfigError so a bad deploy fails
 *      at startup rather than mid-run.
 */

import {
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
  DEFAULT_FEED_LIMIT,
  DEFAULT_SAFETY_POLICY,
  DEFAULT_SUBREDDITS,
  SAFETY_MODES,
  describeError,
  isSafetyMode,
  redisConnectionFromUrl,
} from '@memefeed/shared-media';
import type { SafetyPolicy } from '@memefeed/shared-media';

export const DEFAULT_USER_AGENT = 'memefeed-ingester/1.0';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface IngesterConfig {
  databaseUrl: string;
  /** Worker only; the one-shot script does not need Redis. */
  redisUrl: string | undefined;
  redditUserAgent: string;
  subreddits: string[];
  limit: number;
  downloadTimeoutMs: number;
  nsfwEnabled: boolean;
  safetyPolicy: SafetyPolicy;
  /** Repeat pattern for the scheduled run, e.g. `0 * * * *`. */
  cron: string | undefined;
  workerConcurrency: number;
  sentryDsn: string | undefined;
}

type Env = Record<string, string | undefined>;

function parseCsvEnv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function optional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function probability(env: Env, key: string, fallback: number): number {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(`${key} must be a number between 0 and 1, got "${raw}"`);
  }
  return value;
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const raw = optional(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${key} must be true or false, got "${raw}"`);
}

function redisUrl(env: Env): string | undefined {
  const raw = optional(env, 'REDIS_URL');
  if (raw === undefined) return undefined;
  try {
    redisConnectionFromUrl(raw);
  } catch (err) {
    throw new ConfigError(`REDIS_URL is not a valid Redis URL: ${describeError(err)}`, { cause: err });
  }
  return raw;
}

function safetyPolicy(env: Env): SafetyPolicy {
  const mode = optional(env, 'NSFW_POLICY') ?? DEFAULT_SAFETY_POLICY.mode;
  if (!isSafetyMode(mode)) {
    throw new ConfigError(`NSFW_POLICY must be one of ${SAFETY_MODES.join(', ')}, got "${mode}"`);
  }
  return {
    mode,
    threshold: probability(env, 'NSFW_THRESHOLD', DEFAULT_SAFETY_POLICY.threshold),
    approvedStatus: optional(env, 'APPROVED_STATUS') ?? DEFAULT_SAFETY_POLICY.approvedStatus,
    reviewStatus: optional(env, 'NSFW_REVIEW_STATUS') ?? DEFAULT_SAFETY_POLICY.reviewStatus,
  };
}

export function loadConfig(env: Env = process.env): IngesterConfig {
  const databaseUrl = optional(env, 'DATABASE_URL');
  if (!databaseUrl) {
    throw new ConfigError('DATABASE_URL is required');
  }

  const subreddits = parseCsvEnv(env.INGEST_SUBREDDITS);

  return {
    databaseUrl,
    redisUrl: redisUrl(env),
    redditUserAgent: optional(env, 'REDDIT_USER_AGENT') ?? DEFAULT_USER_AGENT,
    subreddits: subreddits.length > 0 ? subreddits : [...DEFAULT_SUBREDDITS],
    limit: positiveInt(env, 'INGEST_LIMIT', DEFAULT_FEED_LIMIT),
    downloadTimeoutMs: positiveInt(env, 'DOWNLOAD_TIMEOUT_MS', DEFAULT_DOWNLOAD_TIMEOUT_MS),
    nsfwEnabled: flag(env, 'NSFW_ENABLED', true),
    safetyPolicy: safetyPolicy(env),
    cron: optional(env, 'INGEST_CRON'),
    workerConcurrency: positiveInt(env, 'WORKER_CONCURRENCY', 1),
    sentryDsn: optional(env, 'SENTRY_DSN'),
  };
}
