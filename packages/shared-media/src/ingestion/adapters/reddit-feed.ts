/**
 * FILE PURPOSE: Reddit feed source: top image posts of the day per subreddit
 * WHY: The candidate feed. Single best-effort fetch per subreddit; a failed
 *      fetch yields no candidates for that subreddit, never a fatal error.
 *
 * Filters: stickied/pinned posts, posts Reddit marks over_18, posts without a
 * URL, video links, and anything that is not a jpg/jpeg/png/gif link.
 */

import type { Candidate, FeedSource } from '../types.js';
import type { LogSink } from '../../log.js';
import { stderrLog } from '../../log.js';
import { describeError } from '../../outcome.js';

export const DEFAULT_SUBREDDITS: readonly string[] = [
  'memes',
  'dankmemes',
  'funny',
  'wholesomememes',
  'AdviceAnimals',
];

export const DEFAULT_FEED_LIMIT = 25;

const VIDEO_EXTENSIONS = ['.gifv', '.mp4', '.webm'];
const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif'];

export interface RedditFeedOptions {
  userAgent: string;
  timeoutMs?: number;
  /** Override for tests and mirrors. */
  baseUrl?: string;
  log?: LogSink;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(post: Record<string, unknown>, key: string): string | undefined {
  const value = post[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Map one listing child to a candidate, or null when it should be skipped. */
export function toCandidate(post: Record<string, unknown>, baseUrl = 'https://www.reddit.com'): Candidate | null {
  if (post.stickied === true || post.pinned === true) return null;
  if (post.over_18 === true) return null;

  const imageUrl = stringField(post, 'url_overridden_by_dest') ?? stringField(post, 'url');
  if (!imageUrl) return null;

  const lower = imageUrl.toLowerCase();
  if (VIDEO_EXTENSIONS.some((ext) => lower.endsWith(ext))) return null;
  if (!IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext))) return null;

  const ups = Number(post.ups ?? 0);
  const permalink = stringField(post, 'permalink');

  return {
    title: (stringField(post, 'title') ?? '').trim(),
    imageUrl,
    sourceUrl: permalink ? `${baseUrl}${permalink}` : '',
    author: stringField(post, 'author') ?? null,
    score: Number.isFinite(ups) ? Math.trunc(ups) : 0,
  };
}

export class RedditFeedSource implements FeedSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log: LogSink;

  constructor(private readonly options: RedditFeedOptions) {
    this.baseUrl = (options.baseUrl ?? 'https://www.reddit.com').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.log = options.log ?? stderrLog;
  }

  async fetchCandidates(subreddit: string, limit = DEFAULT_FEED_LIMIT): Promise<Candidate[]> {
    const url = `${this.baseUrl}/r/${encodeURIComponent(subreddit)}/top.json?t=day&limit=${limit}`;

    let data: unknown;
    try {
      const response = await fetch(url, {
        headers: { 'User-Agent': this.options.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        this.log('WARN', `Failed to fetch posts from r/${subreddit}: HTTP ${response.status}`);
        return [];
      }
      data = await response.json();
    } catch (err) {
      this.log('WARN', `Failed to fetch posts from r/${subreddit}: ${describeError(err)}`);
      return [];
    }

    const listing = isRecord(data) && isRecord(data.data) ? data.data : undefined;
    const children = listing && Array.isArray(listing.children) ? listing.children : [];

    const candidates: Candidate[] = [];
    for (const child of children) {
      if (!isRecord(child) || !isRecord(child.data)) continue;
      const candidate = toCandidate(child.data, this.baseUrl);
      if (candidate) candidates.push(candidate);
    }
    return candidates;
  }
}
