/**
 * FILE PURPOSE: Image downloader with a per-request timeout
 * WHY: One slow or dead image host must not stall the run. Every failure
 *      (network, non-2xx, timeout) comes back as a value so the pipeline
 *      can drop the candidate and move on.
 */

import type { Outcome } from '../outcome.js';
import { describeError, fail, succeed } from '../outcome.js';
import type { Downloader } from './types.js';

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 15_000;

export interface DownloadOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export async function downloadImage(url: string, options: DownloadOptions = {}): Promise<Outcome<Buffer>> {
  const { timeoutMs = DEFAULT_DOWNLOAD_TIMEOUT_MS, headers } = options;
  try {
    const response = await fetch(url, {
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      return fail(`HTTP ${response.status} ${response.statusText}`.trim());
    }
    return succeed(Buffer.from(await response.arrayBuffer()));
  } catch (err) {
    return fail(describeError(err));
  }
}

/** Bind options once so the pipeline gets a plain `(url) => Outcome` function. */
export function createDownloader(options: DownloadOptions = {}): Downloader {
  return (url) => downloadImage(url, options);
}
