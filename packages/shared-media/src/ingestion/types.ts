/**
 * FILE PURPOSE: Core types for the meme ingestion pipeline
 *
 * WHY: The feed, the store and the classifier are external collaborators.
 *      The pipeline only sees the interfaces below, so each one can be
 *      swapped (or faked in tests) without touching the decision logic.
 */

import type { Outcome } from '../outcome.js';

/** An item proposed by a feed source, before download. */
export interface Candidate {
  readonly title: string;
  readonly imageUrl: string;
  /** Permalink to the post the image came from; '' when the feed has none. */
  readonly sourceUrl: string;
  readonly author: string | null;
  /** Popularity at fetch time (upvotes for Reddit). */
  readonly score: number;
}

/** Identity hashes derived from one image's raw bytes. */
export interface ImageHashes {
  /** SHA-256 hex digest of the bytes as downloaded. */
  readonly exactHash: string;
  /** 64-bit DCT perceptual hash as 16 hex chars; null when the image did not decode. */
  readonly perceptualHash: string | null;
}

export interface Fingerprint extends ImageHashes {
  /** 0 = safe, 1 = certainly unsafe. */
  readonly unsafeScore: number;
}

/** Projection of a stored item, enough for duplicate checks. */
export interface KnownItem {
  readonly id: string;
  readonly exactHash: string | null;
  readonly perceptualHash: string | null;
}

export interface NearCandidate {
  readonly perceptualHash: string;
  readonly id: string;
}

export type DuplicateVerdict =
  | { readonly kind: 'unique' }
  | { readonly kind: 'exact-duplicate'; readonly matchedId: string }
  | { readonly kind: 'near-duplicate'; readonly matchedId: string; readonly distance: number };

/** Row handed to the store for every candidate that survives the decision policy. */
export interface MemeRecord {
  readonly title: string;
  readonly imageUrl: string;
  readonly sourceUrl: string;
  readonly author: string | null;
  readonly score: number;
  readonly exactHash: string;
  readonly perceptualHash: string | null;
  readonly unsafeScore: number;
  /** Id of the near-duplicate this record resembles, if any. */
  readonly duplicateOf: string | null;
  readonly status: string;
}

// ─── Collaborators ───

/** Supplies candidates for one source (a subreddit, a channel, ...). */
export interface FeedSource {
  fetchCandidates(sourceId: string, limit: number): Promise<Candidate[]>;
}

/** Bulk read of every stored item's identity hashes. */
export interface KnownItemSource {
  listKnownItems(): Promise<KnownItem[]>;
}

/** Bulk insert; resolves to the number of rows the store acknowledged. */
export interface RecordSink {
  insertRecords(records: readonly MemeRecord[]): Promise<number>;
}

/**
 * Single-image classifier returning a probability per safety category.
 * Loaded once per process and passed explicitly; `null` means no classifier.
 */
export interface SafetyClassifier {
  classify(bytes: Buffer): Promise<Record<string, number>>;
}

/** Fetches raw image bytes. */
export type Downloader = (url: string) => Promise<Outcome<Buffer>>;
