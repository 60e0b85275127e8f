/**
 * FILE PURPOSE: Postgres-backed store for the ingestion pipeline
 * WHY: The pipeline only knows KnownItemSource + RecordSink. This is the one
 *      place that maps those onto the memes table.
 */

import { asc } from 'drizzle-orm';
import type { KnownItem, KnownItemSource, MemeRecord, RecordSink } from '@memefeed/shared-media';
import { memes } from '../db/index.js';
import type { Database, NewMeme } from '../db/index.js';

function toRow(record: MemeRecord): NewMeme {
  return {
    title: record.title,
    imageUrl: record.imageUrl,
    sourceUrl: record.sourceUrl,
    author: record.author,
    score: record.score,
    exactHash: record.exactHash,
    perceptualHash: record.perceptualHash,
    unsafeScore: record.unsafeScore,
    duplicateOf: record.duplicateOf,
    status: record.status,
  };
}

export class MemeStore implements KnownItemSource, RecordSink {
  constructor(private readonly db: Database) {}

  /** Every stored meme's identity hashes, oldest first. */
  async listKnownItems(): Promise<KnownItem[]> {
    return this.db
      .select({ id: memes.id, exactHash: memes.exactHash, perceptualHash: memes.perceptualHash })
      .from(memes)
      .orderBy(asc(memes.createdAt));
  }

  /** Single multi-row insert. All or nothing. */
  async insertRecords(records: readonly MemeRecord[]): Promise<number> {
    if (records.length === 0) return 0;
    const inserted = await this.db
      .insert(memes)
      .values(records.map(toRow))
      .returning({ id: memes.id });
    return inserted.length;
  }
}
