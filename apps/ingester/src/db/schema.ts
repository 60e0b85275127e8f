/**
 * FILE PURPOSE: Database schema for stored memes
 *
 * HOW: Drizzle ORM schema definitions. Run `npm run db:push` to sync to DB.
 *
 * exact_hash and perceptual_hash are nullable: rows written before hashing
 * existed (or whose image never decoded) still take part in duplicate checks
 * for whichever hash they do have.
 */

import {
  pgTable,
  uuid,
  text,
  integer,
  real,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';

export const memes = pgTable(
  'memes',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    title: text('title').notNull(),
    imageUrl: text('image_url').notNull(),
    sourceUrl: text('source_url').notNull().default(''),
    author: text('author'),
    score: integer('score').default(0).notNull(),
    exactHash: text('exact_hash'),
    perceptualHash: text('perceptual_hash'),        // 16 hex chars (64-bit DCT hash)
    unsafeScore: real('unsafe_score').default(0).notNull(),
    // Near-duplicate lineage: the stored meme this one resembles
    duplicateOf: uuid('duplicate_of').references((): AnyPgColumn => memes.id, { onDelete: 'set null' }),
    status: text('status').notNull(),               // approved | pending (configurable)
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_memes_exact_hash').on(table.exactHash),
    index('idx_memes_status_created').on(table.status, table.createdAt),
  ],
);

export type Meme = typeof memes.$inferSelect;
export type NewMeme = typeof memes.$inferInsert;
