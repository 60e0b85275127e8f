/**
 * FILE PURPOSE: One-shot meme ingestion run
 *
 * HOW: Loads config, the NSFW classifier (unless disabled) and the known-item
 *      index, pulls the top posts of the day from each subreddit, and inserts
 *      everything new in one batch. Exits 1 on any fatal error (store
 *      unreachable, batch insert rejected, bad config).
 *
 * USAGE:
 *   npx tsx scripts/ingest-memes.ts
 *   INGEST_SUBREDDITS=memes,funny INGEST_LIMIT=10 npx tsx scripts/ingest-memes.ts
 */

import { describeError } from '@memefeed/shared-media';
import { loadConfig } from '../apps/ingester/src/config.js';
import { createDatabase } from '../apps/ingester/src/db/index.js';
import { initSentry, reportFatal } from '../apps/ingester/src/observability.js';
import { prepareClassifier, runMemeIngestion } from '../apps/ingester/src/services/meme-ingestion.js';
import { MemeStore } from '../apps/ingester/src/store/meme-store.js';

async function main(): Promise<void> {
  const config = loadConfig();
  initSentry(config.sentryDsn);

  const classifier = await prepareClassifier(config);
  const database = createDatabase(config.databaseUrl);
  try {
    const report = await runMemeIngestion(config, { classifier, store: new MemeStore(database.db) });
    if (report.queued > 0) {
      process.stdout.write(`Inserted ${report.inserted} new memes.\n`);
    }
    process.stdout.write(
      `Summary: ${report.candidates} candidates, ${report.exactDuplicates} exact duplicates, ` +
      `${report.nearDuplicates} near duplicates, ${report.dropped} dropped, ` +
      `${report.heldForReview} held for review, ${report.rejectedUnsafe} rejected\n`,
    );
  } finally {
    await database.close();
  }
}

main().catch(async (err: unknown) => {
  process.stderr.write(`Fatal: ${describeError(err)}\n`);
  await reportFatal(err);
  process.exit(1);
});
