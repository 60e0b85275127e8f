/**
 * FILE PURPOSE: Postgres connection factory
 *
 * HOW: postgres.js pool from the configured DATABASE_URL, wrapped in Drizzle ORM.
 *      Opened by the entry point after loadConfig(); nothing connects at import.
 */

import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  /** Drain the pool. Call during graceful shutdown. */
  close(): Promise<void>;
}

export function createDatabase(databaseUrl: string): DatabaseHandle {
  const client = postgres(databaseUrl, {
    max: 5,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  return {
    db: drizzle(client, { schema }),
    async close() {
      try {
        await client.end({ timeout: 5 });
      } catch (err) {
        process.stderr.write(`WARN: Error closing database connection: ${err instanceof Error ? err.message : String(err)}\n`);
      }
    },
  };
}
