/**
 * FILE PURPOSE: Redis URL → BullMQ connection options
 *
 * The URL comes from the caller's config (REDIS_URL); nothing here reads the
 * environment. Accepts `redis://` and `rediss://` (TLS), with optional
 * credentials and a `/<db>` path.
 */

export interface RedisConnectionOptions {
  host: string;
  port: number;
  username: string | undefined;
  password: string | undefined;
  db: number;
  tls: Record<string, never> | undefined;
  /** BullMQ workers issue blocking commands; a retry cap makes them fail. */
  maxRetriesPerRequest: null;
}

const DEFAULT_REDIS_PORT = 6379;

export function redisConnectionFromUrl(redisUrl: string): RedisConnectionOptions {
  const url = new URL(redisUrl);
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new RangeError(`Unsupported Redis URL scheme "${url.protocol}"`);
  }

  const dbPath = url.pathname.replace(/^\/+/, '');
  const db = dbPath ? Number(dbPath) : 0;
  if (!Number.isInteger(db) || db < 0) {
    throw new RangeError(`Invalid Redis database index "${dbPath}"`);
  }

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_REDIS_PORT,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db,
    tls: url.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}
