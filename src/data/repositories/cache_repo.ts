/**
 * TTL cache backed by the cache_entries table.
 *
 * Values are stored as JSON text; readers get `unknown` back and narrow it
 * themselves, since the table holds whatever earlier runs wrote.
 */

import type Database from 'better-sqlite3';
import { isCacheExpired } from '@/core/time';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('cache_repo');

export interface CacheProvider {
  get(key: string): unknown;
  set(key: string, value: unknown, ttlSeconds: number): void;
  invalidate(key: string): void;
}

export interface CacheEntry {
  key: string;
  lastUpdated: number;
  ttlSeconds: number;
  hitCount: number;
}

interface CacheRow extends CacheEntry {
  value: string;
}

export class SqliteCacheProvider implements CacheProvider {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now
  ) {}

  getEntry(key: string): CacheEntry | null {
    const row = this.db
      .prepare<[string], CacheEntry>(
        `SELECT key, last_updated as lastUpdated, ttl_seconds as ttlSeconds, hit_count as hitCount
         FROM cache_entries
         WHERE key = ?`
      )
      .get(key);
    return row ?? null;
  }

  /** Returns the cached value, or null when missing or expired. */
  get(key: string): unknown {
    const row = this.db
      .prepare<[string], CacheRow>(
        `SELECT key, value, last_updated as lastUpdated, ttl_seconds as ttlSeconds, hit_count as hitCount
         FROM cache_entries
         WHERE key = ?`
      )
      .get(key);

    if (!row) {
      return null;
    }

    if (isCacheExpired(new Date(row.lastUpdated), row.ttlSeconds, new Date(this.now()))) {
      logger.debug({ key }, 'Cache entry expired');
      return null;
    }

    this.db.prepare('UPDATE cache_entries SET hit_count = hit_count + 1 WHERE key = ?').run(key);
    const parsed: unknown = JSON.parse(row.value);
    return parsed;
  }

  set(key: string, value: unknown, ttlSeconds: number): void {
    this.db
      .prepare(
        `INSERT INTO cache_entries (key, value, last_updated, ttl_seconds, hit_count)
         VALUES (?, ?, ?, ?, 0)
         ON CONFLICT(key) DO UPDATE SET
           value = excluded.value,
           last_updated = excluded.last_updated,
           ttl_seconds = excluded.ttl_seconds`
      )
      .run(key, JSON.stringify(value), this.now(), ttlSeconds);
  }

  invalidate(key: string): void {
    this.db.prepare('DELETE FROM cache_entries WHERE key = ?').run(key);
  }

  cleanupExpired(): number {
    const result = this.db
      .prepare('DELETE FROM cache_entries WHERE last_updated + (ttl_seconds * 1000) <= ?')
      .run(this.now());
    if (result.changes > 0) {
      logger.info({ removed: result.changes }, 'Cleaned up expired cache entries');
    }
    return result.changes;
  }
}
