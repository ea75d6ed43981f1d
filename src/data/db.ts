/**
 * SQLite database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

export function getDbPath(): string {
  const override = process.env.SCREENER_CACHE_DB?.trim();
  if (override) return override;
  return join(process.cwd(), 'data', 'screener.db');
}

/**
 * Opens a database at `path` (or in memory) with the cache tables in place.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(path);
  if (path !== IN_MEMORY) {
    // WAL lets the CLI read the cache while another scan writes it
    database.pragma('journal_mode = WAL');
  }
  ensureCoreTables(database);
  return database;
}

export function initializeDatabase(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = getDbPath();
  logger.info({ dbPath, isNew: dbPath === IN_MEMORY || !existsSync(dbPath) }, 'Initializing database');
  db = openDatabase(dbPath);
  return db;
}

function ensureCoreTables(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS cache_entries (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      last_updated INTEGER NOT NULL,
      ttl_seconds INTEGER NOT NULL,
      hit_count INTEGER DEFAULT 0
    );
  `);
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
