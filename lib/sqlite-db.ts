import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { createLogger } from '@/lib/logger';

import { runMigrations } from './migration';

const logger = createLogger('sqlite-db');

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

/**
 * Open the submissions database, creating the schema and applying
 * migrations. Pass `:memory:` for an ephemeral database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  logger.info('Initializing SQLite database', { dbPath });

  if (dbPath !== IN_MEMORY) {
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
      logger.info('Created data directory', { dataDir });
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL'); // Better performance for concurrent reads/writes
  db.pragma('foreign_keys = ON');
  // Status changes must survive a crash right after they are committed
  db.pragma('synchronous = FULL');

  initializeSchema(db);

  runMigrations(db);

  logger.info('SQLite database initialized successfully', { dbPath });

  return db;
}

/**
 * Initialize database schema
 */
function initializeSchema(database: SqliteDatabase): void {
  logger.debug('Initializing database schema');

  database.exec(`
    CREATE TABLE IF NOT EXISTS submissions (
      id TEXT PRIMARY KEY,
      owner_id INTEGER NOT NULL,
      context_kind TEXT NOT NULL CHECK(context_kind IN ('exercise', 'piece', 'session', 'none')),
      context_ref TEXT,
      local_video_path TEXT NOT NULL,
      local_thumbnail_path TEXT,
      video_byte_length INTEGER NOT NULL,
      thumbnail_byte_length INTEGER,
      remote_video_key TEXT,
      remote_thumbnail_key TEXT,
      duration_seconds REAL NOT NULL,
      notes TEXT,
      status TEXT NOT NULL CHECK(status IN ('PENDING', 'UPLOADING', 'UPLOADED', 'FAILED')),
      retry_count INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      last_error_kind TEXT,
      reviewed_at TEXT,
      reviewed_by INTEGER,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      CHECK ((context_kind = 'none') = (context_ref IS NULL)),
      CHECK (status <> 'UPLOADED' OR remote_video_key IS NOT NULL)
    );
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_submissions_status
      ON submissions(status, created_at);

    CREATE INDEX IF NOT EXISTS idx_submissions_owner
      ON submissions(owner_id);
  `);

  logger.debug('Database schema initialized successfully');
}

/**
 * Close the database connection (for cleanup/testing)
 */
export function closeDatabase(db: SqliteDatabase): void {
  if (db.open) {
    db.close();
    logger.info('Database connection closed');
  }
}
