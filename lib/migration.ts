import type { Database } from 'better-sqlite3';
import { createLogger } from '@/lib/logger';

const logger = createLogger('migration');

export interface Migration {
  name: string;
  migrate: (db: Database) => void;
}

// Applied in order, each at most once per database
export const MIGRATIONS: readonly Migration[] = [
  {
    name: 'add-server-annotations',
    migrate: addServerAnnotations,
  },
  {
    name: 'add-deletion-tombstones',
    migrate: addDeletionTombstones,
  },
];

interface ColumnInfo {
  name: string;
}

function hasColumn(db: Database, table: string, column: string): boolean {
  const columns = db
    .prepare<[], ColumnInfo>(`SELECT name FROM pragma_table_info('${table}')`)
    .all();
  return columns.some(col => col.name === column);
}

/**
 * Downstream features (markers, mastery) attach annotations to reviewed
 * submissions; `server_updated_at` versions them for last-writer-wins merges.
 */
function addServerAnnotations(db: Database): void {
  logger.info('Running migration: add-server-annotations');

  if (!hasColumn(db, 'submissions', 'annotations')) {
    db.exec('ALTER TABLE submissions ADD COLUMN annotations TEXT');
  }
  if (!hasColumn(db, 'submissions', 'server_updated_at')) {
    db.exec('ALTER TABLE submissions ADD COLUMN server_updated_at TEXT');
  }
}

/**
 * Server deletions that could not be delivered while offline
 */
function addDeletionTombstones(db: Database): void {
  logger.info('Running migration: add-deletion-tombstones');

  db.exec(`
    CREATE TABLE IF NOT EXISTS deletion_tombstones (
      submission_id TEXT PRIMARY KEY,
      owner_id INTEGER NOT NULL,
      requested_at TEXT NOT NULL,
      attempts INTEGER NOT NULL DEFAULT 0,
      last_error TEXT
    );
  `);
}

export function runMigrations(
  db: Database,
  migrations: readonly Migration[] = MIGRATIONS
): void {
  logger.debug('Running database migrations...');

  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      run_at TEXT NOT NULL
    );
  `);

  const completedMigrations = new Set(
    db
      .prepare<[], { name: string }>('SELECT name FROM migrations')
      .all()
      .map(m => m.name)
  );

  for (const migration of migrations) {
    if (completedMigrations.has(migration.name)) continue;

    // Schema change and bookkeeping commit together
    const apply = db.transaction(() => {
      migration.migrate(db);
      db.prepare('INSERT INTO migrations (name, run_at) VALUES (?, ?)').run(
        migration.name,
        new Date().toISOString()
      );
    });

    try {
      apply();
      logger.info(`Migration ${migration.name} completed successfully`);
    } catch (error) {
      logger.error(`Migration ${migration.name} failed`, error);
      throw error;
    }
  }

  logger.debug('Database migrations are up to date.');
}
