import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';

export type TaskDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** The raw SQL to create the schema from scratch */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT,
    priority TEXT NOT NULL DEFAULT 'medium' CHECK(priority IN ('low', 'medium', 'high', 'urgent')),
    status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'in_progress', 'completed', 'cancelled')),
    estimated_hours REAL,
    actual_hours REAL,
    due_date TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    is_overdue INTEGER NOT NULL DEFAULT 0,
    sort_order INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
CREATE INDEX IF NOT EXISTS idx_tasks_sort ON tasks(priority, created_at, sort_order);
`;

/**
 * Create an in-memory Drizzle database with the schema applied.
 * Each call returns an independent store; nothing is written to disk.
 */
export function createDb(): TaskDb {
  const sqlite = new Database(':memory:');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(CREATE_SCHEMA_SQL);
  return drizzle(sqlite, { schema });
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Used for transactions and schema inspection.
 */
export function getRawDb(db: TaskDb): Database.Database {
  return db.$client;
}

/**
 * Run `fn` inside one SQLite transaction. Nested calls join the outer
 * transaction as a savepoint. If `fn` throws, every write it made is undone.
 */
export function inTransaction<T>(db: TaskDb, fn: () => T): T {
  return getRawDb(db).transaction(fn)();
}
