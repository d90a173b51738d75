import { mkdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

const IN_MEMORY_PATH = ':memory:';
const SCHEMA_PATH = fileURLToPath(new URL('../../db/schema.sql', import.meta.url));

/**
 * Apply the idempotent schema in backend/db/schema.sql.
 */
export function applySchema(db: SqliteDatabase): void {
  db.exec(readFileSync(SCHEMA_PATH, 'utf8'));
}

/**
 * Open (creating if needed) the SQLite database file and make sure the schema exists.
 *
 * Pass ":memory:" for a throwaway database, as the tests do.
 */
export function openDatabase(databasePath: string): SqliteDatabase {
  const inMemory = databasePath === IN_MEMORY_PATH;
  if (!inMemory) {
    mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
  }

  const db = new Database(databasePath);
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  applySchema(db);
  return db;
}
