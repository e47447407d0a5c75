// src/db/SqliteDatabase.ts
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export const SCHEMA_DIR = path.resolve(__dirname, '..', '..', 'db');

export function applySqlFile(db: Database.Database, fileName: string): void {
  const sql = fs.readFileSync(path.join(SCHEMA_DIR, fileName), 'utf8');
  db.exec(sql);
}

export function migrate(db: Database.Database): void {
  applySqlFile(db, 'migrations.sql');
}

/**
 * Opens (or creates) the database file and brings the outbox/ledger schema up to date.
 * The caller owns the handle and closes it.
 */
export function openDatabaseAndMigrate(
  dbPath: string,
  opts: { withSourceTables?: boolean } = {},
): Database.Database {
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  migrate(db);
  if (opts.withSourceTables) {
    applySqlFile(db, 'source-tables.sql');
  }
  return db;
}
