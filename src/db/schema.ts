/**
 * SQLite Archive Schema and Migrations
 */

import Database from 'better-sqlite3';
import { join } from 'path';
import { ensureHomeDir, getHomeDir } from '../config/index.js';

// Current schema version
const SCHEMA_VERSION = 1;

/**
 * Default archive location inside the huffpack home directory
 */
export function getArchivePath(): string {
  return join(getHomeDir(), 'archive.db');
}

/**
 * Initialize database with schema
 */
export function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY
    );
  `);

  // Check current version
  const versionRow = db
    .prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1')
    .get();
  const currentVersion = versionRow?.version ?? 0;

  if (currentVersion < SCHEMA_VERSION) {
    migrate(db, currentVersion, SCHEMA_VERSION);
  }
}

/**
 * Run migrations from one version to another
 */
function migrate(db: Database.Database, from: number, to: number): void {
  const migrations: Array<(db: Database.Database) => void> = [
    migrateV0toV1,
  ];

  db.transaction(() => {
    for (let v = from; v < to; v++) {
      migrations[v](db);
    }

    db.prepare('DELETE FROM schema_version').run();
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(to);
  })();
}

/**
 * Migration from v0 (fresh) to v1
 */
function migrateV0toV1(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS archives (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      original_size INTEGER NOT NULL,
      stored_size INTEGER NOT NULL,
      distinct_symbols INTEGER NOT NULL CHECK(distinct_symbols BETWEEN 0 AND 256),
      bit_length INTEGER NOT NULL,
      container BLOB NOT NULL,
      created_at INTEGER NOT NULL,
      accessed_at INTEGER NOT NULL,
      access_count INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_archives_created ON archives(created_at DESC);
  `);
}

/**
 * Open the archive database; pass ':memory:' for a throwaway instance
 */
export function openArchiveDb(path?: string): Database.Database {
  const dbPath = path ?? getArchivePath();
  if (path === undefined) {
    ensureHomeDir();
  }
  const db = new Database(dbPath);
  initializeSchema(db);
  return db;
}

/**
 * Current schema version of an open database
 */
export function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1')
    .get();
  return row?.version ?? 0;
}

export { SCHEMA_VERSION };
