/**
 * SQLite storage shared by the fact store, turn ledger and document index.
 * One connection per process, WAL journal, foreign keys on.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { ConfigurationError, withStorage } from '../errors.js';

export type Db = Database.Database;

export const IN_MEMORY = ':memory:';

function ensureParentDir(dbPath: string): void {
  const dir = path.dirname(path.resolve(dbPath));
  try {
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new ConfigurationError(`Cannot create storage directory ${dir}`, err);
  }
  if (!fs.statSync(dir).isDirectory()) {
    throw new ConfigurationError(`Storage parent ${dir} is not a directory`);
  }
}

/**
 * Open (and migrate) the database at `dbPath`.
 * An unusable location raises ConfigurationError.
 */
export function openDatabase(dbPath: string): Db {
  if (!dbPath.trim()) {
    throw new ConfigurationError('Storage location is empty');
  }

  if (dbPath !== IN_MEMORY) {
    ensureParentDir(dbPath);
    if (fs.existsSync(dbPath) && fs.statSync(dbPath).isDirectory()) {
      throw new ConfigurationError(`Storage location ${dbPath} is a directory`);
    }
  }

  let db: Db;
  try {
    db = new Database(dbPath);
  } catch (err) {
    throw new ConfigurationError(`Cannot open storage at ${dbPath}`, err);
  }

  try {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma('temp_store = MEMORY');
    db.pragma('foreign_keys = ON');
    runMigrations(db);
  } catch (err) {
    db.close();
    throw new ConfigurationError(`Storage at ${dbPath} is not a usable database`, err);
  }

  if (dbPath !== IN_MEMORY) {
    console.log(`[Storage] Opened ${path.resolve(dbPath)}`);
  }
  return db;
}

export function runMigrations(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      started_at INTEGER NOT NULL,
      metadata_json TEXT
    );

    CREATE TABLE IF NOT EXISTS turns (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL,
      role TEXT NOT NULL,
      text TEXT NOT NULL,
      asr_latency_ms INTEGER NOT NULL DEFAULT 0,
      llm_latency_ms INTEGER NOT NULL DEFAULT 0,
      tts_latency_ms INTEGER NOT NULL DEFAULT 0,
      total_latency_ms INTEGER NOT NULL DEFAULT 0,
      metadata_json TEXT,
      created_at INTEGER NOT NULL,
      FOREIGN KEY (session_id) REFERENCES sessions(id)
    );
    CREATE INDEX IF NOT EXISTS idx_turns_session ON turns(session_id, id);

    CREATE TABLE IF NOT EXISTS memories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      key TEXT NOT NULL,
      value TEXT NOT NULL,
      score REAL NOT NULL DEFAULT 1.0,
      pinned INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS uq_memories_key_pinned ON memories(key, pinned);
    CREATE INDEX IF NOT EXISTS idx_memories_pinned_created ON memories(pinned, created_at, id);

    CREATE TABLE IF NOT EXISTS documents (
      id TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      title TEXT,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS chunks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      document_id TEXT NOT NULL,
      sequence_no INTEGER NOT NULL,
      text TEXT NOT NULL,
      FOREIGN KEY (document_id) REFERENCES documents(id)
    );
    CREATE UNIQUE INDEX IF NOT EXISTS uq_chunks_document_seq ON chunks(document_id, sequence_no);
  `);
}

/**
 * Reclaim space after bulk deletes.
 * VACUUM cannot run inside a transaction; callers invoke it on its own.
 */
export function compactDatabase(db: Db): void {
  withStorage('compact', () => {
    db.exec('VACUUM');
    if (db.name !== IN_MEMORY) {
      db.pragma('wal_checkpoint(TRUNCATE)');
    }
  });
}

export function closeDatabase(db: Db): void {
  if (db.open) db.close();
}
