import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export interface Db {
  sqlite: Database.Database;
}

const SCHEMA_VERSION = 1;

export function openDb(dbPath: string): Db {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  return { sqlite };
}

const VersionRow = z.object({ version: z.number() });

export function migrate(db: Db) {
  const sqlite = db.sqlite;

  sqlite.exec(
    `CREATE TABLE IF NOT EXISTS schema_meta (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version INTEGER NOT NULL,
      updated_at TEXT NOT NULL
    );`
  );

  const row = VersionRow.safeParse(sqlite.prepare('SELECT version FROM schema_meta WHERE id=1').get());
  const current = row.success ? row.data.version : 0;
  if (current === SCHEMA_VERSION) return;

  // v1 bootstrap
  if (current === 0) {
    sqlite.exec(
      `CREATE TABLE IF NOT EXISTS runs (
        run_id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        started_at TEXT NOT NULL,
        finished_at TEXT,
        status TEXT NOT NULL,
        stats_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS synced_papers (
        title TEXT PRIMARY KEY,
        page_id TEXT,
        source TEXT NOT NULL,
        recommend_score REAL,
        synced_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(started_at);
      CREATE INDEX IF NOT EXISTS idx_synced_papers_synced_at ON synced_papers(synced_at);
      `
    );

    sqlite
      .prepare('INSERT OR REPLACE INTO schema_meta (id, version, updated_at) VALUES (1, ?, ?)')
      .run(1, new Date().toISOString());
  }
}
