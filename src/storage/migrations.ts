/**
 * @fileoverview Versioned schema migrations, applied in order at open time.
 *
 * The current version lives in `sourcewise_metadata` under `schema_version`.
 * Migrations are append-only: never edit one that has shipped.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export interface MigrationReport {
  fromVersion: number;
  toVersion: number;
  applied: string[];
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: '001_documents',
    sql: [
      'CREATE TABLE IF NOT EXISTS sourcewise_metadata (key TEXT PRIMARY KEY, value TEXT NOT NULL);',
      'CREATE TABLE IF NOT EXISTS documents (id TEXT PRIMARY KEY, filename TEXT NOT NULL, uploaded_at TEXT NOT NULL, size_bytes INTEGER NOT NULL, status TEXT NOT NULL, metadata TEXT NOT NULL DEFAULT \'{}\');',
      'CREATE TABLE IF NOT EXISTS chunks (id TEXT PRIMARY KEY, document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE, chunk_index INTEGER NOT NULL, text TEXT NOT NULL, start_offset INTEGER NOT NULL, end_offset INTEGER NOT NULL, vector TEXT NOT NULL, vector_norm REAL NOT NULL, url TEXT NOT NULL, title TEXT NOT NULL, published_at TEXT NOT NULL);',
      'CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id, chunk_index);',
    ].join('\n'),
  },
  {
    version: 2,
    name: '002_traces',
    sql: [
      'CREATE TABLE IF NOT EXISTS traces (trace_id TEXT PRIMARY KEY, query TEXT NOT NULL, saved_at TEXT NOT NULL);',
      'CREATE TABLE IF NOT EXISTS trace_events (trace_id TEXT NOT NULL REFERENCES traces(trace_id) ON DELETE CASCADE, seq INTEGER NOT NULL, event_id TEXT NOT NULL, agent TEXT NOT NULL, event_type TEXT NOT NULL, timestamp TEXT NOT NULL, payload TEXT NOT NULL, PRIMARY KEY (trace_id, seq));',
    ].join('\n'),
  },
];

export const CURRENT_SCHEMA_VERSION = MIGRATIONS.reduce((max, migration) => Math.max(max, migration.version), 0);

const hasMetadataTable = (db: Database.Database): boolean =>
  db.prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'sourcewise_metadata'").get() !==
  undefined;

export const readSchemaVersion = (db: Database.Database): number => {
  if (!hasMetadataTable(db)) return 0;
  const row = db.prepare<[string], { value: string }>('SELECT value FROM sourcewise_metadata WHERE key = ?').get('schema_version');
  const parsed = Number.parseInt(row?.value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : 0;
};

const writeSchemaVersion = (db: Database.Database, version: number): void => {
  db.prepare('INSERT INTO sourcewise_metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value')
    .run('schema_version', String(version));
};

export function applyMigrations(db: Database.Database): MigrationReport {
  const fromVersion = readSchemaVersion(db);
  const pending = MIGRATIONS.filter((migration) => migration.version > fromVersion);
  const applied: string[] = [];
  const apply = db.transaction(() => {
    for (const migration of pending) {
      db.exec(migration.sql);
      writeSchemaVersion(db, migration.version);
      applied.push(migration.name);
    }
  });
  apply();
  return { fromVersion, toVersion: Math.max(fromVersion, CURRENT_SCHEMA_VERSION), applied };
}
