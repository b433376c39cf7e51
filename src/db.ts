import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { EventRecord } from './types.js';

export type RecorderDatabase = Database.Database;

const SCHEMA_VERSION = 2;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL,
    source TEXT NOT NULL,
    kind TEXT NOT NULL,
    severity TEXT NOT NULL,
    message TEXT NOT NULL,
    meta TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_events_ts ON events (ts);
  CREATE INDEX IF NOT EXISTS idx_events_source_kind ON events (source, kind);

  CREATE TABLE IF NOT EXISTS upload_tasks (
    booking_id TEXT PRIMARY KEY,
    camera_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    artifact_path TEXT NOT NULL,
    attempt_count INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL,
    next_attempt_at INTEGER NOT NULL,
    last_error TEXT,
    remote_url TEXT,
    storage_key TEXT,
    size_bytes INTEGER,
    checksum TEXT,
    booking_date TEXT,
    starts_at INTEGER,
    ends_at INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_upload_tasks_status ON upload_tasks (status, next_attempt_at);
`;

// Columns added after version 1; fresh databases get them from SCHEMA.
const UPLOAD_TASK_COLUMNS_V2: Array<[string, string]> = [
  ['storage_key', 'TEXT'],
  ['booking_date', 'TEXT'],
  ['starts_at', 'INTEGER'],
  ['ends_at', 'INTEGER']
];

function migrate(db: RecorderDatabase, fromVersion: number) {
  if (fromVersion < 2) {
    const existing = new Set(
      (db.prepare('PRAGMA table_info(upload_tasks)').all() as Array<{ name: string }>).map(column => column.name)
    );
    for (const [name, type] of UPLOAD_TASK_COLUMNS_V2) {
      if (!existing.has(name)) {
        db.exec(`ALTER TABLE upload_tasks ADD COLUMN ${name} ${type}`);
      }
    }
  }
}

function readUserVersion(db: RecorderDatabase): number {
  const row = db.prepare('PRAGMA user_version').get() as { user_version?: number } | undefined;
  const value = typeof row?.user_version === 'number' ? row.user_version : 0;
  return Number.isFinite(value) ? value : 0;
}

export function openDatabase(filePath: string): RecorderDatabase {
  if (filePath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  }

  const db = new Database(filePath);
  if (filePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);

  const version = readUserVersion(db);
  if (version < SCHEMA_VERSION) {
    migrate(db, version);
    db.exec(`PRAGMA user_version = ${SCHEMA_VERSION}`);
  }

  return db;
}

/** Append-only lifecycle event log capped at `maxStored` rows. */
export class EventStore {
  private readonly insertStatement: Database.Statement;
  private readonly pruneStatement: Database.Statement;

  constructor(
    db: RecorderDatabase,
    private readonly maxStored = 5000
  ) {
    this.insertStatement = db.prepare(
      'INSERT INTO events (ts, source, kind, severity, message, meta) VALUES (@ts, @source, @kind, @severity, @message, @meta)'
    );
    this.pruneStatement = db.prepare(
      'DELETE FROM events WHERE id NOT IN (SELECT id FROM events ORDER BY id DESC LIMIT @keep)'
    );
  }

  store(event: EventRecord): number {
    const result = this.insertStatement.run({
      ts: event.ts,
      source: event.source,
      kind: event.kind,
      severity: event.severity,
      message: event.message,
      meta: event.meta ? JSON.stringify(event.meta) : null
    });
    const id = Number(result.lastInsertRowid);
    if (id % 100 === 0) {
      this.prune();
    }
    return id;
  }

  prune(): number {
    return this.pruneStatement.run({ keep: this.maxStored }).changes;
  }
}
