/**
 * Local state store using better-sqlite3.
 * Holds settings, schema snapshots per dataset, and query history.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { randomUUID } from 'node:crypto';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: settings (key-value)
  `CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT
  )`,

  // 2: schema_snapshots
  `CREATE TABLE IF NOT EXISTS schema_snapshots (
    id TEXT PRIMARY KEY,
    dataset TEXT NOT NULL,
    captured_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    snapshot_json TEXT NOT NULL
  )`,

  // 3: queries
  `CREATE TABLE IF NOT EXISTS queries (
    id TEXT PRIMARY KEY,
    seq INTEGER NOT NULL,
    session_id TEXT NOT NULL,
    dataset TEXT NOT NULL,
    asked_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    question TEXT NOT NULL
  )`,
  // 4
  `CREATE INDEX IF NOT EXISTS idx_queries_session ON queries (session_id, seq)`,

  // 5: generations (one per query: the loop outcome)
  `CREATE TABLE IF NOT EXISTS generations (
    id TEXT PRIMARY KEY,
    query_id TEXT NOT NULL UNIQUE,
    generated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    model TEXT NOT NULL,
    success INTEGER NOT NULL,
    sql TEXT,
    error_text TEXT,
    error_kind TEXT,
    attempts_used INTEGER NOT NULL,
    FOREIGN KEY (query_id) REFERENCES queries(id)
  )`,

  // 6: attempts
  `CREATE TABLE IF NOT EXISTS attempts (
    id TEXT PRIMARY KEY,
    generation_id TEXT NOT NULL,
    attempt_index INTEGER NOT NULL,
    temperature REAL NOT NULL,
    raw_model_text TEXT NOT NULL,
    extracted_sql TEXT,
    error_kind TEXT,
    error_text TEXT,
    estimated_bytes INTEGER,
    FOREIGN KEY (generation_id) REFERENCES generations(id)
  )`,

  // 7: executions
  `CREATE TABLE IF NOT EXISTS executions (
    id TEXT PRIMARY KEY,
    query_id TEXT NOT NULL,
    ran_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    sql TEXT NOT NULL,
    exec_ms INTEGER NOT NULL,
    row_count INTEGER NOT NULL,
    truncated INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL,
    error_text TEXT,
    FOREIGN KEY (query_id) REFERENCES queries(id)
  )`,
];

export interface StoredSnapshot {
  id: string;
  dataset: string;
  capturedAt: string;
  snapshotJson: string;
}

// ── Default DB path ──────────────────────────────────────────────────

export function defaultDbPath(): string {
  return join(homedir(), '.askbq', 'askbq.db');
}

// ── LocalStore ───────────────────────────────────────────────────────

export class LocalStore {
  private db: Database.Database;

  /** `:memory:` opens a throwaway database */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]);

    const applied = this.db
      .prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version')
      .all();
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare<[number]>('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        insert.run(i);
      }
    }
  }

  // ── Active dataset (settings) ────────────────────────────────────

  setActiveDataset(dataset: string): void {
    this.db
      .prepare<[string, string]>('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)')
      .run('active_dataset', dataset);
  }

  getActiveDataset(): string | null {
    const row = this.db
      .prepare<[], { value: string | null }>("SELECT value FROM settings WHERE key = 'active_dataset'")
      .get();
    return row?.value ?? null;
  }

  // ── Schema snapshots ────────────────────────────────────────────

  storeSchemaSnapshot(dataset: string, snapshotJson: string): string {
    const id = randomUUID();
    this.db
      .prepare<[string, string, string]>(
        'INSERT INTO schema_snapshots (id, dataset, snapshot_json) VALUES (?, ?, ?)',
      )
      .run(id, dataset, snapshotJson);
    return id;
  }

  getLatestSchemaSnapshot(dataset: string): StoredSnapshot | undefined {
    return this.db
      .prepare<[string], StoredSnapshot>(
        `SELECT id, dataset, captured_at AS capturedAt, snapshot_json AS snapshotJson
         FROM schema_snapshots WHERE dataset = ? ORDER BY captured_at DESC, rowid DESC LIMIT 1`,
      )
      .get(dataset);
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
