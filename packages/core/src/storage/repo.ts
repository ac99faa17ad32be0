/**
 * Query history repository.
 * Stores questions, generation attempts, and execution runs.
 * NEVER stores result row data.
 */

import type Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import type {
  AttemptErrorKind,
  ChatTurn,
  GenerationAttempt,
  GenerationErrorKind,
  GenerationResult,
} from '../types.js';

// ── Types ────────────────────────────────────────────────────────────

export interface NewQuery {
  sessionId: string;
  dataset: string;
  question: string;
}

export interface StoredExecution {
  sql: string;
  execMs: number;
  rowCount: number;
  truncated: boolean;
  status: 'ok' | 'error';
  errorText?: string;
}

export interface HistoryItem {
  id: string;
  sessionId: string;
  dataset: string;
  question: string;
  askedAt: string;
}

export interface HistoryListItem {
  id: string;
  sessionId: string;
  question: string;
  askedAt: string;
  success: boolean | null;
  attemptsUsed: number | null;
  runStatus: string | null;
  rowCount: number | null;
}

export interface StoredAttempt {
  attemptIndex: number;
  temperature: number;
  rawModelText: string;
  extractedSql: string | null;
  errorKind: AttemptErrorKind | null;
  errorText: string | null;
  estimatedBytes: number | null;
}

export interface HistoryDetail {
  query: HistoryItem;
  generation: {
    id: string;
    model: string;
    success: boolean;
    sql: string | null;
    errorText: string | null;
    errorKind: GenerationErrorKind | null;
    attemptsUsed: number;
    generatedAt: string;
    attempts: StoredAttempt[];
  } | null;
  execution: {
    id: string;
    sql: string;
    execMs: number;
    rowCount: number;
    truncated: boolean;
    status: string;
    errorText: string | null;
    ranAt: string;
  } | null;
}

interface GenerationRow {
  id: string;
  model: string;
  success: number;
  sql: string | null;
  errorText: string | null;
  errorKind: string | null;
  attemptsUsed: number;
  generatedAt: string;
}

interface AttemptRow {
  attemptIndex: number;
  temperature: number;
  rawModelText: string;
  extractedSql: string | null;
  errorKind: string | null;
  errorText: string | null;
  estimatedBytes: number | null;
}

interface ExecutionRow {
  id: string;
  sql: string;
  execMs: number;
  rowCount: number;
  truncated: number;
  status: string;
  errorText: string | null;
  ranAt: string;
}

interface HistoryListRow {
  id: string;
  sessionId: string;
  question: string;
  askedAt: string;
  success: number | null;
  attemptsUsed: number | null;
  runStatus: string | null;
  rowCount: number | null;
}

interface ConversationRow {
  question: string;
  success: number | null;
  sql: string | null;
  generationError: string | null;
  runError: string | null;
}

// ── Repository functions ─────────────────────────────────────────────

export function createQuery(db: Database.Database, query: NewQuery): string {
  const id = randomUUID();
  db.prepare<[string, string, string, string]>(
    `INSERT INTO queries (id, seq, session_id, dataset, question)
     VALUES (?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM queries), ?, ?, ?)`,
  ).run(id, query.sessionId, query.dataset, query.question);
  return id;
}

/** Store the loop outcome and every attempt in one transaction. */
export function storeGeneration(
  db: Database.Database,
  queryId: string,
  model: string,
  result: GenerationResult,
): string {
  const id = randomUUID();
  const insertGeneration = db.prepare<
    [string, string, string, number, string | null, string | null, string | null, number]
  >(
    `INSERT INTO generations (id, query_id, model, success, sql, error_text, error_kind, attempts_used)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const insertAttempt = db.prepare<
    [string, string, number, number, string, string | null, string | null, string | null, number | null]
  >(
    `INSERT INTO attempts (id, generation_id, attempt_index, temperature, raw_model_text, extracted_sql, error_kind, error_text, estimated_bytes)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );

  db.transaction(() => {
    insertGeneration.run(
      id,
      queryId,
      model,
      result.success ? 1 : 0,
      result.sql,
      result.error,
      result.errorKind,
      result.attemptsUsed,
    );
    for (const attempt of result.attempts) {
      const failure = attemptFailure(attempt);
      insertAttempt.run(
        randomUUID(),
        id,
        attempt.attemptIndex,
        attempt.temperature,
        attempt.rawModelText,
        attempt.extractedSql ?? null,
        failure?.kind ?? null,
        failure?.text ?? null,
        attempt.estimatedBytes ?? null,
      );
    }
  })();

  return id;
}

export function storeExecution(
  db: Database.Database,
  queryId: string,
  run: StoredExecution,
): string {
  const id = randomUUID();
  db.prepare<[string, string, string, number, number, number, string, string | null]>(
    `INSERT INTO executions (id, query_id, sql, exec_ms, row_count, truncated, status, error_text)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    queryId,
    run.sql,
    run.execMs,
    run.rowCount,
    run.truncated ? 1 : 0,
    run.status,
    run.errorText ?? null,
  );
  return id;
}

export function listHistory(
  db: Database.Database,
  opts: { limit?: number; sessionId?: string } = {},
): HistoryListItem[] {
  const limit = opts.limit ?? 20;
  const rows = db
    .prepare<[string | null, string | null, number], HistoryListRow>(
      `SELECT q.id, q.session_id AS sessionId, q.question, q.asked_at AS askedAt,
              g.success, g.attempts_used AS attemptsUsed,
              e.status AS runStatus, e.row_count AS rowCount
       FROM queries q
       LEFT JOIN generations g ON g.query_id = q.id
       LEFT JOIN executions e ON e.query_id = q.id
       WHERE (? IS NULL OR q.session_id = ?)
       ORDER BY q.seq DESC
       LIMIT ?`,
    )
    .all(opts.sessionId ?? null, opts.sessionId ?? null, limit);

  return rows.map((row) => ({ ...row, success: row.success === null ? null : row.success === 1 }));
}

/** Resolve a full query id from a unique-enough prefix. */
export function findQueryId(db: Database.Database, idOrPrefix: string): string | null {
  if (!idOrPrefix) return null;
  // `%` and `_` in the prefix match literally
  const pattern = idOrPrefix.replace(/[\\%_]/g, (ch) => `\\${ch}`) + '%';
  const row = db
    .prepare<[string], { id: string }>(
      `SELECT id FROM queries WHERE id LIKE ? ESCAPE '\\' ORDER BY seq DESC LIMIT 1`,
    )
    .get(pattern);
  return row?.id ?? null;
}

export function getHistoryItem(db: Database.Database, id: string): HistoryDetail | null {
  const query = db
    .prepare<[string], HistoryItem>(
      `SELECT id, session_id AS sessionId, dataset, question, asked_at AS askedAt
       FROM queries WHERE id = ?`,
    )
    .get(id);

  if (!query) return null;

  const genRow = db
    .prepare<[string], GenerationRow>(
      `SELECT id, model, success, sql, error_text AS errorText, error_kind AS errorKind,
              attempts_used AS attemptsUsed, generated_at AS generatedAt
       FROM generations WHERE query_id = ?`,
    )
    .get(id);

  const attemptRows = genRow
    ? db
        .prepare<[string], AttemptRow>(
          `SELECT attempt_index AS attemptIndex, temperature, raw_model_text AS rawModelText,
                  extracted_sql AS extractedSql, error_kind AS errorKind, error_text AS errorText,
                  estimated_bytes AS estimatedBytes
           FROM attempts WHERE generation_id = ? ORDER BY attempt_index`,
        )
        .all(genRow.id)
    : [];

  const runRow = db
    .prepare<[string], ExecutionRow>(
      `SELECT id, sql, exec_ms AS execMs, row_count AS rowCount, truncated, status,
              error_text AS errorText, ran_at AS ranAt
       FROM executions WHERE query_id = ? ORDER BY ran_at DESC LIMIT 1`,
    )
    .get(id);

  return {
    query,
    generation: genRow
      ? {
          id: genRow.id,
          model: genRow.model,
          success: genRow.success === 1,
          sql: genRow.sql,
          errorText: genRow.errorText,
          errorKind: toGenerationErrorKind(genRow.errorKind),
          attemptsUsed: genRow.attemptsUsed,
          generatedAt: genRow.generatedAt,
          attempts: attemptRows.map((row) => ({
            ...row,
            errorKind: toAttemptErrorKind(row.errorKind),
          })),
        }
      : null,
    execution: runRow ? { ...runRow, truncated: runRow.truncated === 1 } : null,
  };
}

/**
 * A session's turns, oldest first. Only successful generations carry
 * `sql`; failures carry the error that ended them.
 */
export function loadConversation(
  db: Database.Database,
  sessionId: string,
  limit = 50,
): ChatTurn[] {
  const rows = db
    .prepare<[string, number], ConversationRow>(
      `SELECT q.question, g.success, g.sql, g.error_text AS generationError, e.error_text AS runError
       FROM queries q
       LEFT JOIN generations g ON g.query_id = q.id
       LEFT JOIN executions e ON e.query_id = q.id
       WHERE q.session_id = ?
       ORDER BY q.seq DESC
       LIMIT ?`,
    )
    .all(sessionId, limit);

  return rows.reverse().map((row) => ({
    question: row.question,
    sql: row.success === 1 ? row.sql : null,
    error: row.generationError ?? row.runError,
  }));
}

// ── Helpers ──────────────────────────────────────────────────────────

function attemptFailure(attempt: GenerationAttempt): { kind: AttemptErrorKind; text: string } | null {
  if (attempt.transportError !== undefined) return { kind: 'transport', text: attempt.transportError };
  if (attempt.extractionError !== undefined) return { kind: 'extraction', text: attempt.extractionError };
  if (attempt.validationError !== undefined) return { kind: 'validation', text: attempt.validationError };
  if (attempt.dryRunError !== undefined) return { kind: 'dry_run', text: attempt.dryRunError };
  return null;
}

function toAttemptErrorKind(value: string | null): AttemptErrorKind | null {
  switch (value) {
    case 'transport':
    case 'extraction':
    case 'validation':
    case 'dry_run':
      return value;
    default:
      return null;
  }
}

function toGenerationErrorKind(value: string | null): GenerationErrorKind | null {
  return value === 'cancelled' ? value : toAttemptErrorKind(value);
}
