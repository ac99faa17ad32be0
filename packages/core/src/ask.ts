/**
 * High-level "ask" orchestration.
 * Ties together the stored schema, the session's conversation, the
 * generation loop, optional execution, and history persistence.
 */

import { randomUUID } from 'node:crypto';
import type { QueryEngine } from './db/types.js';
import { SqlGenerator, type SqlGeneratorOptions } from './generate.js';
import { buildSchemaContext, findRelevantTables } from './llm/schema.js';
import { parseSchemaSnapshot } from './llm/schema_json.js';
import type { TextGenerator } from './llm/types.js';
import type { Logger } from './logger.js';
import type { LocalStore } from './storage/sqlite.js';
import { createQuery, loadConversation, storeExecution, storeGeneration } from './storage/repo.js';
import type { ExecutionResult, GenerationResult } from './types.js';

export interface AskInput {
  question: string;
  dataset: string;
  /** Continue this conversation; a new session starts when omitted */
  sessionId?: string;
  /** Restrict the schema context to these tables */
  tables?: string[];
  /** Without explicit tables, keep only tables the question mentions */
  autoTables?: boolean;
  execute: boolean;
  signal?: AbortSignal;
}

export interface AskDeps {
  generator: TextGenerator;
  engine: QueryEngine;
  logger?: Logger;
  options?: SqlGeneratorOptions;
}

export type AskStatus = 'generated' | 'ok' | 'failed' | 'error';

export interface AskResult {
  queryId: string;
  sessionId: string;
  model: string;
  tables: string[];
  generation: GenerationResult;
  execution: ExecutionResult | null;
  /**
   * generated: SQL ready, not executed. ok: executed. failed: no valid SQL
   * within the retry budget. error: execution failed.
   */
  status: AskStatus;
  error?: string;
}

export async function askQuestion(input: AskInput, store: LocalStore, deps: AskDeps): Promise<AskResult> {
  const db = store.getDb();

  // 1. Load latest schema snapshot
  const stored = store.getLatestSchemaSnapshot(input.dataset);
  if (!stored) {
    throw new Error(
      `No schema snapshot found for dataset "${input.dataset}". ` +
        `Run "askbq schema refresh" first to introspect the dataset.`,
    );
  }
  const snapshot = parseSchemaSnapshot(stored.snapshotJson);

  const allTables = snapshot.tables.map((t) => t.name);
  const tables =
    input.tables && input.tables.length > 0
      ? input.tables
      : input.autoTables
        ? findRelevantTables(input.question, allTables)
        : allTables;
  const schemaContext = buildSchemaContext(snapshot, { tables, includeRowCounts: true });

  // 2. Conversation so far, then record this question
  const sessionId = input.sessionId ?? randomUUID();
  const history = loadConversation(db, sessionId);
  const queryId = createQuery(db, { sessionId, dataset: input.dataset, question: input.question });

  const generator = new SqlGenerator(
    { generator: deps.generator, engine: deps.engine, logger: deps.logger },
    deps.options,
  );
  const base = { queryId, sessionId, model: deps.generator.model, tables };

  // 3. Generate only
  if (!input.execute) {
    const generation = await generator.generateSql(input.question, schemaContext, history, {
      signal: input.signal,
    });
    storeGeneration(db, queryId, deps.generator.model, generation);
    return generation.success
      ? { ...base, generation, execution: null, status: 'generated' }
      : { ...base, generation, execution: null, status: 'failed', error: generation.error ?? undefined };
  }

  // 4. Generate and execute
  const execution = await generator.generateAndExecute(input.question, schemaContext, history, {
    signal: input.signal,
  });
  const generation = execution.generation;
  storeGeneration(db, queryId, deps.generator.model, generation);

  if (!generation.success) {
    return { ...base, generation, execution: null, status: 'failed', error: execution.error };
  }

  storeExecution(db, queryId, {
    sql: execution.sql,
    execMs: execution.execMs,
    rowCount: execution.rowCount,
    truncated: execution.truncated,
    status: execution.success ? 'ok' : 'error',
    errorText: execution.error,
  });

  return execution.success
    ? { ...base, generation, execution, status: 'ok' }
    : { ...base, generation, execution, status: 'error', error: execution.error };
}
