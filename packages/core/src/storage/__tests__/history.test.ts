import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import type { GenerationResult } from '../../types.js';
import {
  createQuery,
  findQueryId,
  getHistoryItem,
  listHistory,
  loadConversation,
  storeExecution,
  storeGeneration,
} from '../repo.js';
import { LocalStore } from '../sqlite.js';

const okGeneration: GenerationResult = {
  success: true,
  sql: 'SELECT COUNT(*) AS n FROM `demo.shop.users` LIMIT 1',
  error: null,
  errorKind: null,
  attemptsUsed: 2,
  attempts: [
    {
      attemptIndex: 1,
      promptUsed: 'p1',
      temperature: 0.1,
      rawModelText: 'DELETE FROM users',
      extractedSql: 'DELETE FROM users',
      validationError: 'Statement type DELETE is not allowed',
    },
    {
      attemptIndex: 2,
      promptUsed: 'p2',
      temperature: 0.2,
      rawModelText: '```sql\nSELECT COUNT(*) AS n FROM `demo.shop.users` LIMIT 1\n```',
      extractedSql: 'SELECT COUNT(*) AS n FROM `demo.shop.users` LIMIT 1',
      estimatedBytes: 1024,
    },
  ],
};

const failedGeneration: GenerationResult = {
  success: false,
  sql: null,
  error: 'Could not extract SQL from response',
  errorKind: 'extraction',
  attemptsUsed: 1,
  attempts: [
    {
      attemptIndex: 1,
      promptUsed: 'p1',
      temperature: 0.1,
      rawModelText: 'Sorry, I cannot help.',
      extractionError: 'Could not extract SQL from response',
    },
  ],
};

describe('LocalStore', () => {
  let store: LocalStore;

  beforeEach(() => {
    store = new LocalStore(':memory:');
    store.migrate();
  });

  afterEach(() => {
    store.close();
  });

  it('is safe to migrate twice', () => {
    store.migrate();
    const row = store.getDb().prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM migrations').get();
    assert.equal(row?.n, 7);
  });

  it('remembers the active dataset', () => {
    assert.equal(store.getActiveDataset(), null);
    store.setActiveDataset('shop');
    store.setActiveDataset('sales');
    assert.equal(store.getActiveDataset(), 'sales');
  });

  it('returns the latest snapshot for a dataset', () => {
    store.storeSchemaSnapshot('shop', '{"v":1}');
    const id = store.storeSchemaSnapshot('shop', '{"v":2}');
    store.storeSchemaSnapshot('sales', '{"v":3}');

    const latest = store.getLatestSchemaSnapshot('shop');
    assert.equal(latest?.id, id);
    assert.equal(latest?.snapshotJson, '{"v":2}');
    assert.equal(latest?.dataset, 'shop');
    assert.equal(store.getLatestSchemaSnapshot('missing'), undefined);
  });
});

describe('query history', () => {
  let store: LocalStore;

  beforeEach(() => {
    store = new LocalStore(':memory:');
    store.migrate();
  });

  afterEach(() => {
    store.close();
  });

  it('stores a generation with its attempts and an execution', () => {
    const db = store.getDb();
    const queryId = createQuery(db, { sessionId: 's1', dataset: 'shop', question: 'How many users?' });
    storeGeneration(db, queryId, 'test-model', okGeneration);
    storeExecution(db, queryId, {
      sql: okGeneration.sql ?? '',
      execMs: 12,
      rowCount: 1,
      truncated: false,
      status: 'ok',
    });

    const detail = getHistoryItem(db, queryId);
    assert.ok(detail);
    assert.equal(detail.query.question, 'How many users?');
    assert.equal(detail.query.sessionId, 's1');
    assert.ok(detail.generation);
    assert.equal(detail.generation.success, true);
    assert.equal(detail.generation.model, 'test-model');
    assert.equal(detail.generation.attemptsUsed, 2);
    assert.deepEqual(detail.generation.attempts, [
      {
        attemptIndex: 1,
        temperature: 0.1,
        rawModelText: 'DELETE FROM users',
        extractedSql: 'DELETE FROM users',
        errorKind: 'validation',
        errorText: 'Statement type DELETE is not allowed',
        estimatedBytes: null,
      },
      {
        attemptIndex: 2,
        temperature: 0.2,
        rawModelText: '```sql\nSELECT COUNT(*) AS n FROM `demo.shop.users` LIMIT 1\n```',
        extractedSql: 'SELECT COUNT(*) AS n FROM `demo.shop.users` LIMIT 1',
        errorKind: null,
        errorText: null,
        estimatedBytes: 1024,
      },
    ]);
    assert.ok(detail.execution);
    assert.equal(detail.execution.status, 'ok');
    assert.equal(detail.execution.truncated, false);
    assert.equal(detail.execution.rowCount, 1);
  });

  it('returns null for an unknown id', () => {
    assert.equal(getHistoryItem(store.getDb(), 'nope'), null);
  });

  it('lists newest first and filters by session', () => {
    const db = store.getDb();
    const first = createQuery(db, { sessionId: 's1', dataset: 'shop', question: 'first' });
    storeGeneration(db, first, 'test-model', okGeneration);
    const second = createQuery(db, { sessionId: 's2', dataset: 'shop', question: 'second' });
    storeGeneration(db, second, 'test-model', failedGeneration);
    createQuery(db, { sessionId: 's1', dataset: 'shop', question: 'third' });

    assert.deepEqual(
      listHistory(db).map((item) => [item.question, item.success, item.attemptsUsed]),
      [
        ['third', null, null],
        ['second', false, 1],
        ['first', true, 2],
      ],
    );
    assert.deepEqual(
      listHistory(db, { sessionId: 's1', limit: 1 }).map((item) => item.question),
      ['third'],
    );
  });

  it('resolves ids from a prefix', () => {
    const db = store.getDb();
    const id = createQuery(db, { sessionId: 's1', dataset: 'shop', question: 'q' });
    assert.equal(findQueryId(db, id.slice(0, 8)), id);
    assert.equal(findQueryId(db, 'zzzz'), null);
  });

  it('treats LIKE wildcards in a prefix literally', () => {
    const db = store.getDb();
    createQuery(db, { sessionId: 's1', dataset: 'shop', question: 'q' });
    assert.equal(findQueryId(db, '%'), null);
    assert.equal(findQueryId(db, '________'), null);
    assert.equal(findQueryId(db, ''), null);
  });

  it('loads a conversation oldest first with sql only for successes', () => {
    const db = store.getDb();
    const first = createQuery(db, { sessionId: 's1', dataset: 'shop', question: 'How many users?' });
    storeGeneration(db, first, 'test-model', okGeneration);
    const second = createQuery(db, { sessionId: 's1', dataset: 'shop', question: 'And orders?' });
    storeGeneration(db, second, 'test-model', failedGeneration);
    createQuery(db, { sessionId: 'other', dataset: 'shop', question: 'unrelated' });

    assert.deepEqual(loadConversation(db, 's1'), [
      { question: 'How many users?', sql: okGeneration.sql, error: null },
      { question: 'And orders?', sql: null, error: 'Could not extract SQL from response' },
    ]);
  });

  it('uses the execution error for generated queries that failed to run', () => {
    const db = store.getDb();
    const id = createQuery(db, { sessionId: 's1', dataset: 'shop', question: 'q' });
    storeGeneration(db, id, 'test-model', okGeneration);
    storeExecution(db, id, {
      sql: 'SELECT 1',
      execMs: 3,
      rowCount: 0,
      truncated: false,
      status: 'error',
      errorText: 'Query execution failed: quota exceeded',
    });

    assert.deepEqual(loadConversation(db, 's1'), [
      { question: 'q', sql: okGeneration.sql, error: 'Query execution failed: quota exceeded' },
    ]);
  });
});
