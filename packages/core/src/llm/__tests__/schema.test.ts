import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { SchemaSnapshot } from '../../db/types.js';
import { buildMinimalContext, buildSchemaContext, findRelevantTables } from '../schema.js';
import { parseSchemaSnapshot } from '../schema_json.js';

const snapshot: SchemaSnapshot = {
  project: 'demo',
  dataset: 'shop',
  capturedAt: '2026-01-01T00:00:00.000Z',
  tables: [
    {
      name: 'orders',
      fullName: 'demo.shop.orders',
      description: 'One row per order',
      rowCount: 12345,
      columns: [
        { name: 'id', dataType: 'INT64', mode: 'REQUIRED' },
        { name: 'amount', dataType: 'NUMERIC', mode: 'NULLABLE', description: 'Total in EUR' },
      ],
    },
    {
      name: 'users',
      fullName: 'demo.shop.users',
      columns: [{ name: 'tags', dataType: 'STRING', mode: 'REPEATED' }],
    },
  ],
};

describe('buildSchemaContext', () => {
  it('renders every table with columns, modes and descriptions', () => {
    assert.equal(
      buildSchemaContext(snapshot),
      [
        'Project: demo',
        'Dataset: shop',
        '',
        '### Table: `demo.shop.orders`',
        'Description: One row per order',
        'Row count: 12,345',
        '',
        'Columns:',
        '  - `id` (INT64, REQUIRED)',
        '  - `amount` (NUMERIC) - Total in EUR',
        '',
        '### Table: `demo.shop.users`',
        '',
        'Columns:',
        '  - `tags` (STRING, REPEATED)',
        '',
      ].join('\n'),
    );
  });

  it('omits row counts on request', () => {
    assert.equal(buildSchemaContext(snapshot, { includeRowCounts: false }).includes('Row count'), false);
  });

  it('filters tables by name, ignoring case', () => {
    const context = buildSchemaContext(snapshot, { tables: ['USERS'] });
    assert.equal(context.includes('demo.shop.orders'), false);
    assert.ok(context.includes('### Table: `demo.shop.users`'));
  });
});

describe('buildMinimalContext', () => {
  it('lists one line per table', () => {
    assert.equal(
      buildMinimalContext(snapshot),
      '`demo.shop.orders`: `id`, `amount`\n`demo.shop.users`: `tags`',
    );
  });
});

describe('findRelevantTables', () => {
  it('matches plural and singular mentions', () => {
    assert.deepEqual(findRelevantTables('How many orders last week?', ['orders', 'users']), ['orders']);
    assert.deepEqual(findRelevantTables('What is the biggest order?', ['orders', 'users']), ['orders']);
    assert.deepEqual(findRelevantTables('Which user signed up first?', ['orders', 'users']), ['users']);
  });

  it('falls back to every table', () => {
    assert.deepEqual(findRelevantTables('Revenue by month', ['orders', 'users']), ['orders', 'users']);
  });
});

describe('parseSchemaSnapshot', () => {
  it('accepts a valid snapshot', () => {
    assert.deepEqual(parseSchemaSnapshot(JSON.stringify(snapshot)), snapshot);
  });

  it('rejects malformed JSON', () => {
    assert.throws(() => parseSchemaSnapshot('{"project":'), /^Error: Schema snapshot is not valid JSON: /);
  });

  it('lists schema violations with their paths', () => {
    const { dataset: _dropped, ...withoutDataset } = snapshot;
    assert.throws(
      () => parseSchemaSnapshot(JSON.stringify(withoutDataset)),
      { message: "Invalid schema snapshot: /: must have required property 'dataset'" },
    );

    const badMode = {
      ...snapshot,
      tables: [{ ...snapshot.tables[1], columns: [{ name: 'tags', dataType: 'STRING', mode: 'SOMETIMES' }] }],
    };
    assert.throws(
      () => parseSchemaSnapshot(JSON.stringify(badMode)),
      /\/tables\/0\/columns\/0\/mode: must be equal to one of the allowed values/,
    );
  });
});
