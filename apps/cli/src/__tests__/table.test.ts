import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { escapeCsvField, formatCsv, formatTable, formatValue } from '../util/table.js';

describe('formatTable', () => {
  it('pads columns to the widest value', () => {
    const out = formatTable(['id', 'name'], [
      { id: 1, name: 'Ann' },
      { id: 22, name: null },
    ]);
    assert.equal(out, ['id | name', '---+-----', '1  | Ann ', '22 | NULL'].join('\n'));
  });

  it('truncates long cells', () => {
    const out = formatTable(['note'], [{ note: 'x'.repeat(70) }]);
    assert.equal(out.split('\n')[2], 'x'.repeat(59) + '…');
  });

  it('describes empty results', () => {
    assert.equal(formatTable([], []), '(no columns)');
    assert.equal(formatTable(['id'], []), '(0 rows)');
  });
});

describe('formatCsv', () => {
  it('quotes fields that need it and leaves nulls empty', () => {
    const out = formatCsv(['a', 'b'], [
      { a: 'x,y', b: null },
      { a: 'say "hi"', b: 2 },
    ]);
    assert.equal(out, 'a,b\n"x,y",\n"say ""hi""",2');
  });

  it('quotes embedded newlines', () => {
    assert.equal(escapeCsvField('a\nb'), '"a\nb"');
    assert.equal(escapeCsvField('plain'), 'plain');
  });
});

describe('formatValue', () => {
  it('unwraps BigQuery value objects', () => {
    assert.equal(formatValue({ value: '2026-01-01' }), '2026-01-01');
  });

  it('renders other types', () => {
    assert.equal(formatValue(undefined), 'NULL');
    assert.equal(formatValue(new Date(0)), '1970-01-01T00:00:00.000Z');
    assert.equal(formatValue(Buffer.from('hi')), 'aGk=');
    assert.equal(formatValue({ a: 1 }), '{"a":1}');
    assert.equal(formatValue(true), 'true');
  });
});
