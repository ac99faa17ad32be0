import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractSql } from '../extract.js';

describe('extractSql', () => {
  it('reads a fenced sql block', () => {
    const text = 'Here you go:\n```sql\nSELECT id\nFROM `p.d.users`\nLIMIT 10\n```\nEnjoy.';
    assert.equal(extractSql(text), 'SELECT id\nFROM `p.d.users`\nLIMIT 10');
  });

  it('matches the sql tag case-insensitively', () => {
    assert.equal(extractSql('```SQL\nSELECT 1\n```'), 'SELECT 1');
  });

  it('does not read another language tag as the sql tag', () => {
    assert.equal(extractSql('```sqlite\nSELECT 1\n```'), 'SELECT 1');
    assert.equal(extractSql('```sqlx\nWITH a AS (SELECT 1) SELECT * FROM a\n```'), 'WITH a AS (SELECT 1) SELECT * FROM a');
  });

  it('reads a generic fence that starts with SELECT', () => {
    assert.equal(extractSql('```\nSELECT name FROM t LIMIT 5\n```'), 'SELECT name FROM t LIMIT 5');
  });

  it('reads a generic fence that starts with WITH', () => {
    assert.equal(
      extractSql('```\nWITH a AS (SELECT 1 AS n)\nSELECT n FROM a\n```'),
      'WITH a AS (SELECT 1 AS n)\nSELECT n FROM a',
    );
  });

  it('skips an empty sql fence and falls back to later patterns', () => {
    assert.equal(extractSql('```sql\n```\n```\nSELECT 2\n```'), 'SELECT 2');
  });

  it('captures a bare query up to the terminating line', () => {
    const text = 'The query is:\nSELECT a,\n  b\nFROM t;\nThis returns a and b.';
    assert.equal(extractSql(text), 'SELECT a,\n  b\nFROM t');
  });

  it('captures a bare query without a terminator to the end', () => {
    assert.equal(extractSql('with x as (select 1)\nselect * from x'), 'with x as (select 1)\nselect * from x');
  });

  it('returns null for prose', () => {
    assert.equal(extractSql('I cannot answer that with a read-only query.'), null);
    assert.equal(extractSql(''), null);
  });

  it('does not treat words that merely start with SELECT as SQL', () => {
    assert.equal(extractSql('Selection criteria are unclear.'), null);
  });
});
