import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { normalizeSql, significantTokens, splitStatements, tokenize } from '../lexer.js';

describe('tokenize', () => {
  it('separates words, whitespace and line comments', () => {
    const tokens = tokenize('SELECT a -- c\nFROM t');
    assert.deepEqual(
      tokens.map((t) => t.type),
      ['word', 'whitespace', 'word', 'whitespace', 'comment', 'whitespace', 'word', 'whitespace', 'word'],
    );
    assert.equal(tokens[4].text, '-- c');
  });

  it('reads backtick identifiers as one token', () => {
    assert.deepEqual(tokenize('`proj.ds.orders`'), [{ type: 'quoted_ident', text: '`proj.ds.orders`' }]);
  });

  it('keeps triple-quoted strings whole', () => {
    const tokens = significantTokens(tokenize('SELECT """a;b""" AS s'));
    assert.deepEqual(tokens[1], { type: 'string', text: '"""a;b"""' });
  });

  it('honours backslash escapes inside strings', () => {
    const tokens = significantTokens(tokenize("SELECT 'it\\'s' AS s"));
    assert.deepEqual(tokens[1], { type: 'string', text: "'it\\'s'" });
  });

  it('reads numbers with decimals and exponents', () => {
    const tokens = significantTokens(tokenize('SELECT 1.5e3, .25'));
    assert.deepEqual(
      tokens.map((t) => t.text),
      ['SELECT', '1.5e3', ',', '.25'],
    );
  });
});

describe('normalizeSql', () => {
  it('drops comments and collapses whitespace', () => {
    assert.equal(normalizeSql('SELECT  a /* x */ FROM\n t -- end'), 'SELECT a FROM t');
  });

  it('treats # as a line comment', () => {
    assert.equal(normalizeSql('SELECT 1 # note\n'), 'SELECT 1');
  });

  it('leaves comment markers inside literals alone', () => {
    assert.equal(normalizeSql("SELECT '--not a comment'  AS x"), "SELECT '--not a comment' AS x");
  });

  it('runs an unterminated block comment to the end', () => {
    assert.equal(normalizeSql('SELECT 1 /* open'), 'SELECT 1');
  });

  it('is idempotent', () => {
    const once = normalizeSql('WITH x AS (\n  SELECT 1 -- one\n)\nSELECT * FROM x');
    assert.equal(normalizeSql(once), once);
    assert.equal(once, 'WITH x AS ( SELECT 1 ) SELECT * FROM x');
  });
});

describe('splitStatements', () => {
  it('splits on terminators outside literals', () => {
    assert.deepEqual(splitStatements("SELECT 1; SELECT ';' ;"), ['SELECT 1', "SELECT ';'"]);
  });

  it('drops empty statements', () => {
    assert.deepEqual(splitStatements(';;SELECT 1;;'), ['SELECT 1']);
  });

  it('returns nothing for blank input', () => {
    assert.deepEqual(splitStatements('   '), []);
  });
});
