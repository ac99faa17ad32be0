/**
 * Small SQL lexer for the BigQuery dialect.
 *
 * Only distinguishes what the validator needs: words, quoted identifiers,
 * string literals, numbers, comments, whitespace and single-character
 * punctuation. It never fails; unterminated literals and comments run to
 * the end of the input.
 */

export type TokenType =
  | 'word'
  | 'quoted_ident'
  | 'string'
  | 'number'
  | 'comment'
  | 'whitespace'
  | 'punct';

export interface Token {
  type: TokenType;
  text: string;
}

const WORD_START = /[A-Za-z_]/;
const WORD_CHAR = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];
    const start = i;

    if (WHITESPACE.test(ch)) {
      while (i < sql.length && WHITESPACE.test(sql[i])) i++;
      tokens.push({ type: 'whitespace', text: sql.slice(start, i) });
    } else if ((ch === '-' && next === '-') || ch === '#') {
      while (i < sql.length && sql[i] !== '\n') i++;
      tokens.push({ type: 'comment', text: sql.slice(start, i) });
    } else if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      i = end === -1 ? sql.length : end + 2;
      tokens.push({ type: 'comment', text: sql.slice(start, i) });
    } else if (ch === "'" || ch === '"') {
      i = scanString(sql, i);
      tokens.push({ type: 'string', text: sql.slice(start, i) });
    } else if (ch === '`') {
      const end = sql.indexOf('`', i + 1);
      i = end === -1 ? sql.length : end + 1;
      tokens.push({ type: 'quoted_ident', text: sql.slice(start, i) });
    } else if (WORD_START.test(ch)) {
      while (i < sql.length && WORD_CHAR.test(sql[i])) i++;
      tokens.push({ type: 'word', text: sql.slice(start, i) });
    } else if (DIGIT.test(ch) || (ch === '.' && next !== undefined && DIGIT.test(next))) {
      i = scanNumber(sql, i);
      tokens.push({ type: 'number', text: sql.slice(start, i) });
    } else {
      i++;
      tokens.push({ type: 'punct', text: ch });
    }
  }

  return tokens;
}

/** Single, double and triple quoted strings with backslash escapes. */
function scanString(sql: string, start: number): number {
  const quote = sql[start];
  const triple = sql.startsWith(quote.repeat(3), start);
  const closer = triple ? quote.repeat(3) : quote;
  let i = start + closer.length;

  while (i < sql.length) {
    if (sql[i] === '\\') {
      i += 2;
      continue;
    }
    if (sql.startsWith(closer, i)) {
      return i + closer.length;
    }
    i++;
  }
  return sql.length;
}

function scanNumber(sql: string, start: number): number {
  const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(sql.slice(start));
  return start + (match ? match[0].length : 1);
}

/** Tokens that carry meaning (no whitespace, no comments). */
export function significantTokens(tokens: Token[]): Token[] {
  return tokens.filter((t) => t.type !== 'whitespace' && t.type !== 'comment');
}

/**
 * Drop comments and collapse every whitespace/comment run outside literals
 * into a single space. Literal contents are preserved as written.
 */
export function normalizeSql(sql: string): string {
  let out = '';
  let pendingSpace = false;

  for (const token of tokenize(sql)) {
    if (token.type === 'whitespace' || token.type === 'comment') {
      pendingSpace = true;
      continue;
    }
    if (pendingSpace && out.length > 0) out += ' ';
    out += token.text;
    pendingSpace = false;
  }

  return out;
}

/**
 * Split normalized SQL into statements on `;` tokens outside literals.
 * Each statement keeps its own text without the terminator; empty
 * statements are dropped.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';

  for (const token of tokenize(sql)) {
    if (token.type === 'punct' && token.text === ';') {
      statements.push(current);
      current = '';
    } else {
      current += token.text;
    }
  }
  statements.push(current);

  return statements.map((s) => s.trim()).filter((s) => s.length > 0);
}
