/**
 * Best-effort table reference extraction.
 *
 * This is a heuristic token scan, not a reference resolver: comma joins
 * after the first table, table-valued functions and some nested forms are
 * missed, and an unusual identifier right after FROM/JOIN may be captured
 * by mistake. FROM inside a function call (`EXTRACT(YEAR FROM ts)`) is
 * skipped. Use it for display and hints only, never for access control.
 */

import { significantTokens, splitStatements, tokenize, type Token } from './lexer.js';

const TABLE_START = new Set(['FROM', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS']);
const TABLE_END = new Set(['WHERE', 'GROUP', 'ORDER', 'HAVING', 'LIMIT', 'UNION']);

const KEYWORDS = new Set([
  ...TABLE_START,
  ...TABLE_END,
  'SELECT',
  'WITH',
  'AS',
  'ON',
  'USING',
  'AND',
  'OR',
  'NOT',
  'OUTER',
  'LATERAL',
  'UNNEST',
  'DISTINCT',
  'ALL',
  'QUALIFY',
  'WINDOW',
  'EXCEPT',
  'INTERSECT',
  'TABLESAMPLE',
  'FOR',
  'SYSTEM_TIME',
]);

/** Words whose parentheses hold a subquery rather than call arguments. */
const SUBQUERY_OPENERS = new Set(['IN', 'EXISTS', 'ANY', 'SOME', 'ARRAY']);

export function extractTables(sql: string): string[] {
  const found = new Set<string>();
  for (const statement of splitStatements(sql)) {
    for (const table of extractFromStatement(significantTokens(tokenize(statement)))) {
      found.add(table);
    }
  }
  return [...found];
}

function extractFromStatement(tokens: Token[]): string[] {
  const tables: string[] = [];
  let expectingTable = false;
  // one entry per open paren: true when it opened a function call
  const parens: boolean[] = [];
  let callDepth = 0;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token.text === '(') {
      const isCall = i > 0 && isFunctionName(tokens[i - 1]);
      parens.push(isCall);
      if (isCall) callDepth++;
    } else if (token.text === ')' && parens.pop()) {
      callDepth--;
    }
    if (callDepth > 0) continue;

    if (token.type === 'word') {
      const word = token.text.toUpperCase();
      if (TABLE_START.has(word)) {
        expectingTable = true;
        continue;
      }
      if (TABLE_END.has(word)) {
        expectingTable = false;
        continue;
      }
      if (KEYWORDS.has(word)) continue;
    }

    if (!expectingTable) continue;

    if (token.text === '(') {
      expectingTable = false;
      continue;
    }

    if (token.type === 'word' || token.type === 'quoted_ident') {
      const { name, next } = readQualifiedName(tokens, i);
      tables.push(name);
      i = next - 1;
      expectingTable = false;
    }
  }

  return tables;
}

function isFunctionName(token: Token): boolean {
  if (token.type !== 'word') return false;
  const word = token.text.toUpperCase();
  return !KEYWORDS.has(word) && !SUBQUERY_OPENERS.has(word);
}

/** Join `a.b.c`, `` `a.b`.c `` and similar into one dotted name. */
function readQualifiedName(tokens: Token[], start: number): { name: string; next: number } {
  const parts: string[] = [unquote(tokens[start])];
  let i = start + 1;

  while (
    i + 1 < tokens.length &&
    tokens[i].text === '.' &&
    (tokens[i + 1].type === 'word' || tokens[i + 1].type === 'quoted_ident')
  ) {
    parts.push(unquote(tokens[i + 1]));
    i += 2;
  }

  return { name: parts.join('.'), next: i };
}

function unquote(token: Token): string {
  return token.type === 'quoted_ident' ? token.text.replace(/^`|`$/g, '') : token.text;
}
