/**
 * Statement classifier.
 * Works from the leading keyword; only looks further for CTEs, where the
 * main statement follows the `WITH name AS (...)` list.
 */

import { significantTokens, tokenize, type Token } from './lexer.js';

export const BLOCKED_STATEMENT_KINDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'MERGE',
  'REPLACE',
  'CREATE',
  'DROP',
  'ALTER',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'CALL',
  'EXECUTE',
  'EXEC',
  'EXPORT',
  'LOAD',
  'DECLARE',
  'SET',
  'BEGIN',
  'COMMIT',
  'ROLLBACK',
] as const;

export type BlockedStatementKind = (typeof BLOCKED_STATEMENT_KINDS)[number];

export type StatementKind = 'SELECT' | 'WITH' | 'UNKNOWN' | BlockedStatementKind;

export interface Statement {
  /** First keyword of the statement, upper-cased; empty when there is none */
  leadingKeyword: string;
  kind: StatementKind;
  text: string;
}

const BLOCKED_SET: ReadonlySet<string> = new Set(BLOCKED_STATEMENT_KINDS);

function isBlockedKind(word: string): word is BlockedStatementKind {
  return BLOCKED_SET.has(word);
}

export function isAllowedKind(kind: StatementKind): boolean {
  return kind === 'SELECT' || kind === 'WITH' || kind === 'UNKNOWN';
}

export function classifyStatement(text: string): Statement {
  const tokens = significantTokens(tokenize(text));

  // `(SELECT ...) UNION ALL (SELECT ...)` starts with parentheses
  let i = 0;
  while (i < tokens.length && tokens[i].text === '(') i++;

  const first = tokens[i];
  if (!first || first.type !== 'word') {
    return { leadingKeyword: '', kind: 'UNKNOWN', text };
  }

  const leadingKeyword = first.text.toUpperCase();
  if (leadingKeyword === 'SELECT') {
    return { leadingKeyword, kind: 'SELECT', text };
  }
  if (leadingKeyword === 'WITH') {
    const main = mainKeywordAfterCtes(tokens, i + 1);
    return { leadingKeyword, kind: main !== null && isBlockedKind(main) ? main : 'WITH', text };
  }
  if (isBlockedKind(leadingKeyword)) {
    return { leadingKeyword, kind: leadingKeyword, text };
  }
  return { leadingKeyword, kind: 'UNKNOWN', text };
}

/**
 * Skip the CTE list and return the first top-level keyword after it.
 * Every CTE body is parenthesised, so the first depth-0 word that is not
 * part of `name AS (...)`, `RECURSIVE` or a separating comma is the main
 * statement keyword.
 */
function mainKeywordAfterCtes(tokens: Token[], from: number): string | null {
  let depth = 0;
  let sawBody = false;

  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.text === '(') {
      depth++;
      continue;
    }
    if (token.text === ')') {
      depth = Math.max(0, depth - 1);
      if (depth === 0) sawBody = true;
      continue;
    }
    if (depth > 0) continue;

    if (token.text === ',') {
      sawBody = false;
      continue;
    }
    if (sawBody && token.type === 'word') {
      return token.text.toUpperCase();
    }
  }

  return null;
}
