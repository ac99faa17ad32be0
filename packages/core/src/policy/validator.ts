/**
 * Read-only SQL gate.
 *
 * An allow-list check, not a parser: a statement passes only when its
 * declared type is SELECT, a CTE or indeterminate, AND its comment-free
 * text contains no blocked keyword AND matches no danger pattern. Each
 * check rejects on its own; nothing here rewrites the query beyond
 * stripping comments and collapsing whitespace.
 */

import { SqlValidationError } from '../errors.js';
import { classifyStatement, isAllowedKind } from './classify.js';
import { normalizeSql, splitStatements } from './lexer.js';

export const BLOCKED_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'REPLACE',
  'MERGE',
  'GRANT',
  'REVOKE',
  'EXECUTE',
  'EXEC',
  'CALL',
] as const;

export const BLOCKED_PATTERNS: readonly RegExp[] = [
  /\bINTO\s+\w+/i,
  /\bDROP\s+(TABLE|DATABASE|SCHEMA|VIEW|INDEX)/i,
  /\bCREATE\s+(TABLE|DATABASE|SCHEMA|VIEW|INDEX|FUNCTION|PROCEDURE)/i,
  /\bALTER\s+(TABLE|DATABASE|SCHEMA)/i,
  /\bTRUNCATE\s+TABLE/i,
  /\bEXEC(UTE)?\s*\(/i,
];

const KEYWORD_PATTERNS = BLOCKED_KEYWORDS.map(
  (keyword) => [keyword, new RegExp(`\\b${keyword}\\b`, 'i')] as const,
);

export type ValidationOutcome =
  | { ok: true; sql: string }
  | { ok: false; error: SqlValidationError };

/**
 * Validate without throwing. Rejections come back as a value so callers
 * that expect them (the generation loop) can treat them as data.
 */
export function checkSql(rawSql: string): ValidationOutcome {
  if (!rawSql || !rawSql.trim()) {
    return { ok: false, error: new SqlValidationError('EMPTY_INPUT', 'Empty SQL query') };
  }

  const cleaned = normalizeSql(rawSql).trim();
  const statements = splitStatements(cleaned);
  if (statements.length === 0) {
    return {
      ok: false,
      error: new SqlValidationError('EMPTY_INPUT', 'SQL query contains no statements'),
    };
  }

  for (const text of statements) {
    const rejection = checkStatement(text);
    if (rejection) return { ok: false, error: rejection };
  }

  return { ok: true, sql: cleaned };
}

function checkStatement(text: string): SqlValidationError | null {
  const statement = classifyStatement(text);
  if (!isAllowedKind(statement.kind)) {
    return new SqlValidationError(
      'BLOCKED_STATEMENT_TYPE',
      `Only SELECT queries are allowed. Found: ${statement.kind}`,
      statement.kind,
    );
  }

  // Scans the whole statement, literals included
  for (const [keyword, pattern] of KEYWORD_PATTERNS) {
    if (pattern.test(text)) {
      return new SqlValidationError(
        'BLOCKED_KEYWORD',
        `Dangerous operation detected: ${keyword}`,
        keyword,
      );
    }
  }

  for (const pattern of BLOCKED_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return new SqlValidationError(
        'BLOCKED_PATTERN',
        `Potentially dangerous SQL pattern detected: ${match[0]}`,
        pattern.source,
      );
    }
  }

  return null;
}

/** Returns the cleaned SQL or throws SqlValidationError. */
export function validateSql(rawSql: string): string {
  const outcome = checkSql(rawSql);
  if (!outcome.ok) throw outcome.error;
  return outcome.sql;
}

export function isValidSql(rawSql: string): boolean {
  return checkSql(rawSql).ok;
}
