/**
 * Error types shared by the validator, the LLM adapters and the query engine.
 */

export type SqlRejectionKind =
  | 'EMPTY_INPUT'
  | 'BLOCKED_STATEMENT_TYPE'
  | 'BLOCKED_KEYWORD'
  | 'BLOCKED_PATTERN';

export class SqlValidationError extends Error {
  readonly kind: SqlRejectionKind;
  /** The offending statement type, keyword or pattern source */
  readonly detail: string;

  constructor(kind: SqlRejectionKind, message: string, detail = '') {
    super(message);
    this.name = 'SqlValidationError';
    this.kind = kind;
    this.detail = detail;
  }
}

export class LlmError extends Error {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LlmError';
    this.provider = provider;
  }
}

export class QueryExecutionError extends Error {
  readonly sql: string;
  readonly dryRun: boolean;

  constructor(message: string, sql: string, dryRun: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueryExecutionError';
    this.sql = sql;
    this.dryRun = dryRun;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
