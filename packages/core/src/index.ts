/**
 * @askbq/core — barrel export
 *
 * Core logic shared by the CLI: validation, generation, BigQuery access
 * and local history.
 */

// Records
export type {
  ChatTurn,
  AttemptErrorKind,
  GenerationErrorKind,
  GenerationAttempt,
  GenerationResult,
  ExecutionResult,
} from './types.js';

// Errors
export { SqlValidationError, LlmError, QueryExecutionError, errorMessage } from './errors.js';
export type { SqlRejectionKind } from './errors.js';

// Configuration and logging
export {
  loadSettings,
  loadEnvFile,
  defaultEnvFilePaths,
  DEFAULT_MAX_RETRIES,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_DEADLINE_MS,
} from './config.js';
export type { Settings, LlmProvider } from './config.js';
export { createConsoleLogger, silentLogger, formatLogLine } from './logger.js';
export type { Logger, LogLevel, LogFields } from './logger.js';

// Query engine and schema types
export type {
  ColumnMode,
  ColumnInfo,
  TableInfo,
  SchemaSnapshot,
  ExecuteOptions,
  TabularResult,
  QueryEngine,
} from './db/types.js';
export { SAFE_DEFAULTS } from './db/defaults.js';
export {
  BigQueryEngine,
  createBigQueryClient,
  introspectDataset,
  tableFromMetadata,
  clampBytesBilled,
  bigQueryErrorMessage,
  readBytesProcessed,
} from './db/bigquery.js';
export type {
  BigQueryClientOptions,
  BigQueryEngineOptions,
  QueryJob,
  QueryJobClient,
  QueryResultsPage,
} from './db/bigquery.js';

// SQL policy
export { tokenize, normalizeSql, splitStatements } from './policy/lexer.js';
export type { Token, TokenType } from './policy/lexer.js';
export { classifyStatement, isAllowedKind, BLOCKED_STATEMENT_KINDS } from './policy/classify.js';
export type { Statement, StatementKind, BlockedStatementKind } from './policy/classify.js';
export {
  checkSql,
  validateSql,
  isValidSql,
  BLOCKED_KEYWORDS,
  BLOCKED_PATTERNS,
} from './policy/validator.js';
export type { ValidationOutcome } from './policy/validator.js';
export { extractTables } from './policy/tables.js';

// LLM module
export * from './llm/index.js';

// Generation
export { SqlGenerator, EXTRACTION_FAILED_MESSAGE } from './generate.js';
export type { SqlGeneratorDeps, SqlGeneratorOptions, RunOptions } from './generate.js';

// Local storage
export { LocalStore, defaultDbPath } from './storage/sqlite.js';
export type { StoredSnapshot } from './storage/sqlite.js';

// Query history repository
export {
  createQuery,
  storeGeneration,
  storeExecution,
  listHistory,
  getHistoryItem,
  findQueryId,
  loadConversation,
} from './storage/repo.js';
export type {
  NewQuery,
  StoredExecution,
  StoredAttempt,
  HistoryItem,
  HistoryListItem,
  HistoryDetail,
} from './storage/repo.js';

// Ask orchestration
export { askQuestion } from './ask.js';
export type { AskInput, AskDeps, AskResult, AskStatus } from './ask.js';
