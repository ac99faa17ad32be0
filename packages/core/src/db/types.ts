/**
 * Query engine and schema types.
 * BigQueryEngine implements QueryEngine; tests substitute in-process fakes.
 */

export type ColumnMode = 'NULLABLE' | 'REQUIRED' | 'REPEATED';

export interface ColumnInfo {
  name: string;
  dataType: string;
  mode: ColumnMode;
  description?: string;
}

export interface TableInfo {
  name: string;
  /** `project.dataset.table` */
  fullName: string;
  description?: string;
  rowCount?: number;
  columns: ColumnInfo[];
}

export interface SchemaSnapshot {
  project: string;
  dataset: string;
  tables: TableInfo[];
  /** ISO-8601 */
  capturedAt: string;
}

export interface ExecuteOptions {
  /** Validate only: no billing, no rows */
  dryRun: boolean;
  /** Billing ceiling in bytes; engines clamp it to their own hard ceiling */
  maxBytesBilled?: number;
  /** Hard cap on returned rows */
  maxRows?: number;
  signal?: AbortSignal;
}

export interface TabularResult {
  columns: string[];
  rows: Record<string, unknown>[];
  /** Total rows produced by the query, before truncation */
  rowCount: number;
  truncated: boolean;
  execMs: number;
  /** Bytes scanned (or, for a dry run, bytes that would be scanned) */
  totalBytesProcessed?: number;
}

export interface QueryEngine {
  /** Throws QueryExecutionError with the engine's message on failure */
  execute(sql: string, options: ExecuteOptions): Promise<TabularResult>;
}
