/**
 * BigQuery engine and dataset introspection.
 * Uses @google-cloud/bigquery with a hard billing ceiling on every job.
 *
 * Safety measures:
 * - Standard SQL only (useLegacySql: false)
 * - maximumBytesBilled on every job, clamped to the engine ceiling
 * - Dry runs return statistics only, never rows
 * - Aborting the caller's signal cancels the running job
 */

import { BigQuery, type Query } from '@google-cloud/bigquery';
import { QueryExecutionError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { abortMessage, raceWithSignal, type CancelHook } from '../util/abort.js';
import { SAFE_DEFAULTS } from './defaults.js';
import type {
  ColumnInfo,
  ColumnMode,
  ExecuteOptions,
  QueryEngine,
  SchemaSnapshot,
  TableInfo,
  TabularResult,
} from './types.js';

type ResultRow = Record<string, unknown>;

interface QueryResultsMeta {
  totalRows?: string | number | null;
  schema?: { fields?: Array<{ name?: string | null }> | null } | null;
}

/** First page of a job's results: rows, then the next-page query and the raw response. */
export type QueryResultsPage = [ResultRow[]] | [ResultRow[], unknown, QueryResultsMeta | undefined];

/** The slice of a BigQuery job the engine uses. */
export interface QueryJob {
  readonly metadata?: unknown;
  getQueryResults(options: { maxResults: number; autoPaginate: boolean; timeoutMs: number }): Promise<QueryResultsPage>;
  cancel(): Promise<unknown>;
}

/** The slice of the BigQuery client the engine uses; `BigQuery` satisfies it. */
export interface QueryJobClient {
  createQueryJob(query: Query): Promise<[QueryJob, ...unknown[]]>;
}

export interface BigQueryClientOptions {
  projectId?: string;
  location?: string;
}

export function createBigQueryClient(options: BigQueryClientOptions = {}): BigQuery {
  return new BigQuery({ projectId: options.projectId, location: options.location });
}

export interface BigQueryEngineOptions extends BigQueryClientOptions {
  /** Ceiling no request may exceed. Default: SAFE_DEFAULTS.maxBytesBilled */
  maxBytesBilled?: number;
  jobTimeoutMs?: number;
  /** Pre-built client; one is created from projectId and location otherwise */
  client?: QueryJobClient;
  /** Receives job-cancel failures */
  logger?: Logger;
}

export class BigQueryEngine implements QueryEngine {
  private readonly client: QueryJobClient;
  private readonly location?: string;
  private readonly ceiling: number;
  private readonly jobTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: BigQueryEngineOptions = {}) {
    this.client = options.client ?? createBigQueryClient(options);
    this.location = options.location;
    this.ceiling = options.maxBytesBilled ?? SAFE_DEFAULTS.maxBytesBilled;
    this.jobTimeoutMs = options.jobTimeoutMs ?? SAFE_DEFAULTS.jobTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(sql: string, options: ExecuteOptions): Promise<TabularResult> {
    const query: Query = {
      query: sql,
      useLegacySql: false,
      dryRun: options.dryRun,
      maximumBytesBilled: String(clampBytesBilled(options.maxBytesBilled, this.ceiling)),
      jobTimeoutMs: this.jobTimeoutMs,
      location: this.location,
    };

    const start = performance.now();
    try {
      if (options.signal?.aborted) {
        throw new Error(abortMessage(options.signal));
      }

      const created = this.client.createQueryJob(query);
      // a dry-run job never runs, so there is nothing to cancel
      const [job] = await raceWithSignal(
        created,
        options.signal,
        options.dryRun
          ? undefined
          : this.cancelHook(async () => {
              const [pending] = await created;
              await pending.cancel();
            }),
      );

      if (options.dryRun) {
        return {
          columns: [],
          rows: [],
          rowCount: 0,
          truncated: false,
          execMs: Math.round(performance.now() - start),
          totalBytesProcessed: readBytesProcessed(job.metadata),
        };
      }

      const maxRows = options.maxRows ?? SAFE_DEFAULTS.maxRows;
      const page = await raceWithSignal(
        job.getQueryResults({ maxResults: maxRows + 1, autoPaginate: false, timeoutMs: this.jobTimeoutMs }),
        options.signal,
        this.cancelHook(() => job.cancel()),
      );
      const execMs = Math.round(performance.now() - start);

      const allRows = page[0];
      const response = page.length === 3 ? page[2] : undefined;
      const truncated = allRows.length > maxRows;
      const kept = truncated ? allRows.slice(0, maxRows) : allRows;
      const totalRows = Number(response?.totalRows ?? allRows.length);

      return {
        columns: columnsFrom(response?.schema?.fields, kept),
        rows: kept,
        rowCount: Number.isFinite(totalRows) ? totalRows : allRows.length,
        truncated,
        execMs,
        totalBytesProcessed: readBytesProcessed(job.metadata),
      };
    } catch (err: unknown) {
      const message = bigQueryErrorMessage(err);
      throw new QueryExecutionError(
        options.dryRun ? `Dry run failed: ${message}` : `Query execution failed: ${message}`,
        sql,
        options.dryRun,
        { cause: err },
      );
    }
  }

  private cancelHook(cancel: () => Promise<unknown>): CancelHook {
    return {
      cancel,
      onError: (err) => this.logger.warn('BigQuery job cancel failed', { error: errorMessage(err) }),
    };
  }
}

/** The requested ceiling, never above the engine's hard ceiling. */
export function clampBytesBilled(requested: number | undefined, ceiling: number): number {
  if (requested === undefined || !Number.isFinite(requested) || requested <= 0) return ceiling;
  return Math.min(Math.floor(requested), ceiling);
}

/**
 * BigQuery API errors carry the useful text in `errors[0].message`;
 * fall back to the error message itself.
 */
export function bigQueryErrorMessage(err: unknown): string {
  if (isRecord(err) && Array.isArray(err.errors) && err.errors.length > 0) {
    const first: unknown = err.errors[0];
    if (isRecord(first) && typeof first.message === 'string' && first.message) {
      return first.message;
    }
  }
  return err instanceof Error ? err.message : String(err);
}

export function readBytesProcessed(metadata: unknown): number | undefined {
  if (!isRecord(metadata) || !isRecord(metadata.statistics)) return undefined;
  const raw = metadata.statistics.totalBytesProcessed;
  if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;
  const bytes = Number(raw);
  return Number.isFinite(bytes) ? bytes : undefined;
}

function columnsFrom(
  fields: Array<{ name?: string | null }> | null | undefined,
  rows: ResultRow[],
): string[] {
  if (fields && fields.length > 0) {
    return fields.map((f) => f.name ?? '');
  }
  return rows.length > 0 ? Object.keys(rows[0]) : [];
}

// ── Introspection ────────────────────────────────────────────────────

/**
 * Snapshot a dataset's tables and columns. With `tableIds`, only those
 * tables are read.
 */
export async function introspectDataset(
  client: BigQuery,
  datasetId: string,
  tableIds?: string[],
): Promise<SchemaSnapshot> {
  const dataset = client.dataset(datasetId);
  const project = client.projectId;

  let names = tableIds;
  if (!names || names.length === 0) {
    const [tables] = await dataset.getTables();
    names = tables.map((t) => t.id ?? '').filter((id) => id.length > 0);
  }

  const result: TableInfo[] = [];
  for (const name of names) {
    const [metadata] = await dataset.table(name).getMetadata();
    result.push(tableFromMetadata(project, datasetId, name, metadata));
  }

  return { project, dataset: datasetId, tables: result, capturedAt: new Date().toISOString() };
}

/** Map a BigQuery table resource onto TableInfo. */
export function tableFromMetadata(
  project: string,
  dataset: string,
  name: string,
  metadata: unknown,
): TableInfo {
  const table: TableInfo = { name, fullName: `${project}.${dataset}.${name}`, columns: [] };
  if (!isRecord(metadata)) return table;

  if (typeof metadata.description === 'string' && metadata.description) {
    table.description = metadata.description;
  }
  if (typeof metadata.numRows === 'string' || typeof metadata.numRows === 'number') {
    const rows = Number(metadata.numRows);
    if (Number.isFinite(rows)) table.rowCount = rows;
  }

  const schema = metadata.schema;
  if (isRecord(schema) && Array.isArray(schema.fields)) {
    for (const field of schema.fields) {
      const column = columnFromField(field);
      if (column) table.columns.push(column);
    }
  }
  return table;
}

function columnFromField(field: unknown): ColumnInfo | null {
  if (!isRecord(field) || typeof field.name !== 'string') return null;
  const column: ColumnInfo = {
    name: field.name,
    dataType: typeof field.type === 'string' ? field.type : 'UNKNOWN',
    mode: toMode(field.mode),
  };
  if (typeof field.description === 'string' && field.description) {
    column.description = field.description;
  }
  return column;
}

function toMode(mode: unknown): ColumnMode {
  return mode === 'REQUIRED' || mode === 'REPEATED' ? mode : 'NULLABLE';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
