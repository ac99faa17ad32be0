#!/usr/bin/env -S node --import tsx

/**
 * askbq CLI entrypoint.
 */

import { Command, CommanderError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  BigQueryEngine,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_OPENAI_MODEL,
  LocalStore,
  SqlGenerator,
  askQuestion,
  bigQueryErrorMessage,
  buildMinimalContext,
  buildSchemaContext,
  checkSql,
  classifyStatement,
  createBigQueryClient,
  createTextGenerator,
  defaultDbPath,
  errorMessage,
  extractTables,
  findQueryId,
  getHistoryItem,
  introspectDataset,
  listHistory,
  loadEnvFile,
  loadSettings,
  parseSchemaSnapshot,
  splitStatements,
  type AskResult,
  type Logger,
  type SchemaSnapshot,
  type Settings,
  type SqlGeneratorOptions,
  type TextGenerator,
} from '@askbq/core';
import { normalizeArgv, parseList, parsePositiveInt } from './argv.js';
import {
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  toExitCode,
  usageError,
  runtimeError,
  policyError,
} from './errors.js';
import {
  loggerFromOutput,
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printRows,
  printWarning,
  withOutputFlags,
  type OutputOptions,
  type ResultFormat,
} from './output.js';

const VERSION = '0.1.0';

const DATASET_ID = /^[A-Za-z0-9_]{1,1024}$/;

// ── Helpers ──────────────────────────────────────────────────────────

function openStore(): LocalStore {
  const store = new LocalStore(defaultDbPath());
  store.migrate();
  return store;
}

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data.trim()));
    process.stdin.on('error', reject);
  });
}

function loadCliSettings(): Settings {
  loadEnvFile();
  try {
    return loadSettings();
  } catch (err: unknown) {
    throw usageError(errorMessage(err), 'CONFIG_INVALID');
  }
}

function clientOptions(settings: Settings): { projectId?: string; location?: string } {
  return { projectId: settings.projectId ?? undefined, location: settings.location ?? undefined };
}

function createEngine(settings: Settings, logger: Logger): BigQueryEngine {
  return new BigQueryEngine({
    ...clientOptions(settings),
    maxBytesBilled: settings.maxBytesBilled,
    logger,
  });
}

function createGenerator(settings: Settings): TextGenerator {
  try {
    return createTextGenerator(settings);
  } catch (err: unknown) {
    throw usageError(errorMessage(err), 'CONFIG_INVALID');
  }
}

function generatorOptions(settings: Settings, maxRows?: number): SqlGeneratorOptions {
  return {
    maxRetries: settings.maxRetries,
    maxBytesBilled: settings.maxBytesBilled,
    maxRows: maxRows ?? settings.maxRows,
    callTimeoutMs: settings.llmTimeoutMs,
    deadlineMs: settings.deadlineMs,
  };
}

function createSqlGenerator(settings: Settings, logger: Logger): SqlGenerator {
  return new SqlGenerator(
    { generator: createGenerator(settings), engine: createEngine(settings, logger), logger },
    generatorOptions(settings),
  );
}

function resolveDataset(store: LocalStore, settings: Settings, datasetOpt?: string): string {
  const dataset = datasetOpt ?? store.getActiveDataset() ?? settings.defaultDataset;
  if (!dataset) {
    throw usageError(
      'No dataset specified and no active dataset set. Use --dataset or "askbq dataset use <id>".',
      'DATASET_NOT_SET',
    );
  }
  return dataset;
}

function loadSnapshot(store: LocalStore, dataset: string): SchemaSnapshot {
  const stored = store.getLatestSchemaSnapshot(dataset);
  if (!stored) {
    throw usageError(
      `No schema snapshot found for dataset "${dataset}". Run "askbq schema refresh" first.`,
      'SCHEMA_MISSING',
    );
  }
  return parseSchemaSnapshot(stored.snapshotJson);
}

/** Aborts on Ctrl-C so in-flight model calls and BigQuery jobs are cancelled. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('Interrupted')));
  return controller.signal;
}

function parseFormat(value: string): ResultFormat {
  if (value === 'table' || value === 'json' || value === 'csv') return value;
  throw usageError(`Invalid --format "${value}". Expected table, json or csv.`);
}

function countColumns(snapshot: SchemaSnapshot): number {
  return snapshot.tables.reduce((sum, t) => sum + t.columns.length, 0);
}

function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${unit === 0 ? value : value.toFixed(1)} ${units[unit]}`;
}

async function runCommand(
  command: Command,
  fn: (output: OutputOptions) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askbq')
  .description('askbq — ask BigQuery questions in plain language, read-only')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, dataset, schema
  Query:    ask, validate, explain, suggest
  History:  history
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment and configuration')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeMajor = parseInt(nodeVersion.slice(1), 10);
          const nodeOk = nodeMajor >= 20;

          const envFile = loadEnvFile();
          const settings = loadCliSettings();
          const model =
            settings.model ??
            `${settings.llmProvider === 'gemini' ? DEFAULT_GEMINI_MODEL : DEFAULT_OPENAI_MODEL} (default)`;
          const apiKeySet = Boolean(
            settings.llmProvider === 'gemini' ? settings.geminiApiKey : settings.openaiApiKey,
          );
          const dbPath = defaultDbPath();
          const configDir = dirname(dbPath);

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            llm: { provider: settings.llmProvider, model, apiKeySet },
            bigquery: {
              project: settings.projectId,
              location: settings.location,
              defaultDataset: settings.defaultDataset,
            },
            paths: {
              envFile,
              configDir,
              configDirExists: existsSync(configDir),
              dbPath,
              dbPathExists: existsSync(dbPath),
            },
            limits: {
              maxBytesBilled: settings.maxBytesBilled,
              maxRows: settings.maxRows,
              maxRetries: settings.maxRetries,
              llmTimeoutMs: settings.llmTimeoutMs,
              deadlineMs: settings.deadlineMs,
            },
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('askbq doctor', output);
          printHuman('============', output);
          printHuman('', output);
          printHuman(`Node.js:     ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`LLM:         ${settings.llmProvider} / ${model}`, output);
          printHuman(`API key:     ${apiKeySet ? 'set ✓' : 'not set'}`, output);
          printHuman(`Project:     ${settings.projectId ?? '(from application default credentials)'}`, output);
          printHuman(`Location:    ${settings.location ?? '(default)'}`, output);
          printHuman(`Dataset:     ${settings.defaultDataset ?? '(none; use "askbq dataset use")'}`, output);
          printHuman(`Config file: ${envFile ?? '(none)'}`, output);
          printHuman(`DB path:     ${dbPath} ${existsSync(dbPath) ? '(exists)' : '(will be created)'}`, output);
          printHuman('', output);
          printHuman('Limits:', output);
          printHuman(`  Max bytes billed: ${formatBytes(settings.maxBytesBilled)}`, output);
          printHuman(`  Max rows:         ${settings.maxRows}`, output);
          printHuman(`  Max attempts:     ${settings.maxRetries}`, output);
          printHuman(`  LLM call timeout: ${settings.llmTimeoutMs}ms`, output);
          printHuman(`  Deadline:         ${settings.deadlineMs}ms`, output);
        });
      }),
  ),
  ['askbq doctor', 'askbq doctor --json'],
);

// ── dataset ──────────────────────────────────────────────────────────

const dataset = program.command('dataset').description('Select the dataset questions are asked against');

withExamples(
  withOutputFlags(
    dataset
      .command('use <id>')
      .description('Set the active dataset')
      .action(async function (this: Command, id: string) {
        await runCommand(this, (output) => {
          if (!DATASET_ID.test(id)) {
            throw usageError(`Invalid dataset id "${id}". Use letters, digits and underscores.`);
          }
          const store = openStore();
          try {
            store.setActiveDataset(id);
            printCommandSuccess({ dataset: id }, output, `Active dataset set to "${id}".`);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq dataset use sales'],
);

withExamples(
  withOutputFlags(
    dataset
      .command('show')
      .description('Show the active dataset')
      .action(async function (this: Command) {
        await runCommand(this, (output) => {
          const settings = loadCliSettings();
          const store = openStore();
          try {
            const active = store.getActiveDataset();
            const current = active ?? settings.defaultDataset;
            const source = active ? 'store' : settings.defaultDataset ? 'ASKBQ_DATASET' : null;
            printCommandSuccess(
              { dataset: current, source },
              output,
              current ? `Active dataset: ${current} (from ${source})` : 'No active dataset.',
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq dataset show', 'askbq dataset show --json'],
);

// ── schema ───────────────────────────────────────────────────────────

const schema = program.command('schema').description('Schema snapshot commands');

withExamples(
  withOutputFlags(
    schema
      .command('refresh')
      .description('Introspect and store the schema of a dataset')
      .option('--dataset <id>', 'Dataset (defaults to active)')
      .option('--tables <names>', 'Comma-separated tables to include (default all)')
      .action(async function (this: Command, opts: { dataset?: string; tables?: string }) {
        await runCommand(this, async (output) => {
          const settings = loadCliSettings();
          const store = openStore();
          try {
            const datasetId = resolveDataset(store, settings, opts.dataset);
            if (output.verbose) {
              printHuman(`Introspecting dataset "${datasetId}"...`, output);
            }

            let snapshot: SchemaSnapshot;
            try {
              snapshot = await introspectDataset(
                createBigQueryClient(clientOptions(settings)),
                datasetId,
                parseList(opts.tables),
              );
            } catch (err: unknown) {
              throw runtimeError(`Schema introspection failed: ${bigQueryErrorMessage(err)}`, 'QUERY_FAILED');
            }

            store.storeSchemaSnapshot(datasetId, JSON.stringify(snapshot));
            const totalCols = countColumns(snapshot);

            printCommandSuccess(
              {
                dataset: datasetId,
                tables: snapshot.tables.length,
                columns: totalCols,
                capturedAt: snapshot.capturedAt,
              },
              output,
              `Schema refreshed for "${datasetId}" (${snapshot.tables.length} tables, ${totalCols} columns).`,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq schema refresh', 'askbq schema refresh --dataset sales --tables orders,customers'],
);

withExamples(
  withOutputFlags(
    schema
      .command('import <file>')
      .description('Store a schema snapshot from a JSON file')
      .option('--dataset <id>', 'Store under this dataset (default: the snapshot\'s own)')
      .action(async function (this: Command, file: string, opts: { dataset?: string }) {
        await runCommand(this, (output) => {
          if (!existsSync(file)) {
            throw usageError(`File not found: ${file}`);
          }
          let snapshot: SchemaSnapshot;
          try {
            snapshot = parseSchemaSnapshot(readFileSync(file, 'utf-8'));
          } catch (err: unknown) {
            throw usageError(errorMessage(err));
          }

          const datasetId = opts.dataset ?? snapshot.dataset;
          const store = openStore();
          try {
            store.storeSchemaSnapshot(datasetId, JSON.stringify(snapshot));
            printCommandSuccess(
              { dataset: datasetId, tables: snapshot.tables.length, columns: countColumns(snapshot) },
              output,
              `Imported schema for "${datasetId}" (${snapshot.tables.length} tables).`,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq schema import ./snapshot.json', 'askbq schema import ./snapshot.json --dataset sales'],
);

withExamples(
  withOutputFlags(
    schema
      .command('status')
      .description('Show schema snapshot status for a dataset')
      .option('--dataset <id>', 'Dataset (defaults to active)')
      .action(async function (this: Command, opts: { dataset?: string }) {
        await runCommand(this, (output) => {
          const settings = loadCliSettings();
          const store = openStore();
          try {
            const datasetId = resolveDataset(store, settings, opts.dataset);
            const latest = store.getLatestSchemaSnapshot(datasetId);
            if (!latest) {
              printCommandSuccess(
                { dataset: datasetId, hasSnapshot: false, tables: 0, columns: 0, capturedAt: null },
                output,
                `No schema snapshot found for "${datasetId}". Run "askbq schema refresh".`,
              );
              return;
            }
            const snapshot = parseSchemaSnapshot(latest.snapshotJson);
            const totalCols = countColumns(snapshot);
            printCommandSuccess(
              {
                dataset: datasetId,
                hasSnapshot: true,
                tables: snapshot.tables.length,
                columns: totalCols,
                capturedAt: latest.capturedAt,
              },
              output,
              `Schema snapshot for "${datasetId}": ${snapshot.tables.length} tables, ${totalCols} columns, captured ${latest.capturedAt}.`,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq schema status', 'askbq schema status --json'],
);

withExamples(
  withOutputFlags(
    schema
      .command('show')
      .description('Print the schema context sent to the model')
      .option('--dataset <id>', 'Dataset (defaults to active)')
      .option('--tables <names>', 'Comma-separated tables to include')
      .option('--minimal', 'One line per table, column names only', false)
      .action(async function (this: Command, opts: { dataset?: string; tables?: string; minimal: boolean }) {
        await runCommand(this, (output) => {
          const settings = loadCliSettings();
          const store = openStore();
          try {
            const snapshot = loadSnapshot(store, resolveDataset(store, settings, opts.dataset));
            const tables = parseList(opts.tables);
            const context = opts.minimal
              ? buildMinimalContext(snapshot, tables)
              : buildSchemaContext(snapshot, { tables });
            if (output.json) {
              printCommandSuccess({ context }, output);
              return;
            }
            console.log(context);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq schema show', 'askbq schema show --minimal --tables orders'],
);

withExamples(
  withOutputFlags(
    schema
      .command('summarize')
      .description('Ask the model for a short summary of the dataset')
      .option('--dataset <id>', 'Dataset (defaults to active)')
      .action(async function (this: Command, opts: { dataset?: string }) {
        await runCommand(this, async (output) => {
          const settings = loadCliSettings();
          const store = openStore();
          try {
            const snapshot = loadSnapshot(store, resolveDataset(store, settings, opts.dataset));
            const generator = createSqlGenerator(settings, loggerFromOutput(output));
            let summary: string;
            try {
              summary = await generator.summarizeSchema(buildSchemaContext(snapshot), {
                signal: interruptSignal(),
              });
            } catch (err: unknown) {
              throw runtimeError(errorMessage(err), 'LLM_FAILED');
            }
            printCommandSuccess({ summary }, output, summary);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq schema summarize'],
);

// ── validate ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('validate')
      .description('Check SQL against the read-only policy without running it')
      .option('--sql <sql>', 'SQL to check (default: read from stdin)')
      .action(async function (this: Command, opts: { sql?: string }) {
        await runCommand(this, async (output) => {
          const sql = opts.sql ?? (await readStdin());
          const outcome = checkSql(sql);
          if (!outcome.ok) {
            throw policyError(outcome.error.message, {
              kind: outcome.error.kind,
              detail: outcome.error.detail,
            });
          }

          const statements = splitStatements(outcome.sql).map((text) => classifyStatement(text).kind);
          const tables = extractTables(outcome.sql);
          if (output.json) {
            printCommandSuccess({ sql: outcome.sql, statements, tables }, output);
            return;
          }
          printHuman('Policy: ALLOWED', output);
          printHuman(`  SQL:    ${outcome.sql}`, output);
          printHuman(`  Tables: ${tables.length > 0 ? tables.join(', ') : '(none found)'}`, output);
        });
      }),
  ),
  ['askbq validate --sql "SELECT 1"', 'cat query.sql | askbq validate --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

interface AskOpts {
  dataset?: string;
  execute: boolean;
  session?: string;
  tables?: string;
  autoTables: boolean;
  maxRows?: string;
  format: string;
}

function throwForFailedAsk(result: AskResult): void {
  const details = {
    queryId: result.queryId,
    sql: result.generation.sql,
    errorKind: result.generation.errorKind,
    attempts: result.generation.attempts,
  };
  const message = result.error ?? 'SQL generation failed';

  if (result.status === 'failed') {
    if (result.generation.errorKind === 'cancelled') {
      throw runtimeError(message, 'CANCELLED', details);
    }
    if (result.generation.errorKind === 'validation') {
      throw policyError(message, details);
    }
    if (result.generation.errorKind === 'transport') {
      throw runtimeError(message, 'LLM_FAILED', details);
    }
    throw runtimeError(
      `Could not generate valid SQL after ${result.generation.attemptsUsed} attempts: ${message}`,
      'GENERATION_FAILED',
      details,
    );
  }
  if (result.status === 'error') {
    throw runtimeError(message, 'QUERY_FAILED', details);
  }
}

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask a question in plain language: generate read-only SQL, dry-run it, optionally execute')
      .argument('<question>', 'Natural language question')
      .option('--dataset <id>', 'Dataset (defaults to active)')
      .option('--execute', 'Run the generated SQL and print the rows', false)
      .option('--session <id>', 'Continue an earlier conversation')
      .option('--tables <names>', 'Comma-separated tables to include in the schema context')
      .option('--auto-tables', 'Only include tables the question mentions', false)
      .option('--max-rows <n>', 'Row cap for --execute')
      .option('--format <format>', 'Row output: table, json or csv', 'table')
      .action(async function (this: Command, question: string, opts: AskOpts) {
        await runCommand(this, async (output) => {
          const format = parseFormat(opts.format);
          const maxRows = opts.maxRows !== undefined ? parsePositiveInt(opts.maxRows, '--max-rows') : undefined;
          const settings = loadCliSettings();
          const logger = loggerFromOutput(output);
          const store = openStore();
          try {
            const datasetId = resolveDataset(store, settings, opts.dataset);
            if (!store.getLatestSchemaSnapshot(datasetId)) {
              throw usageError(
                `No schema snapshot found for dataset "${datasetId}". Run "askbq schema refresh" first.`,
                'SCHEMA_MISSING',
              );
            }

            logger.info('asking', { dataset: datasetId, session: opts.session, execute: opts.execute });

            const result = await askQuestion(
              {
                question,
                dataset: datasetId,
                sessionId: opts.session,
                tables: parseList(opts.tables),
                autoTables: opts.autoTables,
                execute: opts.execute,
                signal: interruptSignal(),
              },
              store,
              {
                generator: createGenerator(settings),
                engine: createEngine(settings, logger),
                logger,
                options: generatorOptions(settings, maxRows),
              },
            );

            throwForFailedAsk(result);

            if (output.json) {
              printCommandSuccess(result, output);
              return;
            }

            const execution = result.execution;
            if (execution && format !== 'table') {
              printRows(execution.columns ?? [], execution.rows ?? [], format);
              return;
            }

            const { attemptsUsed, attempts } = result.generation;
            printHuman(
              `Generated SQL (model: ${result.model}${attemptsUsed > 1 ? `, attempt ${attemptsUsed}` : ''}):`,
              output,
            );
            printHuman(`  ${result.generation.sql ?? ''}`, output);
            const estimated = attempts[attempts.length - 1]?.estimatedBytes;
            if (estimated !== undefined) {
              printHuman(`  Estimated scan: ${formatBytes(estimated)}`, output);
            }
            if (output.verbose) {
              for (const attempt of attempts) {
                const failure =
                  attempt.transportError ??
                  attempt.extractionError ??
                  attempt.validationError ??
                  attempt.dryRunError;
                if (failure) printWarning(`attempt ${attempt.attemptIndex}: ${failure}`, output);
              }
            }

            if (execution) {
              printHuman('', output);
              printRows(execution.columns ?? [], execution.rows ?? [], format);
              printHuman('', output);
              printHuman(
                `${execution.rowCount} row${execution.rowCount !== 1 ? 's' : ''}` +
                  (execution.truncated ? ` (showing first ${execution.rows?.length ?? 0})` : '') +
                  ` in ${execution.execMs}ms`,
                output,
              );
            } else {
              printHuman('Not executed. Re-run with --execute to fetch rows.', output);
            }
            printHuman(`Query ID: ${result.queryId}`, output);
            printHuman(`Session:  ${result.sessionId} (continue with --session ${result.sessionId})`, output);
          } finally {
            store.close();
          }
        });
      }),
  ),
  [
    'askbq ask "top 10 customers by revenue"',
    'askbq ask "orders per day last week" --execute',
    'askbq ask "and only in France?" --session <session-id> --execute --format csv',
  ],
);

// ── explain ──────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('explain')
      .description('Explain a SQL query in plain language')
      .argument('<sql>', 'SQL to explain')
      .option('--question <text>', 'The question the SQL was meant to answer', '')
      .action(async function (this: Command, sql: string, opts: { question: string }) {
        await runCommand(this, async (output) => {
          const settings = loadCliSettings();
          const generator = createSqlGenerator(settings, loggerFromOutput(output));
          let explanation: string;
          try {
            explanation = await generator.explainSql(sql, opts.question || '(not given)', {
              signal: interruptSignal(),
            });
          } catch (err: unknown) {
            throw runtimeError(errorMessage(err), 'LLM_FAILED');
          }
          printCommandSuccess({ explanation }, output, explanation);
        });
      }),
  ),
  ["askbq explain 'SELECT COUNT(*) AS n FROM `p.d.orders`' --question 'how many orders?'"],
);

// ── suggest ──────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('suggest')
      .description('Suggest questions the dataset can answer')
      .option('--dataset <id>', 'Dataset (defaults to active)')
      .option('--count <n>', 'Number of suggestions', '5')
      .action(async function (this: Command, opts: { dataset?: string; count: string }) {
        await runCommand(this, async (output) => {
          const count = parsePositiveInt(opts.count, '--count');
          const settings = loadCliSettings();
          const store = openStore();
          try {
            const snapshot = loadSnapshot(store, resolveDataset(store, settings, opts.dataset));
            const generator = createSqlGenerator(settings, loggerFromOutput(output));
            let suggestions: string[];
            try {
              suggestions = await generator.suggestQuestions(buildSchemaContext(snapshot), count, {
                signal: interruptSignal(),
              });
            } catch (err: unknown) {
              throw runtimeError(errorMessage(err), 'LLM_FAILED');
            }
            if (output.json) {
              printCommandSuccess(suggestions, output);
              return;
            }
            suggestions.forEach((s, i) => printHuman(`${i + 1}. ${s}`, output));
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq suggest', 'askbq suggest --count 10 --json'],
);

// ── history ─────────────────────────────────────────────────────────

const history = program.command('history').description('Query history');

withExamples(
  withOutputFlags(
    history
      .command('list')
      .description('List recent questions')
      .option('--limit <n>', 'Number of items', '20')
      .option('--session <id>', 'Only this conversation')
      .action(async function (this: Command, opts: { limit: string; session?: string }) {
        await runCommand(this, (output) => {
          const limit = parsePositiveInt(opts.limit, '--limit');
          const store = openStore();
          try {
            const items = listHistory(store.getDb(), { limit, sessionId: opts.session });

            if (output.json) {
              printCommandSuccess(items, output);
              return;
            }
            if (items.length === 0) {
              printHuman('No queries in history. Use "askbq ask" to generate queries.', output);
              return;
            }
            printHumanTable(
              ['id', 'session', 'question', 'asked_at', 'generated', 'attempts', 'run', 'row_count'],
              items.map((item) => ({
                id: item.id.slice(0, 8) + '...',
                session: item.sessionId.slice(0, 8),
                question: item.question.length > 50 ? item.question.slice(0, 47) + '...' : item.question,
                asked_at: item.askedAt,
                generated: item.success === null ? '-' : item.success ? 'yes' : 'no',
                attempts: item.attemptsUsed ?? '-',
                run: item.runStatus ?? '-',
                row_count: item.rowCount ?? '-',
              })),
              output,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq history list --limit 20', 'askbq history list --session <session-id> --json'],
);

withExamples(
  withOutputFlags(
    history
      .command('show <id>')
      .description('Show details for a specific query')
      .action(async function (this: Command, id: string) {
        await runCommand(this, (output) => {
          const store = openStore();
          try {
            const db = store.getDb();
            const fullId = id.length < 36 ? findQueryId(db, id) ?? id : id;
            const detail = getHistoryItem(db, fullId);
            if (!detail) throw usageError(`Query "${id}" not found.`);

            if (output.json) {
              printCommandSuccess(detail, output);
              return;
            }
            printHuman(`Query ID:  ${detail.query.id}`, output);
            printHuman(`Session:   ${detail.query.sessionId}`, output);
            printHuman(`Dataset:   ${detail.query.dataset}`, output);
            printHuman(`Question:  ${detail.query.question}`, output);
            printHuman(`Asked at:  ${detail.query.askedAt}`, output);
            if (detail.generation) {
              const gen = detail.generation;
              printHuman('\nGeneration:', output);
              printHuman(`  Model:    ${gen.model}`, output);
              printHuman(`  Result:   ${gen.success ? 'ok' : `failed (${gen.errorKind ?? 'unknown'})`}`, output);
              printHuman(`  Attempts: ${gen.attemptsUsed}`, output);
              printHuman(`  SQL:      ${gen.sql ?? '-'}`, output);
              if (gen.errorText) printHuman(`  Error:    ${gen.errorText}`, output);
              for (const attempt of gen.attempts) {
                printHuman(
                  `  #${attempt.attemptIndex} (t=${attempt.temperature}): ` +
                    (attempt.errorKind ? `${attempt.errorKind}: ${attempt.errorText ?? ''}` : 'ok'),
                  output,
                );
              }
            }
            if (detail.execution) {
              const run = detail.execution;
              printHuman('\nExecution:', output);
              printHuman(`  Status:    ${run.status}`, output);
              printHuman(`  Exec time: ${run.execMs}ms`, output);
              printHuman(`  Row count: ${run.rowCount}${run.truncated ? ' (truncated)' : ''}`, output);
              if (run.errorText) printHuman(`  Error:     ${run.errorText}`, output);
            }
            printHuman('\nNote: Result rows are not stored in history.', output);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askbq history show <query-id>', 'askbq history show <query-id-prefix> --json'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander reports help, version and usage failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
