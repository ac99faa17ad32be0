/**
 * Retry-driven text-to-SQL generation.
 *
 * Each attempt runs prompt → model → extract → validate → dry run. Any
 * failure along the way becomes feedback for the next attempt's retry
 * prompt; nothing inside the loop throws. The generator instance holds no
 * per-request state, so one instance can serve concurrent requests.
 */

import type { QueryEngine } from './db/types.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { errorMessage } from './errors.js';
import { extractSql } from './llm/extract.js';
import {
  SYSTEM_INSTRUCTION,
  buildExplanationPrompt,
  buildGenerationPrompt,
  buildRetryPrompt,
  buildSchemaSummaryPrompt,
  buildSuggestionPrompt,
  parseNumberedList,
} from './llm/prompt.js';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, type TextGenerator } from './llm/types.js';
import { silentLogger, type Logger } from './logger.js';
import { checkSql } from './policy/validator.js';
import type {
  AttemptErrorKind,
  ChatTurn,
  ExecutionResult,
  GenerationAttempt,
  GenerationResult,
} from './types.js';
import { abortMessage, combineSignals, timeoutSignal } from './util/abort.js';

export const EXTRACTION_FAILED_MESSAGE = 'Could not extract SQL from response';

export interface SqlGeneratorDeps {
  generator: TextGenerator;
  engine: QueryEngine;
  logger?: Logger;
}

export interface SqlGeneratorOptions {
  /** Attempt budget, including the first try. Default: 3 */
  maxRetries?: number;
  initialTemperature?: number;
  retryTemperature?: number;
  maxTokens?: number;
  /** Byte ceiling for dry runs and execution */
  maxBytesBilled?: number;
  maxRows?: number;
  /** Timeout for each model or engine call; 0 disables it */
  callTimeoutMs?: number;
  /** Budget for the whole generation loop; 0 disables it */
  deadlineMs?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** What one iteration hands to the next. */
interface LoopState {
  readonly lastSql: string | null;
  readonly lastError: string | null;
  readonly lastErrorKind: AttemptErrorKind | null;
  readonly attempts: readonly GenerationAttempt[];
}

type AttemptOutcome =
  | { readonly status: 'success'; readonly sql: string; readonly attempt: GenerationAttempt }
  | {
      readonly status: 'failed';
      readonly errorKind: AttemptErrorKind;
      readonly error: string;
      /** SQL this attempt produced, if any */
      readonly sql: string | null;
      readonly attempt: GenerationAttempt;
    };

const INITIAL_STATE: LoopState = { lastSql: null, lastError: null, lastErrorKind: null, attempts: [] };

export class SqlGenerator {
  private readonly generator: TextGenerator;
  private readonly engine: QueryEngine;
  private readonly logger: Logger;
  private readonly options: Required<SqlGeneratorOptions>;

  constructor(deps: SqlGeneratorDeps, options: SqlGeneratorOptions = {}) {
    this.generator = deps.generator;
    this.engine = deps.engine;
    this.logger = deps.logger ?? silentLogger;
    this.options = {
      maxRetries: options.maxRetries ?? 3,
      initialTemperature: options.initialTemperature ?? DEFAULT_TEMPERATURE,
      retryTemperature: options.retryTemperature ?? 0.2,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      maxBytesBilled: options.maxBytesBilled ?? SAFE_DEFAULTS.maxBytesBilled,
      maxRows: options.maxRows ?? SAFE_DEFAULTS.maxRows,
      callTimeoutMs: options.callTimeoutMs ?? 0,
      deadlineMs: options.deadlineMs ?? 0,
    };
    if (!Number.isInteger(this.options.maxRetries) || this.options.maxRetries < 1) {
      throw new Error(`maxRetries must be a positive integer, got ${this.options.maxRetries}`);
    }
  }

  async generateSql(
    question: string,
    schemaContext: string,
    history: readonly ChatTurn[] = [],
    run: RunOptions = {},
  ): Promise<GenerationResult> {
    const pipeline = combineSignals(run.signal, timeoutSignal(this.options.deadlineMs));
    let state = INITIAL_STATE;

    for (let index = 1; index <= this.options.maxRetries; index++) {
      if (pipeline?.aborted) return cancelledResult(state, pipeline);

      const outcome = await this.runAttempt(index, question, schemaContext, history, state, pipeline);
      const attempts = [...state.attempts, outcome.attempt];

      if (outcome.status === 'success') {
        this.logger.debug('generation succeeded', { attempt: index });
        return {
          success: true,
          sql: outcome.sql,
          error: null,
          errorKind: null,
          attemptsUsed: index,
          attempts,
        };
      }

      this.logger.debug('attempt failed', { attempt: index, kind: outcome.errorKind, error: outcome.error });
      state = {
        lastSql: outcome.sql ?? state.lastSql,
        lastError: outcome.error,
        lastErrorKind: outcome.errorKind,
        attempts,
      };

      if (pipeline?.aborted) return cancelledResult(state, pipeline);
    }

    this.logger.warn('generation exhausted retries', {
      attempts: state.attempts.length,
      lastError: state.lastError,
    });
    return {
      success: false,
      sql: state.lastSql,
      error: state.lastError,
      errorKind: state.lastErrorKind,
      attemptsUsed: state.attempts.length,
      attempts: state.attempts,
    };
  }

  /**
   * Generate, then run the SQL for real. Execution failures are reported
   * as-is and never retried.
   */
  async generateAndExecute(
    question: string,
    schemaContext: string,
    history: readonly ChatTurn[] = [],
    run: RunOptions = {},
  ): Promise<ExecutionResult> {
    const generation = await this.generateSql(question, schemaContext, history, run);
    if (!generation.success || generation.sql === null) {
      return {
        success: false,
        sql: generation.sql ?? '',
        rowCount: 0,
        truncated: false,
        execMs: 0,
        error: generation.error ?? 'SQL generation failed',
        generation,
      };
    }

    const check = checkSql(generation.sql);
    if (!check.ok) {
      return {
        success: false,
        sql: generation.sql,
        rowCount: 0,
        truncated: false,
        execMs: 0,
        error: check.error.message,
        generation,
      };
    }

    try {
      const result = await this.engine.execute(check.sql, {
        dryRun: false,
        maxBytesBilled: this.options.maxBytesBilled,
        maxRows: this.options.maxRows,
        signal: run.signal,
      });
      return {
        success: true,
        sql: check.sql,
        columns: result.columns,
        rows: result.rows,
        rowCount: result.rowCount,
        truncated: result.truncated,
        execMs: result.execMs,
        generation,
      };
    } catch (err: unknown) {
      return {
        success: false,
        sql: check.sql,
        rowCount: 0,
        truncated: false,
        execMs: 0,
        error: errorMessage(err),
        generation,
      };
    }
  }

  async explainSql(sql: string, question: string, run: RunOptions = {}): Promise<string> {
    return this.generator.generate({
      prompt: buildExplanationPrompt({ sql, question }),
      temperature: 0.3,
      maxTokens: this.options.maxTokens,
      signal: this.callSignal(run.signal),
    });
  }

  async suggestQuestions(schemaContext: string, count = 5, run: RunOptions = {}): Promise<string[]> {
    const response = await this.generator.generate({
      prompt: buildSuggestionPrompt({ schemaContext, count }),
      temperature: 0.7,
      maxTokens: this.options.maxTokens,
      signal: this.callSignal(run.signal),
    });
    return parseNumberedList(response, count);
  }

  async summarizeSchema(schemaContext: string, run: RunOptions = {}): Promise<string> {
    return this.generator.generate({
      prompt: buildSchemaSummaryPrompt({ schemaContext }),
      temperature: 0.3,
      maxTokens: this.options.maxTokens,
      signal: this.callSignal(run.signal),
    });
  }

  private callSignal(pipeline: AbortSignal | undefined): AbortSignal | undefined {
    return combineSignals(pipeline, timeoutSignal(this.options.callTimeoutMs));
  }

  private async runAttempt(
    attemptIndex: number,
    question: string,
    schemaContext: string,
    history: readonly ChatTurn[],
    state: LoopState,
    pipeline: AbortSignal | undefined,
  ): Promise<AttemptOutcome> {
    const first = attemptIndex === 1;
    const promptUsed = first
      ? buildGenerationPrompt({ question, schemaContext, history })
      : buildRetryPrompt({
          question,
          schemaContext,
          failedSql: state.lastSql,
          errorMessage: state.lastError ?? 'Unknown error',
        });
    const temperature = first ? this.options.initialTemperature : this.options.retryTemperature;
    const base = { attemptIndex, promptUsed, temperature };

    let rawModelText: string;
    try {
      rawModelText = await this.generator.generate({
        prompt: promptUsed,
        systemInstruction: SYSTEM_INSTRUCTION,
        temperature,
        maxTokens: this.options.maxTokens,
        signal: this.callSignal(pipeline),
      });
    } catch (err: unknown) {
      const error = errorMessage(err);
      return {
        status: 'failed',
        errorKind: 'transport',
        error,
        sql: null,
        attempt: { ...base, rawModelText: '', transportError: error },
      };
    }

    const extracted = extractSql(rawModelText);
    if (extracted === null) {
      return {
        status: 'failed',
        errorKind: 'extraction',
        error: EXTRACTION_FAILED_MESSAGE,
        sql: null,
        attempt: { ...base, rawModelText, extractionError: EXTRACTION_FAILED_MESSAGE },
      };
    }

    const check = checkSql(extracted);
    if (!check.ok) {
      const error = check.error.message;
      return {
        status: 'failed',
        errorKind: 'validation',
        error,
        sql: extracted,
        attempt: { ...base, rawModelText, extractedSql: extracted, validationError: error },
      };
    }

    try {
      const dryRun = await this.engine.execute(check.sql, {
        dryRun: true,
        maxBytesBilled: this.options.maxBytesBilled,
        signal: this.callSignal(pipeline),
      });
      return {
        status: 'success',
        sql: check.sql,
        attempt: {
          ...base,
          rawModelText,
          extractedSql: extracted,
          estimatedBytes: dryRun.totalBytesProcessed,
        },
      };
    } catch (err: unknown) {
      const error = errorMessage(err);
      return {
        status: 'failed',
        errorKind: 'dry_run',
        error,
        sql: check.sql,
        attempt: { ...base, rawModelText, extractedSql: extracted, dryRunError: error },
      };
    }
  }
}

function cancelledResult(state: LoopState, signal: AbortSignal): GenerationResult {
  return {
    success: false,
    sql: state.lastSql,
    error: `Generation cancelled: ${abortMessage(signal)}`,
    errorKind: 'cancelled',
    attemptsUsed: state.attempts.length,
    attempts: state.attempts,
  };
}
