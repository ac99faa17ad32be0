/**
 * Records produced by the text-to-SQL pipeline.
 * All of them are created once per request and never mutated.
 */

/** One exchange of a conversation. Only turns with `sql` are replayed into prompts. */
export interface ChatTurn {
  readonly question: string;
  readonly sql?: string | null;
  readonly error?: string | null;
}

export type AttemptErrorKind = 'transport' | 'extraction' | 'validation' | 'dry_run';

export type GenerationErrorKind = AttemptErrorKind | 'cancelled';

export interface GenerationAttempt {
  /** 1-based */
  readonly attemptIndex: number;
  readonly promptUsed: string;
  readonly temperature: number;
  /** Empty when the generator call itself failed */
  readonly rawModelText: string;
  readonly extractedSql?: string;
  readonly transportError?: string;
  readonly extractionError?: string;
  readonly validationError?: string;
  readonly dryRunError?: string;
  /** Bytes the dry run reported the query would scan */
  readonly estimatedBytes?: number;
}

export interface GenerationResult {
  readonly success: boolean;
  /** Validated SQL on success; the last attempted SQL (or null) otherwise */
  readonly sql: string | null;
  readonly error: string | null;
  readonly errorKind: GenerationErrorKind | null;
  readonly attemptsUsed: number;
  readonly attempts: readonly GenerationAttempt[];
}

export interface ExecutionResult {
  readonly success: boolean;
  readonly sql: string;
  readonly columns?: string[];
  readonly rows?: Record<string, unknown>[];
  readonly rowCount: number;
  readonly truncated: boolean;
  readonly execMs: number;
  readonly error?: string;
  readonly generation: GenerationResult;
}
