import type { ExecuteOptions, QueryEngine, TabularResult } from '../db/types.js';
import type { GenerateRequest, TextGenerator } from '../llm/types.js';

export type ScriptedReply = string | Error | ((request: GenerateRequest) => Promise<string>);

/** Answers `generate` calls from a fixed script and records every request. */
export class ScriptedGenerator implements TextGenerator {
  readonly provider = 'test';
  readonly model = 'test-model';
  readonly requests: GenerateRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async generate(request: GenerateRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('no scripted reply left');
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request);
    return reply;
  }

  async chat(): Promise<string> {
    throw new Error('chat is not scripted');
  }
}

export type EngineHandler = (sql: string, options: ExecuteOptions) => TabularResult;

export class FakeEngine implements QueryEngine {
  readonly calls: Array<{ sql: string; options: ExecuteOptions }> = [];
  private readonly handler: EngineHandler;

  constructor(handler: EngineHandler = () => emptyResult()) {
    this.handler = handler;
  }

  async execute(sql: string, options: ExecuteOptions): Promise<TabularResult> {
    this.calls.push({ sql, options });
    return this.handler(sql, options);
  }
}

export function emptyResult(totalBytesProcessed?: number): TabularResult {
  return { columns: [], rows: [], rowCount: 0, truncated: false, execMs: 0, totalBytesProcessed };
}

export function fenced(sql: string): string {
  return 'Here is the query:\n```sql\n' + sql + '\n```';
}
