/**
 * Language-model generator contract.
 * Adapters throw LlmError on transport failure or an empty response.
 */

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface GenerationSettings {
  systemInstruction?: string;
  /** Lower is more deterministic. Default: 0.1 */
  temperature?: number;
  /** Default: 2048 */
  maxTokens?: number;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

export interface GenerateRequest extends GenerationSettings {
  prompt: string;
}

export interface ChatRequest extends GenerationSettings {
  messages: readonly ChatMessage[];
}

export interface TextGenerator {
  readonly provider: string;
  readonly model: string;

  generate(request: GenerateRequest): Promise<string>;

  chat(request: ChatRequest): Promise<string>;
}

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 2048;
