/**
 * OpenAI chat-completions adapter.
 */

import OpenAI from 'openai';
import { LlmError, errorMessage } from '../errors.js';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type ChatMessage,
  type ChatRequest,
  type GenerateRequest,
  type GenerationSettings,
  type TextGenerator,
} from './types.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

/** The slice of the OpenAI client this adapter calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<{ choices: Array<{ message?: { content?: string | null } }> }>;
    };
  };
}

export interface OpenAiGeneratorOptions {
  apiKey: string;
  model?: string;
  /** Pre-built client, mainly for tests */
  client?: ChatCompletionsClient;
}

export class OpenAiGenerator implements TextGenerator {
  readonly provider = 'openai';
  readonly model: string;
  private client: ChatCompletionsClient;

  constructor(options: OpenAiGeneratorOptions) {
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async generate(request: GenerateRequest): Promise<string> {
    return this.complete([{ role: 'user', content: request.prompt }], request);
  }

  async chat(request: ChatRequest): Promise<string> {
    return this.complete(request.messages, request);
  }

  private async complete(
    messages: readonly ChatMessage[],
    settings: GenerationSettings,
  ): Promise<string> {
    const payload: OpenAI.ChatCompletionMessageParam[] = [];
    if (settings.systemInstruction) {
      payload.push({ role: 'system', content: settings.systemInstruction });
    }
    for (const message of messages) {
      payload.push(
        message.role === 'assistant'
          ? { role: 'assistant', content: message.content }
          : { role: 'user', content: message.content },
      );
    }

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: payload,
          temperature: settings.temperature ?? DEFAULT_TEMPERATURE,
          max_tokens: settings.maxTokens ?? DEFAULT_MAX_TOKENS,
        },
        { signal: settings.signal },
      );
      content = response.choices[0]?.message?.content;
    } catch (err: unknown) {
      throw new LlmError(this.provider, `OpenAI generation failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!content || !content.trim()) {
      throw new LlmError(this.provider, 'OpenAI returned empty response.');
    }
    return content.trim();
  }
}
