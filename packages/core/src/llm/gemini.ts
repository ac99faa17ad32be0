/**
 * Gemini adapter on @google/generative-ai.
 */

import { GoogleGenerativeAI, type Content } from '@google/generative-ai';
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

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

export interface GeminiGeneratorOptions {
  apiKey: string;
  model?: string;
}

export class GeminiGenerator implements TextGenerator {
  readonly provider = 'gemini';
  readonly model: string;
  private client: GoogleGenerativeAI;

  constructor(options: GeminiGeneratorOptions) {
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.client = new GoogleGenerativeAI(options.apiKey);
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
    const model = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: settings.systemInstruction,
      generationConfig: {
        temperature: settings.temperature ?? DEFAULT_TEMPERATURE,
        maxOutputTokens: settings.maxTokens ?? DEFAULT_MAX_TOKENS,
      },
    });

    const contents: Content[] = messages.map((m) => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

    let text: string;
    try {
      const result = await model.generateContent({ contents }, { signal: settings.signal });
      // text() throws when the candidate was blocked
      text = result.response.text();
    } catch (err: unknown) {
      throw new LlmError(this.provider, `Gemini generation failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!text.trim()) {
      throw new LlmError(this.provider, 'Empty response from Gemini');
    }
    return text.trim();
  }
}
