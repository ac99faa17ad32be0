/**
 * LLM module barrel export.
 */

import type { Settings } from '../config.js';
import { GeminiGenerator } from './gemini.js';
import { OpenAiGenerator } from './openai.js';
import type { TextGenerator } from './types.js';

export type {
  ChatMessage,
  ChatRequest,
  GenerateRequest,
  GenerationSettings,
  TextGenerator,
} from './types.js';
export { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from './types.js';
export { OpenAiGenerator, DEFAULT_OPENAI_MODEL } from './openai.js';
export type { OpenAiGeneratorOptions, ChatCompletionsClient } from './openai.js';
export { GeminiGenerator, DEFAULT_GEMINI_MODEL } from './gemini.js';
export type { GeminiGeneratorOptions } from './gemini.js';
export { extractSql } from './extract.js';
export {
  SYSTEM_INSTRUCTION,
  MAX_REPLAYED_TURNS,
  selectReplayTurns,
  buildGenerationPrompt,
  buildRetryPrompt,
  buildExplanationPrompt,
  buildSuggestionPrompt,
  buildSchemaSummaryPrompt,
  parseNumberedList,
} from './prompt.js';
export type { GenerationPromptInput, RetryPromptInput } from './prompt.js';
export { buildSchemaContext, buildMinimalContext, findRelevantTables } from './schema.js';
export type { SchemaContextOpts } from './schema.js';
export { parseSchemaSnapshot, schemaSnapshotSchema } from './schema_json.js';

/** Build the generator selected by `ASKBQ_LLM_PROVIDER`; throws when its API key is missing. */
export function createTextGenerator(settings: Settings): TextGenerator {
  const model = settings.model ?? undefined;

  if (settings.llmProvider === 'gemini') {
    if (!settings.geminiApiKey) {
      throw new Error('GEMINI_API_KEY environment variable is not set. Set it to use Gemini.');
    }
    return new GeminiGenerator({ apiKey: settings.geminiApiKey, model });
  }

  if (!settings.openaiApiKey) {
    throw new Error(
      'OPENAI_API_KEY environment variable is not set. ' +
        'Set it to use OpenAI, or set ASKBQ_LLM_PROVIDER=gemini.',
    );
  }
  return new OpenAiGenerator({ apiKey: settings.openaiApiKey, model });
}
