/**
 * Prompt construction for BigQuery SQL generation.
 * Pure formatting over explicit inputs; nothing here calls a model.
 */

import type { ChatTurn } from '../types.js';

/** How many earlier (question, sql) pairs are replayed into a prompt */
export const MAX_REPLAYED_TURNS = 5;

export const SYSTEM_INSTRUCTION = `You are a BigQuery SQL expert. You answer questions about the user's data by writing accurate, efficient SQL.

RULES:
1. Generate ONLY SELECT queries (CTEs with WITH are fine). Never generate INSERT, UPDATE, DELETE, MERGE, DROP, CREATE, ALTER, TRUNCATE or any other statement that changes data or schema.
2. Always use fully qualified table names in backticks: \`project.dataset.table\`.
3. Use the BigQuery Standard SQL dialect and its functions (DATE, TIMESTAMP, EXTRACT, DATE_TRUNC, SAFE_DIVIDE, ...), not MySQL or PostgreSQL syntax.
4. Always include a LIMIT clause to bound the result size.
5. Give every function call or derived expression a column alias.
6. Handle NULL values explicitly (IS NULL, COALESCE, IFNULL) where they affect the answer.

OUTPUT FORMAT:
- Return ONLY the SQL query inside a markdown code block tagged sql.
- No text before or after the code block.
- If the request cannot be answered with a single read-only SELECT query, say why in plain text instead of writing SQL.`;

export interface GenerationPromptInput {
  question: string;
  schemaContext: string;
  history?: readonly ChatTurn[];
}

export interface RetryPromptInput {
  question: string;
  schemaContext: string;
  /** SQL of the failed attempt; null when no SQL could be extracted */
  failedSql: string | null;
  errorMessage: string;
}

/** Turns that carry SQL, most recent last, at most MAX_REPLAYED_TURNS. */
export function selectReplayTurns(history: readonly ChatTurn[]): ChatTurn[] {
  return history.filter((turn) => Boolean(turn.sql)).slice(-MAX_REPLAYED_TURNS);
}

export function buildGenerationPrompt(input: GenerationPromptInput): string {
  const parts: string[] = ['## Database Schema', input.schemaContext.trim(), ''];

  const turns = selectReplayTurns(input.history ?? []);
  if (turns.length > 0) {
    parts.push('## Previous Conversation');
    for (const turn of turns) {
      parts.push(`User: ${turn.question}`);
      parts.push('SQL Generated:', '```sql', turn.sql ?? '', '```');
    }
    parts.push('');
  }

  parts.push('## Current Question', input.question.trim(), '');
  parts.push('Generate a BigQuery SQL query to answer this question.');

  return parts.join('\n');
}

export function buildRetryPrompt(input: RetryPromptInput): string {
  const failed = input.failedSql
    ? ['```sql', input.failedSql, '```']
    : ['(no SQL could be extracted from the previous response)'];

  return [
    '## Database Schema',
    input.schemaContext.trim(),
    '',
    '## Original Question',
    input.question.trim(),
    '',
    '## Failed SQL Query',
    ...failed,
    '',
    '## Error Message',
    input.errorMessage,
    '',
    '## Task',
    'The SQL query above failed with the given error. Fix it and write a corrected query.',
    'Return only the corrected SQL query in a sql code block, with no explanation.',
  ].join('\n');
}

export function buildExplanationPrompt(input: { sql: string; question: string }): string {
  return `## Original Question
${input.question.trim()}

## SQL Query
\`\`\`sql
${input.sql.trim()}
\`\`\`

Explain what this SQL query does in simple terms:
1. Which tables and columns does it use?
2. Which filters or conditions does it apply?
3. How are the results grouped or ordered?
4. What will the output look like?

Keep the explanation short and readable for non-technical users.`;
}

export function buildSuggestionPrompt(input: { schemaContext: string; count: number }): string {
  return `## Database Schema
${input.schemaContext.trim()}

Based on this schema, suggest ${input.count} interesting questions that could be answered with SQL queries.

Format your response as a numbered list:
1. [question]
2. [question]
...

Focus on questions that give useful business insight.`;
}

export function buildSchemaSummaryPrompt(input: { schemaContext: string }): string {
  return `## Database Schema
${input.schemaContext.trim()}

Give a brief summary of this schema:
1. What kind of data does it hold?
2. What are the main entities and tables?
3. What kinds of questions could it answer?

Keep the summary to 3-5 sentences.`;
}

/** Parse `1. question` / `2) question` lines out of a numbered list. */
export function parseNumberedList(text: string, limit: number): string[] {
  const items: string[] = [];
  for (const raw of text.split('\n')) {
    const match = /^\s*\d+[.)]\s*(.+)$/.exec(raw);
    if (match) {
      const item = match[1].trim();
      if (item) items.push(item);
    }
  }
  return items.slice(0, limit);
}
