import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { ChatTurn } from '../../types.js';
import {
  MAX_REPLAYED_TURNS,
  SYSTEM_INSTRUCTION,
  buildExplanationPrompt,
  buildGenerationPrompt,
  buildRetryPrompt,
  buildSuggestionPrompt,
  parseNumberedList,
  selectReplayTurns,
} from '../prompt.js';

const SCHEMA = 'Project: demo\nDataset: shop\n';

describe('SYSTEM_INSTRUCTION', () => {
  it('states the read-only and output rules', () => {
    assert.match(SYSTEM_INSTRUCTION, /Generate ONLY SELECT queries/);
    assert.match(SYSTEM_INSTRUCTION, /fully qualified table names in backticks/);
    assert.match(SYSTEM_INSTRUCTION, /LIMIT clause/);
    assert.match(SYSTEM_INSTRUCTION, /markdown code block tagged sql/);
  });
});

describe('selectReplayTurns', () => {
  it('keeps only turns with SQL, most recent last, at most five', () => {
    const history: ChatTurn[] = [
      { question: 'q1', sql: 'SELECT 1' },
      { question: 'q2', sql: 'SELECT 2' },
      { question: 'q3', sql: null, error: 'failed' },
      { question: 'q4', sql: 'SELECT 4' },
      { question: 'q5', sql: 'SELECT 5' },
      { question: 'q6', sql: 'SELECT 6' },
      { question: 'q7', sql: 'SELECT 7' },
    ];
    const turns = selectReplayTurns(history);
    assert.equal(turns.length, MAX_REPLAYED_TURNS);
    assert.deepEqual(
      turns.map((t) => t.question),
      ['q2', 'q4', 'q5', 'q6', 'q7'],
    );
  });
});

describe('buildGenerationPrompt', () => {
  it('renders schema, question and instruction without history', () => {
    const prompt = buildGenerationPrompt({ question: ' How many users? ', schemaContext: SCHEMA });
    assert.equal(
      prompt,
      [
        '## Database Schema',
        'Project: demo\nDataset: shop',
        '',
        '## Current Question',
        'How many users?',
        '',
        'Generate a BigQuery SQL query to answer this question.',
      ].join('\n'),
    );
  });

  it('replays earlier turns before the current question', () => {
    const prompt = buildGenerationPrompt({
      question: 'Only in France?',
      schemaContext: SCHEMA,
      history: [
        { question: 'Count users', sql: 'SELECT COUNT(*) AS n FROM `demo.shop.users`' },
        { question: 'Broken one', error: 'no SQL' },
      ],
    });
    assert.ok(
      prompt.includes(
        '## Previous Conversation\nUser: Count users\nSQL Generated:\n```sql\nSELECT COUNT(*) AS n FROM `demo.shop.users`\n```\n\n## Current Question\nOnly in France?',
      ),
    );
    assert.equal(prompt.includes('Broken one'), false);
  });
});

describe('buildRetryPrompt', () => {
  it('includes the failed SQL and the error', () => {
    const prompt = buildRetryPrompt({
      question: 'Count users',
      schemaContext: SCHEMA,
      failedSql: 'SELECT COUNT(*) FROM users',
      errorMessage: 'Table "users" must be qualified with a dataset',
    });
    assert.ok(prompt.includes('## Failed SQL Query\n```sql\nSELECT COUNT(*) FROM users\n```'));
    assert.ok(prompt.includes('## Error Message\nTable "users" must be qualified with a dataset'));
    assert.ok(prompt.includes('## Original Question\nCount users'));
  });

  it('says so when no SQL was extracted', () => {
    const prompt = buildRetryPrompt({
      question: 'Count users',
      schemaContext: SCHEMA,
      failedSql: null,
      errorMessage: 'Could not extract SQL from response',
    });
    assert.ok(prompt.includes('## Failed SQL Query\n(no SQL could be extracted from the previous response)\n'));
  });
});

describe('auxiliary prompts', () => {
  it('embeds the SQL to explain', () => {
    const prompt = buildExplanationPrompt({ sql: ' SELECT 1 ', question: 'one?' });
    assert.ok(prompt.startsWith('## Original Question\none?\n\n## SQL Query\n```sql\nSELECT 1\n```'));
  });

  it('asks for the requested number of suggestions', () => {
    assert.match(buildSuggestionPrompt({ schemaContext: SCHEMA, count: 7 }), /suggest 7 interesting questions/);
  });
});

describe('parseNumberedList', () => {
  it('reads dotted and parenthesised items and skips other lines', () => {
    const text = 'Here are some ideas:\n1. First?\n2) Second?\n- bullet\n3.   \n10. Tenth';
    assert.deepEqual(parseNumberedList(text, 5), ['First?', 'Second?', 'Tenth']);
  });

  it('stops at the limit', () => {
    assert.deepEqual(parseNumberedList('1. a\n2. b\n3. c', 2), ['a', 'b']);
  });
});
