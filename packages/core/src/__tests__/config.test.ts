import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_DEADLINE_MS, loadEnvFile, loadSettings } from '../config.js';

describe('loadSettings', () => {
  it('applies defaults for an empty environment', () => {
    assert.deepEqual(loadSettings({}), {
      projectId: null,
      location: null,
      defaultDataset: null,
      maxBytesBilled: 1_000_000_000,
      maxRows: 5000,
      llmProvider: 'openai',
      model: null,
      openaiApiKey: null,
      geminiApiKey: null,
      maxRetries: 3,
      llmTimeoutMs: 60_000,
      deadlineMs: DEFAULT_DEADLINE_MS,
    });
  });

  it('reads overrides and falls back to GOOGLE_CLOUD_PROJECT', () => {
    const settings = loadSettings({
      GOOGLE_CLOUD_PROJECT: 'demo',
      ASKBQ_DATASET: ' shop ',
      ASKBQ_LLM_PROVIDER: 'Gemini',
      ASKBQ_MAX_RETRIES: '5',
      ASKBQ_MODEL: '',
    });
    assert.equal(settings.projectId, 'demo');
    assert.equal(settings.defaultDataset, 'shop');
    assert.equal(settings.llmProvider, 'gemini');
    assert.equal(settings.maxRetries, 5);
    assert.equal(settings.model, null);
  });

  it('prefers ASKBQ_PROJECT', () => {
    assert.equal(loadSettings({ ASKBQ_PROJECT: 'a', GOOGLE_CLOUD_PROJECT: 'b' }).projectId, 'a');
  });

  it('rejects invalid numbers and providers', () => {
    assert.throws(() => loadSettings({ ASKBQ_MAX_ROWS: '0' }), {
      message: 'ASKBQ_MAX_ROWS must be a positive integer, got "0".',
    });
    assert.throws(() => loadSettings({ ASKBQ_MAX_RETRIES: '2.5' }), {
      message: 'ASKBQ_MAX_RETRIES must be a positive integer, got "2.5".',
    });
    assert.throws(() => loadSettings({ ASKBQ_LLM_PROVIDER: 'claude' }), {
      message: 'ASKBQ_LLM_PROVIDER must be "openai" or "gemini", got "claude".',
    });
  });
});

describe('loadEnvFile', () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'askbq-config-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('seeds missing keys from the first existing file', () => {
    const path = join(dir, 'config.env');
    writeFileSync(
      path,
      [
        '# comment',
        '',
        'ASKBQ_DATASET="shop"',
        "OPENAI_API_KEY='test-secret'",
        'ASKBQ_PROJECT=from-file',
        'not a pair',
        '=orphan',
      ].join('\n'),
    );
    const env: NodeJS.ProcessEnv = { ASKBQ_PROJECT: 'from-env' };

    assert.equal(loadEnvFile([join(dir, 'missing.env'), path], env), path);
    assert.deepEqual(env, {
      ASKBQ_PROJECT: 'from-env',
      ASKBQ_DATASET: 'shop',
      OPENAI_API_KEY: 'test-secret',
    });
  });

  it('returns null when no file exists', () => {
    const env: NodeJS.ProcessEnv = {};
    assert.equal(loadEnvFile([join(dir, 'none.env')], env), null);
    assert.deepEqual(env, {});
  });
});
