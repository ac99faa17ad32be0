/**
 * Runtime settings, read from the environment.
 *
 * Values may be seeded from `.askbq/config.env` (cwd first, then home);
 * variables already set in the environment always win.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { SAFE_DEFAULTS } from './db/defaults.js';

export type LlmProvider = 'openai' | 'gemini';

export interface Settings {
  projectId: string | null;
  location: string | null;
  defaultDataset: string | null;
  maxBytesBilled: number;
  maxRows: number;
  llmProvider: LlmProvider;
  /** null means the provider's default model */
  model: string | null;
  openaiApiKey: string | null;
  geminiApiKey: string | null;
  maxRetries: number;
  llmTimeoutMs: number;
  deadlineMs: number;
}

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_LLM_TIMEOUT_MS = 60_000;
export const DEFAULT_DEADLINE_MS = 180_000;

export function defaultEnvFilePaths(): string[] {
  return [resolve(process.cwd(), '.askbq', 'config.env'), join(homedir(), '.askbq', 'config.env')];
}

function parseEnvLine(line: string): { key: string; value: string } | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;
  const idx = trimmed.indexOf('=');
  if (idx <= 0) return null;
  const key = trimmed.slice(0, idx).trim();
  if (!key) return null;
  let value = trimmed.slice(idx + 1).trim();
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    value = value.slice(1, -1);
  }
  return { key, value };
}

/**
 * Copy `KEY=value` lines from the first existing file into `env`, without
 * overriding keys already present. Returns the file used, or null.
 */
export function loadEnvFile(
  paths: string[] = defaultEnvFilePaths(),
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  const envPath = paths.find((path) => existsSync(path));
  if (!envPath) return null;

  const contents = readFileSync(envPath, 'utf-8');
  for (const line of contents.split(/\r?\n/)) {
    const parsed = parseEnvLine(line);
    if (!parsed) continue;
    if (env[parsed.key] !== undefined) continue;
    env[parsed.key] = parsed.value;
  }

  return envPath;
}

function readString(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}".`);
  }
  return value;
}

function readProvider(env: NodeJS.ProcessEnv): LlmProvider {
  const raw = readString(env, 'ASKBQ_LLM_PROVIDER');
  if (raw === null) return 'openai';
  const lower = raw.toLowerCase();
  if (lower === 'openai' || lower === 'gemini') return lower;
  throw new Error(`ASKBQ_LLM_PROVIDER must be "openai" or "gemini", got "${raw}".`);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    projectId: readString(env, 'ASKBQ_PROJECT') ?? readString(env, 'GOOGLE_CLOUD_PROJECT'),
    location: readString(env, 'ASKBQ_LOCATION'),
    defaultDataset: readString(env, 'ASKBQ_DATASET'),
    maxBytesBilled: readPositiveInt(env, 'ASKBQ_MAX_BYTES_BILLED', SAFE_DEFAULTS.maxBytesBilled),
    maxRows: readPositiveInt(env, 'ASKBQ_MAX_ROWS', SAFE_DEFAULTS.maxRows),
    llmProvider: readProvider(env),
    model: readString(env, 'ASKBQ_MODEL'),
    openaiApiKey: readString(env, 'OPENAI_API_KEY'),
    geminiApiKey: readString(env, 'GEMINI_API_KEY'),
    maxRetries: readPositiveInt(env, 'ASKBQ_MAX_RETRIES', DEFAULT_MAX_RETRIES),
    llmTimeoutMs: readPositiveInt(env, 'ASKBQ_LLM_TIMEOUT_MS', DEFAULT_LLM_TIMEOUT_MS),
    deadlineMs: readPositiveInt(env, 'ASKBQ_DEADLINE_MS', DEFAULT_DEADLINE_MS),
  };
}
