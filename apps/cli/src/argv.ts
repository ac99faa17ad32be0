import { usageError } from './errors.js';

export function normalizeArgv(rawArgv: string[]): string[] {
  // npm run forwards args as: node main.js -- <args>
  if (rawArgv[2] === '--') {
    return [rawArgv[0], rawArgv[1], ...rawArgv.slice(3)];
  }
  return rawArgv;
}

/** Split `a,b , c` into trimmed non-empty names. */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw usageError(`Invalid ${flag}: expected a positive integer, got "${value}".`);
  }
  return n;
}
