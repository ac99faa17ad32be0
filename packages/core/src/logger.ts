/**
 * Minimal structured logger. Output goes to stderr so stdout stays clean
 * for query results and `--json` payloads.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'silent';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, silent: 100 };

export function formatLogLine(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): string {
  const parts = [`[${level}]`, message];
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      parts.push(`${key}=${typeof value === 'string' ? JSON.stringify(value) : String(value)}`);
    }
  }
  return parts.join(' ');
}

export function createConsoleLogger(
  level: LogLevel = 'info',
  write: (line: string) => void = (line) => process.stderr.write(line + '\n'),
): Logger {
  const threshold = LEVEL_RANK[level];
  const emit = (lvl: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[lvl] < threshold) return;
    write(formatLogLine(lvl, message, fields));
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
