import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createConsoleLogger, formatLogLine } from '../logger.js';

describe('formatLogLine', () => {
  it('quotes strings and skips undefined fields', () => {
    assert.equal(
      formatLogLine('info', 'attempt failed', { attempt: 2, kind: 'dry_run', ok: false, extra: undefined, sql: null }),
      '[info] attempt failed attempt=2 kind="dry_run" ok=false sql=null',
    );
  });
});

describe('createConsoleLogger', () => {
  it('drops lines below the threshold', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('info', (line) => lines.push(line));
    logger.debug('hidden');
    logger.info('shown', { n: 1 });
    logger.warn('also shown');
    assert.deepEqual(lines, ['[info] shown n=1', '[warn] also shown']);
  });

  it('writes nothing when silent', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('silent', (line) => lines.push(line));
    logger.warn('nope');
    assert.deepEqual(lines, []);
  });
});
