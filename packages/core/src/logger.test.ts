import { describe, expect, test } from 'vitest';
import { ConsoleLogger, isLogLevel } from './logger.js';

const FIXED = new Date('2026-05-04T10:00:00.000Z');

function capture(level: 'debug' | 'info' | 'warn' | 'error' | 'silent', scope?: string) {
  const lines: string[] = [];
  const logger = new ConsoleLogger({ level, scope, write: (line) => lines.push(line), now: () => FIXED });
  return { logger, lines };
}

describe('ConsoleLogger', () => {
  test('formats timestamp, level and scope', () => {
    const { logger, lines } = capture('info', 'render');
    logger.info('job started', { id: 'j1' });
    expect(lines).toEqual(['[2026-05-04T10:00:00.000Z] INFO render: job started {"id":"j1"}\n']);
  });

  test('drops messages below the threshold', () => {
    const { logger, lines } = capture('warn');
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    expect(lines).toEqual(['[2026-05-04T10:00:00.000Z] WARN c\n', '[2026-05-04T10:00:00.000Z] ERROR d\n']);
  });

  test('silent drops everything', () => {
    const { logger, lines } = capture('silent');
    logger.error('nope');
    expect(lines).toEqual([]);
  });

  test('child loggers nest their scope', () => {
    const { logger, lines } = capture('debug', 'cli');
    logger.child('store').debug('opened');
    expect(lines).toEqual(['[2026-05-04T10:00:00.000Z] DEBUG cli:store: opened\n']);
  });

  test('prints the stack of an error argument', () => {
    const { logger, lines } = capture('error');
    const err = new Error('boom');
    logger.error('failed', err);
    expect(lines[0]).toBe(`[2026-05-04T10:00:00.000Z] ERROR failed ${err.stack ?? ''}\n`);
  });
});

test('isLogLevel recognises the known levels', () => {
  expect(isLogLevel('warn')).toBe(true);
  expect(isLogLevel('verbose')).toBe(false);
});
