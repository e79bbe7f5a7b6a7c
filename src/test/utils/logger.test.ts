import { describe, expect, it } from 'vitest';
import { createLogger, formatLogEntry, parseLogLevel } from '../../utils/logger.js';

const ANSI = /\u001b\[[0-9;]*m/g;
const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

function capture(level?: string, format?: string) {
  const lines: string[] = [];
  const logger = createLogger('sync', { level, format, now: fixedNow, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const { logger, lines } = capture('warn', 'json');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');
    expect(lines).toHaveLength(2);
  });

  it('writes one JSON object per line', () => {
    const { logger, lines } = capture('debug', 'json');
    logger.info('Linking', { from: '/a', to: '/b' });
    expect(lines).toEqual([
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","module":"sync","message":"Linking","data":{"from":"/a","to":"/b"}}\n',
    ]);
  });

  it('writes key=value pairs in dev format', () => {
    const { logger, lines } = capture('debug', 'dev');
    logger.warn('Moving to backup', { from: '/a b', count: 2, error: new Error('boom') });
    expect(lines.map((l) => l.replace(ANSI, ''))).toEqual([
      '2026-01-02T03:04:05.000Z [WARN ] [sync] Moving to backup from="/a b" count=2 error="boom"\n',
    ]);
  });
});

describe('formatLogEntry', () => {
  it('serializes errors in json data', () => {
    const line = formatLogEntry({
      timestamp: 't',
      level: 'error',
      module: 'sync',
      message: 'failed',
      data: { error: new Error('boom') },
    }, 'json');
    expect(JSON.parse(line)).toEqual({
      timestamp: 't',
      level: 'error',
      module: 'sync',
      message: 'failed',
      data: { error: { name: 'Error', message: 'boom' } },
    });
  });
});

describe('parseLogLevel', () => {
  it('falls back to info', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('loud')).toBe('info');
    expect(parseLogLevel('DEBUG')).toBe('debug');
  });
});
