import { describe, it, expect } from 'vitest';
import { createLogger, formatLogLine } from '../src/utils/logger.js';

describe('logger', () => {
  it('formats lines with time, level and name', () => {
    const line = formatLogLine('warn', 'scheduler', 'carbon too high', new Date('2024-05-01T10:00:00Z'));
    expect(line).toBe('2024-05-01T10:00:00.000Z | WARN | scheduler | carbon too high');
  });

  it('drops messages below the configured level', () => {
    const seen: string[] = [];
    const logger = createLogger('monitor', 'warn', (level) => seen.push(level));
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    expect(seen).toEqual(['warn', 'error']);
  });

  it('writes nothing when silent', () => {
    const seen: string[] = [];
    const logger = createLogger('monitor', 'silent', (level) => seen.push(level));
    logger.error('boom');
    expect(seen).toEqual([]);
  });

  it('prefixes child logger names', () => {
    const lines: string[] = [];
    const child = createLogger('greengate', 'info', (_level, line) => lines.push(line)).child('ledger');
    child.info('recorded');
    expect(child.name).toBe('greengate:ledger');
    expect(lines[0].endsWith('| INFO | greengate:ledger | recorded')).toBe(true);
  });
});
