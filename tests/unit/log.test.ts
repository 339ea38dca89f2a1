/**
 * Tests for the leveled logger.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel, silentLogger } from '../../src/core/log.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the level', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => { lines.push(line); });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines).toEqual(['[slipline] warn: w', '[slipline] error: e']);
  });

  it('debug lets everything through', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', (line) => { lines.push(line); });
    logger.debug('d');
    logger.info('i');
    expect(lines).toEqual(['[slipline] debug: d', '[slipline] info: i']);
  });

  it('silent drops everything', () => {
    const lines: string[] = [];
    const logger = createLogger('silent', (line) => { lines.push(line); });
    logger.error('e');
    expect(lines).toEqual([]);
    expect(silentLogger.level).toBe('silent');
  });

  it('passes details through to the sink', () => {
    const calls: unknown[][] = [];
    const logger = createLogger('error', (...args) => { calls.push(args); });
    const cause = new Error('boom');
    logger.error('failed', cause);
    expect(calls).toEqual([['[slipline] error: failed', cause]]);
  });

  it('writes to stderr by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('info').info('hello');
    expect(spy).toHaveBeenCalledWith('[slipline] info: hello');
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
