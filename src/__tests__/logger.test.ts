import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, parseLogLevel, setLogLevel } from '../core/logger';

describe('Logger', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  it('filters logs below the global level', () => {
    const logger = createLogger('test');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    setLogLevel('warn');
    logger.debug('nope');
    logger.warn('yeah');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[test]', 'yeah');
  });

  it('attaches category prefix to all outputs', () => {
    const logger = createLogger('cat');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    logger.info('payload', 3);

    expect(info).toHaveBeenCalledWith('[cat]', 'payload', 3);
  });

  it('respects level changes at runtime', () => {
    const logger = createLogger('rt');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    setLogLevel('error');
    logger.info('hidden');
    logger.error('visible');

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[rt]', 'visible');
    expect(getLogLevel()).toBe('error');
  });

  it('emits debug output once the level allows it', () => {
    const logger = createLogger('dbg');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    setLogLevel('debug');
    logger.debug('chunk load');

    expect(debug).toHaveBeenCalledWith('[dbg]', 'chunk load');
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('Warn')).toBe('warn');
  });

  it('falls back for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'error')).toBe('error');
    expect(parseLogLevel('')).toBe('info');
  });

  it('isLogLevel narrows only the four levels', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(2)).toBe(false);
  });
});
