import { afterEach, describe, expect, it, vi } from 'vitest';
import { consoleLogger, type Logger, noopLogger, resolveLogger } from './logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveLogger', () => {
  it('prefers an explicit logger', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    expect(resolveLogger(logger, true)).toBe(logger);
  });

  it('selects the console in debug mode and stays quiet otherwise', () => {
    expect(resolveLogger(undefined, true)).toBe(consoleLogger);
    expect(resolveLogger(undefined, false)).toBe(noopLogger);
    expect(resolveLogger()).toBe(noopLogger);
  });
});

describe('consoleLogger', () => {
  it('prefixes lines and passes meta along', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    consoleLogger.debug('request', { method: 'GET' });
    consoleLogger.debug('plain');

    expect(debug).toHaveBeenNthCalledWith(1, '[bonusly]', 'request', { method: 'GET' });
    expect(debug).toHaveBeenNthCalledWith(2, '[bonusly]', 'plain');
  });
});
