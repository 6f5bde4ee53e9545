import { afterEach, describe, expect, test, vi } from 'vitest';
import { consoleLogger, type Logger, resolveLogger, silentLogger } from './logger.js';

describe('resolveLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('defaults to the silent logger', () => {
    expect(resolveLogger({})).toBe(silentLogger);
    expect(resolveLogger({ debug: false })).toBe(silentLogger);
  });

  test('debug selects the console logger', () => {
    expect(resolveLogger({ debug: true })).toBe(consoleLogger);
  });

  test('an explicit logger wins over debug', () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn() };

    expect(resolveLogger({ logger, debug: true })).toBe(logger);
  });

  test('the console logger prefixes its lines', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    consoleLogger.warn('getProfile failed', { code: 404 });
    consoleLogger.debug('calling getVersion');

    expect(warn).toHaveBeenCalledWith('[royale-stats-client]', 'getProfile failed', { code: 404 });
    expect(debug).toHaveBeenCalledWith('[royale-stats-client]', 'calling getVersion');
  });
});
