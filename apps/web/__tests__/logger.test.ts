/**
 * LOG_LEVEL filtering
 */

import { createLogger, getLogLevel } from '@/lib/logger';

describe('createLogger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
    jest.restoreAllMocks();
  });

  test('defaults to info and ignores unknown levels', () => {
    delete process.env.LOG_LEVEL;
    expect(getLogLevel()).toBe('info');
    process.env.LOG_LEVEL = 'verbose';
    expect(getLogLevel()).toBe('info');
  });

  test('object prototype keys are not levels', () => {
    for (const level of ['toString', 'constructor', '__proto__', 'hasOwnProperty']) {
      process.env.LOG_LEVEL = level;
      expect(getLogLevel()).toBe('info');
    }

    process.env.LOG_LEVEL = 'constructor';
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    createLogger('test').info('still shown');
    expect(logSpy).toHaveBeenCalledWith('[test]', 'still shown');
  });

  test('prefixes messages with the context', () => {
    process.env.LOG_LEVEL = 'info';
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('analyze-games').info('Analyzed 3 of 3 games');

    expect(logSpy).toHaveBeenCalledWith('[analyze-games]', 'Analyzed 3 of 3 games');
  });

  test('drops messages below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'WARN';
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = createLogger('test');

    log.info('hidden');
    log.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[test]', 'shown');
  });
});
