import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger } from './index';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('exposes the provided methods', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods);

    logger.info('hello', 1);
    logger.error('boom');

    expect(methods.info).toHaveBeenCalledWith('hello', 1);
    expect(methods.error).toHaveBeenCalledWith('boom');
  });

  describe('console', () => {
    test('drops messages below the configured level', () => {
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const logger = Logger.console('warn');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');

      expect(debugSpy).not.toHaveBeenCalled();
      expect(infoSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('w');
    });

    test('always forwards errors', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      Logger.console('error').error('e', { id: 1 });

      expect(errorSpy).toHaveBeenCalledWith('e', { id: 1 });
    });

    test('forwards debug when level is debug', () => {
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      Logger.console('debug').debug('trace');

      expect(debugSpy).toHaveBeenCalledWith('trace');
    });
  });
});
