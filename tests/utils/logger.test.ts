import { describe, it, expect, vi, afterEach } from 'vitest';
import pino from 'pino';
import { errorMessage, setupErrorHandlers } from '../../src/utils/logger.js';

describe('setupErrorHandlers', () => {
  const added: Array<() => void> = [];

  afterEach(() => {
    for (const remove of added.splice(0)) remove();
    vi.restoreAllMocks();
  });

  function install() {
    const logger = pino({ level: 'silent' });
    setupErrorHandlers(logger);

    const uncaught = process.listeners('uncaughtException').at(-1);
    const rejection = process.listeners('unhandledRejection').at(-1);
    if (!uncaught || !rejection) {
      throw new Error('handlers were not installed');
    }
    added.push(
      () => process.removeListener('uncaughtException', uncaught),
      () => process.removeListener('unhandledRejection', rejection)
    );
    return { logger, uncaught, rejection };
  }

  it('logs an uncaught exception and exits after flushing', () => {
    const { logger, uncaught } = install();
    const fatal = vi.spyOn(logger, 'fatal');
    const flush = vi.spyOn(logger, 'flush').mockImplementation((callback) => callback?.());
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });

    const error = new Error('boom');
    expect(() => uncaught(error, 'uncaughtException')).toThrow('exit 1');
    expect(fatal).toHaveBeenCalledWith({ error: 'boom', stack: error.stack }, 'Uncaught exception');
    expect(flush).toHaveBeenCalledTimes(1);
  });

  it('logs an unhandled rejection without exiting', () => {
    const { logger, rejection } = install();
    const logError = vi.spyOn(logger, 'error');
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });

    rejection('plain reason', Promise.resolve());

    expect(logError).toHaveBeenCalledWith(
      { error: 'plain reason', stack: expect.any(String) },
      'Unhandled rejection'
    );
    expect(exit).not.toHaveBeenCalled();
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('failed'))).toBe('failed');
    expect(errorMessage(42)).toBe('42');
  });
});
