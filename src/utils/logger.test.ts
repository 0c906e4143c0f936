import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logger = new Logger({ useColors: false });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should log info messages', () => {
    logger.info('info message');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('ℹ️ info message'));
  });

  it('should log error messages to stderr', () => {
    logger.error('error message');
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('❌ error message'));
  });

  it('should filter messages based on level', () => {
    logger.setLevel(LogLevel.WARNING);

    logger.debug('debug');
    logger.info('info');
    logger.success('success');
    logger.warning('warning');
    logger.error('error');

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('⚠️ warning'));
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('❌ error'));
  });

  it('should prefix scoped children and nest scopes', () => {
    logger.child('sweeper').info('cycle done');
    logger.child('bot').child('42').warning('slow');

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('ℹ️ [sweeper] cycle done'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('⚠️ [bot:42] slow'));
  });

  it('children should follow the root level', () => {
    const child = logger.child('worker');
    logger.setLevel(LogLevel.ERROR);

    child.info('hidden');
    expect(consoleLogSpy).not.toHaveBeenCalled();

    child.setLevel(LogLevel.DEBUG);
    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
  });

  it('should use colors when enabled', () => {
    logger = new Logger({ useColors: true });
    logger.info('message');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('\x1b[34mmessage\x1b[0m'));
  });

  it('should disable colors when disabled', () => {
    logger.info('message');
    const lastCall = consoleLogSpy.mock.lastCall?.[0];
    expect(lastCall).not.toContain('\x1b[');
  });
});

describe('parseLogLevel', () => {
  it('should accept lower-case names', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('warning')).toBe(LogLevel.WARNING);
  });

  it('should reject unknown names', () => {
    expect(() => parseLogLevel('verbose')).toThrow('Unknown log level: "verbose"');
  });
});
