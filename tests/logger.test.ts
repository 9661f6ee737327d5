// tests/logger.test.ts
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { createLogger, logger } from '../src/utils/logger';

describe('Logger', () => {
  const originalEnv = process.env;
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    process.env = { ...originalEnv };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = originalEnv;
    consoleLogSpy.mockRestore();
  });

  describe('Console output', () => {
    it('should output to console when NODE_ENV is not test', () => {
      process.env.NODE_ENV = 'production';

      logger.info('test message');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const logOutput = consoleLogSpy.mock.calls[0][0];
      expect(logOutput).toContain('[INFO]');
      expect(logOutput).toContain('test message');
    });

    it('should not output to console when NODE_ENV is test', () => {
      process.env.NODE_ENV = 'test';

      logger.info('test message');

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should include timestamp in console output', () => {
      process.env.NODE_ENV = 'production';

      logger.info('test message');

      const logOutput = consoleLogSpy.mock.calls[0][0];
      expect(logOutput).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] test message$/);
    });
  });

  describe('Log levels', () => {
    beforeEach(() => {
      process.env.NODE_ENV = 'production';
    });

    it.each([
      ['info', '[INFO]'],
      ['warn', '[WARN]'],
      ['error', '[ERROR]'],
      ['debug', '[DEBUG]'],
    ] as const)('should log %s messages', (level, tag) => {
      logger[level](`${level} message`);

      const logOutput = consoleLogSpy.mock.calls[0][0];
      expect(logOutput).toContain(tag);
      expect(logOutput).toContain(`${level} message`);
    });
  });

  describe('Logger with project context', () => {
    beforeEach(() => {
      process.env.NODE_ENV = 'production';
    });

    it('should create logger with project info', () => {
      const projectLogger = createLogger({ project: 'ecommerce', model: 'orders' });

      projectLogger.info('test message');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toContain('test message');
    });

    it('should keep metadata out of console output', () => {
      logger.info('test message', { key: 'value', count: 42 });

      const logOutput = consoleLogSpy.mock.calls[0][0];
      expect(logOutput).toMatch(/\[INFO\] test message$/);
    });
  });

  describe('OpenTelemetry integration', () => {
    it('should not throw when OTEL is disabled', () => {
      process.env.NODE_ENV = 'production';

      expect(() => {
        logger.info('test message');
        logger.warn('warn message');
        logger.error('error message');
        logger.debug('debug message');
      }).not.toThrow();
    });
  });
});
