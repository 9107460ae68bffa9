import { describe, expect, it } from 'vitest';
import {
  createContextLogger,
  createLogger,
  DEFAULT_LOGGER_CONFIG,
  getComponentLogger,
  getLoggerConfigFromEnv,
  getResourceLogger,
  type LoggerConfig,
  validateLoggerConfig,
} from '../../src/core/logging/index.js';

describe('Logging', () => {
  describe('Environment Configuration', () => {
    it('should use defaults for an empty environment', () => {
      expect(getLoggerConfigFromEnv({})).toEqual(DEFAULT_LOGGER_CONFIG);
    });

    it('should read level, pretty printing, destination and timestamp', () => {
      expect(
        getLoggerConfigFromEnv({
          LIFECYCLE_LOG_LEVEL: 'DEBUG',
          LIFECYCLE_LOG_PRETTY: 'true',
          LIFECYCLE_LOG_DESTINATION: '/tmp/lifecycle.log',
          LIFECYCLE_LOG_TIMESTAMP: 'false',
        })
      ).toEqual({
        level: 'debug',
        pretty: true,
        destination: '/tmp/lifecycle.log',
        options: { timestamp: false },
      });
    });

    it('should enable pretty printing in development', () => {
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'development' }).pretty).toBe(true);
    });

    it('should ignore an unknown level', () => {
      expect(getLoggerConfigFromEnv({ LIFECYCLE_LOG_LEVEL: 'loud' }).level).toBe('info');
    });
  });

  describe('Logger Creation', () => {
    it('should create loggers with every level method', () => {
      const logger = createLogger({ level: 'fatal', pretty: false });
      for (const method of ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'child'] as const) {
        expect(typeof logger[method]).toBe('function');
      }
    });

    it('should create child loggers with context', () => {
      const logger = createContextLogger({ component: 'test', kind: 'Route' }, { level: 'fatal', pretty: false });
      expect(typeof logger.child({ name: 'web' }).info).toBe('function');
    });

    it('should create component and resource loggers', () => {
      expect(typeof getComponentLogger('route-strategy').debug).toBe('function');
      expect(typeof getResourceLogger('Route', 'default', 'web').debug).toBe('function');
    });

    it('should log errors and metadata without throwing', () => {
      const logger = createLogger({ level: 'fatal', pretty: false });

      expect(() => logger.info('User action', { user: 'dev' })).not.toThrow();
      expect(() => logger.error('Error occurred', new Error('Test error'))).not.toThrow();
      expect(() => logger.error('Error with context', undefined, { action: 'create' })).not.toThrow();
    });
  });

  describe('Validation', () => {
    it('should reject invalid log levels', () => {
      const config: LoggerConfig = { level: 'info' };
      Reflect.set(config, 'level', 'loud');

      expect(() => validateLoggerConfig(config)).toThrow(
        'Invalid log level: loud. Must be one of: trace, debug, info, warn, error, fatal'
      );
    });

    it('should reject a destination that is not a string', () => {
      const config: LoggerConfig = { level: 'info' };
      Reflect.set(config, 'destination', 123);

      expect(() => validateLoggerConfig(config)).toThrow('Log destination must be a string');
    });
  });
});
