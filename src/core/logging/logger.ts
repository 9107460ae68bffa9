import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { LifecycleLogger, LoggerConfig, LoggerContext } from './types.js';

/**
 * Pino-based implementation of LifecycleLogger
 */
class PinoLogger implements LifecycleLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.error(withError(meta, error), msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.fatal(withError(meta, error), msg);
  }

  child(bindings: Record<string, unknown>): LifecycleLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function withError(meta: Record<string, unknown> | undefined, error: Error | undefined) {
  const logData: Record<string, unknown> = { ...meta };
  if (error) {
    logData.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return logData;
}

/**
 * Create a logger with the specified configuration, falling back to the
 * environment for anything not given.
 */
export function createLogger(config?: Partial<LoggerConfig>): LifecycleLogger {
  const finalConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stdout') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

export function createContextLogger(
  context: LoggerContext,
  config?: Partial<LoggerConfig>
): LifecycleLogger {
  return createLogger(config).child(context);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: LifecycleLogger = createLogger();

export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): LifecycleLogger {
  return logger.child({ component, ...additionalContext });
}

/**
 * Logger bound to one object, identified by kind and namespace/name.
 */
export function getResourceLogger(
  kind: string,
  namespace: string | undefined,
  name: string | undefined,
  additionalContext?: Record<string, unknown>
): LifecycleLogger {
  return logger.child({ kind, namespace, name, ...additionalContext });
}
