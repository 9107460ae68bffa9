/**
 * Structured logger used across strategies and the request pipeline
 */
export interface LifecycleLogger {
  trace(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): LifecycleLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LoggerConfig {
  level: LogLevel;

  /**
   * Pretty-print through pino-pretty (default: false)
   */
  pretty?: boolean;

  /**
   * File path to write to (default: stdout)
   */
  destination?: string;

  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}

/**
 * Context bound to a child logger
 */
export interface LoggerContext {
  component?: string;
  kind?: string;
  namespace?: string;
  name?: string;
  [key: string]: unknown;
}
