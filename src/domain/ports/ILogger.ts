/**
 * Log levels accepted by the sync tool
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Port interface for logging.
 * Use cases and adapters only ever see this interface; the pino adapter lives in infrastructure.
 */
export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;

  debug(message: string, data?: Record<string, unknown>): void;

  info(message: string, data?: Record<string, unknown>): void;

  warn(message: string, data?: Record<string, unknown>): void;

  /**
   * Log at error level. `error` may be an Error (serialized as `err`) or any value.
   */
  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional bindings (e.g. `{ component: 'AlexaDirectoryClient' }`)
   */
  child(bindings: Record<string, unknown>): ILogger;
}
