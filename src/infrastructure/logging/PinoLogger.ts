import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
}

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    if (options && 'child' in options) {
      this.logger = options;
      return;
    }

    const transport = options?.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

    this.logger = pino({
      name: options?.name ?? 'ha-alexa-sync',
      level: options?.level ?? 'info',
      ...(transport && { transport }),
    });
  }

  trace(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.trace(data, message);
    } else {
      this.logger.trace(message);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.debug(data, message);
    } else {
      this.logger.debug(message);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.info(data, message);
    } else {
      this.logger.info(message);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.warn(data, message);
    } else {
      this.logger.warn(message);
    }
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.logger.error(toErrorBindings(error, data), message);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.logger.fatal(toErrorBindings(error, data), message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(this.logger.child(bindings));
  }
}

function toErrorBindings(error: unknown, data?: Record<string, unknown>): Record<string, unknown> {
  if (error instanceof Error) {
    return { err: error, ...data };
  }
  return error === undefined ? { ...data } : { error, ...data };
}
