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
  private logger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    if (PinoLogger.isPinoLogger(options)) {
      this.logger = options;
      return;
    }

    const transport = options?.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        }
      : undefined;

    this.logger = pino(
      {
        name: options?.name ?? 'ha-discovery',
        level: options?.level ?? 'info',
        redact: ['token', 'accessToken', 'access_token', 'headers.Authorization'],
        ...(transport && { transport }),
      },
      // stdout is reserved for discovery output
      transport ? undefined : pino.destination(2)
    );
  }

  private static isPinoLogger(value: PinoLoggerOptions | pino.Logger | undefined): value is pino.Logger {
    return value !== undefined && 'child' in value;
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
    const errorData = error instanceof Error
      ? { err: error, ...data }
      : { error, ...data };

    this.logger.error(errorData, message);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    const errorData = error instanceof Error
      ? { err: error, ...data }
      : { error, ...data };

    this.logger.fatal(errorData, message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(this.logger.child(bindings));
  }
}
