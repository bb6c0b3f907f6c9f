/**
 * Centralized logging service using Winston
 * Console output goes to stderr so report output on stdout stays clean
 */

import winston from 'winston';
import { LogLevel } from '../domain/models/types';

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  /** Minimum logging level (default: 'info') */
  level?: LogLevel;
  /** Optional JSON log file */
  logFile?: string;
  /** Suppress all output */
  silent?: boolean;
}

/**
 * LoggingService provides centralized, structured logging
 * for all application and error messages
 */
export class LoggingService {
  private logger: winston.Logger;
  private context: string;
  private options: LoggerOptions;

  /**
   * Creates a new LoggingService instance
   * @param context - The context/module name for log messages
   * @param options - Level, log file and silence settings
   */
  constructor(context: string, options: LoggerOptions = {}) {
    this.context = context;
    this.options = options;

    const transports: Array<
      winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
    > = [
      new winston.transports.Console({
        stderrLevels: ALL_LEVELS,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, context, timestamp }) => {
            return `${timestamp} [${context}] ${level}: ${message}`;
          })
        ),
      }),
    ];

    if (options.logFile) {
      transports.push(
        new winston.transports.File({
          filename: options.logFile,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
          ),
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
      ),
      defaultMeta: { context: this.context },
      transports,
    });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * Log an error message
   * @param message - The error message
   * @param error - The error object (optional)
   * @param meta - Additional metadata
   */
  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    this.logger.error(message, {
      ...meta,
      error: error
        ? {
            message: error.message,
            stack: error.stack,
            name: error.name,
          }
        : undefined,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * Create a child logger with additional context and the same options
   * @param childContext - Additional context to append
   */
  child(childContext: string): LoggingService {
    return new LoggingService(`${this.context}:${childContext}`, this.options);
  }

  /**
   * Close the logger and flush any pending writes
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on('finish', resolve);
      this.logger.end();
    });
  }
}

/**
 * Factory function to create a logger instance
 * @param context - The context/module name
 * @param options - Level, log file and silence settings
 */
export function createLogger(context: string, options: LoggerOptions = {}): LoggingService {
  return new LoggingService(context, options);
}

/**
 * Narrow an arbitrary string to a LogLevel
 * @throws Error for unknown levels
 */
export function parseLogLevel(value: string): LogLevel {
  const level = ALL_LEVELS.find((l) => l === value);
  if (!level) {
    throw new Error(`Invalid log level: ${value} (expected one of ${ALL_LEVELS.join(', ')})`);
  }
  return level;
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
