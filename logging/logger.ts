/**
 * Centralized Logger Service
 * Uses Winston with Console + optional JSON file transports
 */

import winston from 'winston';
import type Transport from 'winston-transport';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export type LogMeta = Record<string, unknown>;

function fileTransport(filename: string, silent?: boolean): Transport {
  return new winston.transports.File({
    filename,
    silent,
    format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true }), winston.format.json()),
  });
}

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
  const componentStr = component ? `[${String(component)}]` : '';
  return `${String(timestamp)} ${level} ${componentStr} ${String(message)} ${metaStr}`;
});

export interface LoggerOptions {
  component: string;
  enableConsole?: boolean;
  enableFile?: boolean;
  logFilePath?: string;
  logLevel?: string;
  silent?: boolean;
}

export class Logger {
  private logger: winston.Logger;
  private component: string;
  private filePath?: string;

  constructor(options: LoggerOptions) {
    this.component = options.component;

    const transports: Transport[] = [];

    // Console transport (always enabled unless explicitly disabled)
    if (options.enableConsole !== false) {
      transports.push(
        new winston.transports.Console({
          silent: options.silent,
          format: combine(
            colorize(),
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            consoleFormat
          ),
        })
      );
    }

    // File transport (optional, for headless workers where stdout is not collected)
    if (options.enableFile && options.logFilePath) {
      transports.push(fileTransport(options.logFilePath, options.silent));
      this.filePath = options.logFilePath;
    }

    this.logger = winston.createLogger({
      level: options.logLevel || process.env.LOG_LEVEL || 'info',
      format: combine(
        timestamp(),
        errors({ stack: true }),
        winston.format.json()
      ),
      transports,
      exitOnError: false,
    });
  }

  debug(message: string, meta?: LogMeta) {
    this.logger.debug(message, { component: this.component, ...meta });
  }

  info(message: string, meta?: LogMeta) {
    this.logger.info(message, { component: this.component, ...meta });
  }

  warn(message: string, meta?: LogMeta) {
    this.logger.warn(message, { component: this.component, ...meta });
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    const errorMeta: LogMeta = { component: this.component, ...meta };

    if (error) {
      if (error instanceof Error) {
        errorMeta.stackTrace = error.stack;
        errorMeta.errorCode = error.name;
        errorMeta.errorMessage = error.message;
      } else if (typeof error === 'object') {
        errorMeta.errorDetails = error;
      } else {
        errorMeta.errorDetails = String(error);
      }
    }

    this.logger.error(message, errorMeta);
  }

  // Convenience method for account-scoped logs
  logAccount(level: 'debug' | 'info' | 'warn' | 'error', message: string, accountId: string, meta?: LogMeta) {
    this.logger[level](message, {
      component: this.component,
      accountId,
      ...meta,
    });
  }

  // Convenience method for broker-event logs
  logEvent(level: 'debug' | 'info' | 'warn' | 'error', message: string, eventId: string, meta?: LogMeta) {
    this.logger[level](message, {
      component: this.component,
      eventId,
      ...meta,
    });
  }

  /**
   * Apply process-wide settings to a logger created before they were known
   */
  reconfigure(options: Partial<LoggerOptions>) {
    if (options.logLevel) {
      this.logger.level = options.logLevel;
    }
    if (options.enableFile && options.logFilePath && !this.filePath) {
      this.logger.add(fileTransport(options.logFilePath, options.silent));
      this.filePath = options.logFilePath;
    }
  }

  close() {
    this.logger.close();
  }
}

// Singleton factory for creating loggers
class LoggerFactory {
  private static defaults: Partial<LoggerOptions> = {};
  private static loggers: Map<string, Logger> = new Map();

  static configure(defaults: Partial<LoggerOptions>) {
    this.defaults = { ...this.defaults, ...defaults };
    // Module-level loggers exist before settings are loaded
    this.loggers.forEach((logger) => logger.reconfigure(this.defaults));
  }

  static getLogger(component: string, options?: Partial<LoggerOptions>): Logger {
    let logger = this.loggers.get(component);
    if (!logger) {
      logger = new Logger({
        component,
        silent: process.env.NODE_ENV === 'test',
        enableFile: Boolean(process.env.LOG_FILE_PATH),
        logFilePath: process.env.LOG_FILE_PATH,
        ...this.defaults,
        ...options,
      });
      this.loggers.set(component, logger);
    }
    return logger;
  }

  static closeAll() {
    this.loggers.forEach((logger) => logger.close());
    this.loggers.clear();
  }
}

export { LoggerFactory };
