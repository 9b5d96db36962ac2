import path from 'path';
import { ILogger } from '../interfaces/services';
import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  dir?: string;
}

// Logger implementation following Single Responsibility Principle
export class Logger implements ILogger {
  private logger: winston.Logger;

  constructor(serviceName: string = 'job-analysis-webhook', options: LoggerOptions = {}) {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ];

    // File output only when a directory is configured
    if (options.dir) {
      transports.push(
        new winston.transports.File({
          filename: path.join(options.dir, `${serviceName}.log`),
          level: 'info'
        }),
        new winston.transports.File({
          filename: path.join(options.dir, `${serviceName}-error.log`),
          level: 'error'
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level || process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.label({ label: serviceName }),
        winston.format.json()
      ),
      transports
    });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, stack: error.stack });
    } else if (error && typeof error === 'object') {
      this.logger.error(message, error);
    } else {
      this.logger.error(message, { error });
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  // Factory method for creating service-specific loggers
  static create(serviceName: string, options?: LoggerOptions): Logger {
    return new Logger(serviceName, options);
  }
}
