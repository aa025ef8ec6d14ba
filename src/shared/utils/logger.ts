/**
 * Logging utility using winston
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';
import path from 'path';
import type { ILogger } from '@pentad/core';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  /** Directory for the per-run log and the rotating error log */
  logDir?: string;
  /** Per-run log file name inside logDir */
  fileName?: string;
  /** Attach a console transport (default true) */
  console?: boolean;
  /** Console threshold; defaults to the logger level */
  consoleLevel?: LogLevel;
  level?: string;
}

/**
 * Logger bound to one component; shares the parent's transports
 */
class ComponentLogger implements ILogger {
  constructor(private readonly logger: winston.Logger) {}

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }
}

export class Logger implements ILogger {
  private logger: winston.Logger;
  private fileLoggingEnabled = false;

  constructor(options: LoggerOptions = {}) {
    const absoluteLogDir = path.resolve(process.cwd(), options.logDir ?? '.pentad/logs');

    // Degrade to console-only logging when the directory cannot be created
    try {
      if (!fs.existsSync(absoluteLogDir)) {
        fs.mkdirSync(absoluteLogDir, { recursive: true });
      }
      this.fileLoggingEnabled = true;
    } catch (error) {
      console.warn(
        `[Logger] Warning: Failed to create log directory at ${absoluteLogDir}. File logging disabled. Error: ${error}`
      );
      this.fileLoggingEnabled = false;
    }

    const transports: winston.transport[] = [];

    if (options.console !== false) {
      transports.push(
        new winston.transports.Console({
          level: options.consoleLevel,
          format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        })
      );
    }

    if (this.fileLoggingEnabled) {
      transports.push(
        // Everything from this run
        new winston.transports.File({
          dirname: absoluteLogDir,
          filename: options.fileName ?? `pentad-${runStamp(new Date())}.log`,
        }),
        // Error logs with daily rotation
        new DailyRotateFile({
          dirname: absoluteLogDir,
          filename: '%DATE%-error.log',
          datePattern: 'YYYYMMDD',
          level: 'error',
          maxSize: '10m',
          maxFiles: '30d',
          zippedArchive: true,
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
      // A logger with no transports would warn on every write
      silent: transports.length === 0,
    });
  }

  get fileLogging(): boolean {
    return this.fileLoggingEnabled;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * Scoped logger that tags every entry with `component`
   */
  child(component: string): ILogger {
    return new ComponentLogger(this.logger.child({ component }));
  }

  /**
   * Flush file transports before the process exits
   */
  close(): Promise<void> {
    return new Promise((resolve) => {
      const fallback = setTimeout(resolve, 1000);
      fallback.unref();
      this.logger.on('finish', () => {
        clearTimeout(fallback);
        resolve();
      });
      this.logger.end();
    });
  }
}

/**
 * Filesystem-safe timestamp, e.g. 20261018-093000
 */
export function runStamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
