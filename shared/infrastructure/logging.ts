/**
 * Logging infrastructure for docs-librarian
 *
 * Structured, context-tagged log lines written to stderr, or to a rotated
 * log file when a log directory is configured.
 */

import fs from 'fs';
import path from 'path';
import { getConfig } from './config.js';

/**
 * Log level enumeration
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Minimum log level to record */
  minLevel: LogLevel;

  /** Directory for log files; lines go to stderr when unset */
  logDir?: string;

  /** File name for the log file */
  logFile: string;

  /** Maximum log file size before rotation (in bytes) */
  maxFileSize: number;

  /** Maximum number of rotated log files to keep */
  maxFiles: number;
}

/** Receives each formatted log line */
export type LogSink = (line: string, level: LogLevel) => void;

const LEVEL_ORDER: LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

export function parseLogLevel(value: string): LogLevel {
  switch (value.toLowerCase()) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'debug':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

function formatMetadata(metadata: unknown): string {
  if (metadata instanceof Error) {
    return JSON.stringify({ name: metadata.name, message: metadata.message, stack: metadata.stack });
  }
  if (typeof metadata === 'object' && metadata !== null) {
    return JSON.stringify(metadata, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    );
  }
  return String(metadata);
}

/**
 * Class for structured logging
 */
export class Logger {
  private static instance: Logger | undefined;
  private config: LoggerConfig;
  private readonly sink?: LogSink;
  private currentLogSize = 0;

  /**
   * Create a new logger
   * @param config Logger configuration
   * @param sink Optional receiver replacing stderr and file output
   */
  constructor(config: LoggerConfig, sink?: LogSink) {
    this.config = config;
    this.sink = sink;
    this.setupLogFile();
  }

  /**
   * Get the process-wide logger, configured from the application config
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      const appConfig = getConfig();
      Logger.instance = new Logger({
        minLevel: parseLogLevel(appConfig.logLevel),
        logDir: appConfig.logToFile ? path.join(appConfig.dataDir, 'logs') : undefined,
        logFile: 'docs-librarian.log',
        maxFileSize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5
      });
    }

    return Logger.instance;
  }

  /**
   * Reconfigure the process-wide logger
   * @param config Logger configuration overrides
   */
  public static configure(config: Partial<LoggerConfig>): void {
    const logger = Logger.getInstance();
    logger.config = {
      ...logger.config,
      ...config
    };
    logger.setupLogFile();
  }

  private get logFilePath(): string | undefined {
    return this.config.logDir ? path.join(this.config.logDir, this.config.logFile) : undefined;
  }

  private setupLogFile(): void {
    const logFilePath = this.logFilePath;
    if (!logFilePath || !this.config.logDir) {
      return;
    }

    fs.mkdirSync(this.config.logDir, { recursive: true });
    this.currentLogSize = fs.existsSync(logFilePath) ? fs.statSync(logFilePath).size : 0;
  }

  /**
   * Rotate the log file once it exceeds the maximum size:
   * `file` becomes `file.1`, `file.1` becomes `file.2`, and so on.
   */
  private rotateLogFile(logFilePath: string): void {
    if (this.currentLogSize < this.config.maxFileSize) {
      return;
    }

    for (let i = this.config.maxFiles - 1; i > 0; i--) {
      const oldPath = `${logFilePath}.${i}`;
      if (fs.existsSync(oldPath)) {
        fs.renameSync(oldPath, `${logFilePath}.${i + 1}`);
      }
    }
    if (fs.existsSync(logFilePath)) {
      fs.renameSync(logFilePath, `${logFilePath}.1`);
    }
    this.currentLogSize = 0;
  }

  /**
   * Write a log entry
   * @param level Log level
   * @param message Log message
   * @param context Log context (e.g., class or module name)
   * @param metadata Additional metadata to log
   */
  private writeLog(level: LogLevel, message: string, context: string, metadata?: unknown): void {
    if (LEVEL_ORDER.indexOf(level) > LEVEL_ORDER.indexOf(this.config.minLevel)) {
      return;
    }

    let logEntry = `${new Date().toISOString()} [${level}] [${context}] ${message}`;
    if (metadata !== undefined) {
      logEntry += ` ${formatMetadata(metadata)}`;
    }

    if (this.sink) {
      this.sink(logEntry, level);
      return;
    }

    const logFilePath = this.logFilePath;
    if (!logFilePath) {
      process.stderr.write(`${logEntry}\n`);
      return;
    }

    try {
      this.rotateLogFile(logFilePath);
      fs.appendFileSync(logFilePath, `${logEntry}\n`);
      this.currentLogSize += logEntry.length + 1;
    } catch (error) {
      // Fall back to stderr when the file is not writable
      process.stderr.write(`${logEntry}\n`);
      process.stderr.write(`Failed to write log file ${logFilePath}: ${formatMetadata(error)}\n`);
    }
  }

  public error(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, context, metadata);
  }

  public warn(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.WARN, message, context, metadata);
  }

  public info(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.INFO, message, context, metadata);
  }

  public debug(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, context, metadata);
  }

  /**
   * Log an error with stack trace
   * @param error Error object
   * @param context Log context (e.g., class or module name)
   * @param message Optional message to add
   */
  public logError(error: Error, context: string, message?: string): void {
    this.error(message || error.message, context, {
      stack: error.stack,
      name: error.name,
      message: error.message
    });
  }
}

// Convenience function to get the logger instance
export function getLogger(): Logger {
  return Logger.getInstance();
}
