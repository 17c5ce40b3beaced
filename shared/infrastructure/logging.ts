/**
 * Logging infrastructure for dochive
 *
 * Structured log lines go to a rotating file under the data directory.
 * stdout belongs to the MCP transport, so console mirroring uses stderr.
 */

import path from 'path';
import { config } from './config.js';
import { createWriteStream, existsSync, mkdirSync, renameSync, statSync, type WriteStream } from 'fs';

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
  /** Base directory for log files */
  logDir: string;

  /** Minimum log level to record */
  minLevel: LogLevel;

  /** File name for the log file */
  logFile: string;

  /** Maximum log file size before rotation (in bytes) */
  maxFileSize: number;

  /** Maximum number of log files to keep */
  maxFiles: number;

  /** Also write every line to stderr */
  console: boolean;
}

const LEVEL_ORDER = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

function levelFromConfig(level: string): LogLevel {
  switch (level) {
    case 'error': return LogLevel.ERROR;
    case 'warn': return LogLevel.WARN;
    case 'debug': return LogLevel.DEBUG;
    default: return LogLevel.INFO;
  }
}

/**
 * Class for structured logging
 */
export class Logger {
  private static instance: Logger | undefined;
  private config: LoggerConfig;
  private writeStream: WriteStream | null = null;
  private currentLogSize = 0;
  private logFilePath: string;

  private constructor(config: LoggerConfig) {
    this.config = config;
    this.logFilePath = path.join(config.logDir, config.logFile);
    this.setupLogger();
  }

  /**
   * Get the singleton logger instance
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger({
        logDir: path.join(config.dataDir, 'logs'),
        minLevel: levelFromConfig(config.logLevel),
        logFile: 'dochive.log',
        maxFileSize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        console: config.logToConsole
      });
    }

    return Logger.instance;
  }

  /**
   * Reconfigure the logger; reopens the log file when its location changes
   */
  public static configure(overrides: Partial<LoggerConfig>): void {
    const logger = Logger.getInstance();
    logger.config = { ...logger.config, ...overrides };

    if (logger.writeStream) {
      logger.writeStream.end();
      logger.writeStream = null;
    }

    logger.logFilePath = path.join(logger.config.logDir, logger.config.logFile);
    logger.setupLogger();
  }

  private setupLogger(): void {
    try {
      if (!existsSync(this.config.logDir)) {
        mkdirSync(this.config.logDir, { recursive: true });
      }

      this.currentLogSize = existsSync(this.logFilePath) ? statSync(this.logFilePath).size : 0;
      this.writeStream = createWriteStream(this.logFilePath, { flags: 'a' });
      this.writeStream.on('error', (error) => {
        console.error('Log stream failed:', error);
        this.writeStream = null;
      });
    } catch (error) {
      // Fallback to console in case of setup failure
      console.error('Failed to setup logger:', error);
    }
  }

  /**
   * Rotate log file if it exceeds the maximum size
   */
  private rotateLogFile(): void {
    if (this.currentLogSize < this.config.maxFileSize) {
      return;
    }

    if (this.writeStream) {
      this.writeStream.end();
      this.writeStream = null;
    }

    try {
      for (let i = this.config.maxFiles - 1; i > 0; i--) {
        const oldPath = path.join(this.config.logDir, `${this.config.logFile}.${i}`);
        if (existsSync(oldPath)) {
          renameSync(oldPath, path.join(this.config.logDir, `${this.config.logFile}.${i + 1}`));
        }
      }

      renameSync(this.logFilePath, path.join(this.config.logDir, `${this.config.logFile}.1`));
      this.currentLogSize = 0;
      this.writeStream = createWriteStream(this.logFilePath, { flags: 'a' });
    } catch (error) {
      console.error('Failed to rotate log file:', error);
    }
  }

  private writeLog(level: LogLevel, message: string, context: string, metadata?: unknown): void {
    if (LEVEL_ORDER.indexOf(level) > LEVEL_ORDER.indexOf(this.config.minLevel)) {
      return;
    }

    this.rotateLogFile();

    const timestamp = new Date().toISOString();
    let logEntry = `${timestamp} [${level}] [${context}] ${message}`;

    if (metadata !== undefined) {
      logEntry += typeof metadata === 'object' ? ` ${safeStringify(metadata)}` : ` ${String(metadata)}`;
    }

    logEntry += '\n';

    if (this.writeStream) {
      this.writeStream.write(logEntry);
      this.currentLogSize += Buffer.byteLength(logEntry);
    }
    if (this.config.console) {
      process.stderr.write(logEntry);
    }
  }

  /**
   * Log an error message
   * @param context Log context (e.g., class or module name)
   */
  public error(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, context, metadata);
  }

  /**
   * Log a warning message
   */
  public warn(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.WARN, message, context, metadata);
  }

  /**
   * Log an info message
   */
  public info(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.INFO, message, context, metadata);
  }

  /**
   * Log a debug message
   */
  public debug(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, context, metadata);
  }

  /**
   * Log an error with stack trace
   * @param message Optional message to use instead of error.message
   */
  public logError(error: Error, context: string, message?: string): void {
    this.error(message || error.message, context, {
      stack: error.stack,
      name: error.name,
      message: error.message
    });
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (v instanceof Error ? { name: v.name, message: v.message } : v));
  } catch {
    return '[unserializable]';
  }
}

// Convenience function to get the logger instance
export function getLogger(): Logger {
  return Logger.getInstance();
}
