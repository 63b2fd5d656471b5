import chalk from 'chalk';
import { randomUUID } from 'crypto';
import { existsSync, mkdirSync, appendFileSync, statSync, renameSync, unlinkSync } from 'fs';
import { dirname } from 'path';
import { StructuredError, type ErrorContext, formatError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'pretty' | 'json';

interface LoggerOptions {
  level: LogLevel;
  prefix?: string;
  format?: LogFormat;
  correlationId?: string;
  includeTimestamp?: boolean;
}

interface ErrorLogOptions {
  context?: ErrorContext;
  includeStack?: boolean;
  includeRecovery?: boolean;
}

/**
 * Structured JSON log entry schema for consistent logging
 */
export interface StructuredLogEntry {
  timestamp?: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  component?: string;
  meta?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    severity?: string;
    stack?: string;
    cause?: string;
    context?: Record<string, unknown>;
    recoveryActions?: Array<{ description: string; automatic: boolean }>;
  };
}

/**
 * Configuration for the diagnostic log file
 */
export interface StructuredFileLoggerConfig {
  /** Path of the active log file */
  filePath: string;
  /** Maximum file size in bytes before rotation (default: 10MB) */
  maxFileSizeBytes: number;
  /** Number of rotated files to keep (default: 5) */
  maxFiles: number;
  /** Lowest level written to the file (default: info) */
  level: LogLevel;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const levelIcons: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Append-only JSON-lines log file with size based rotation
 */
export class StructuredFileLogger {
  private config: StructuredFileLoggerConfig;
  private enabled: boolean = false;

  constructor(config: Partial<StructuredFileLoggerConfig> = {}) {
    this.config = {
      filePath: config.filePath || 'tracker-cli.log',
      maxFileSizeBytes: config.maxFileSizeBytes || 10 * 1024 * 1024,
      maxFiles: config.maxFiles || 5,
      level: config.level ?? 'info',
    };
  }

  enable(): void {
    this.ensureLogDirectory();
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  private ensureLogDirectory(): void {
    const dir = dirname(this.config.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private needsRotation(): boolean {
    if (!existsSync(this.config.filePath)) {
      return false;
    }
    return statSync(this.config.filePath).size >= this.config.maxFileSizeBytes;
  }

  /**
   * Shift `log.1 .. log.N-1` up by one and move the active file to `log.1`
   */
  private rotateLogFiles(): void {
    const base = this.config.filePath;
    const oldestFile = `${base}.${this.config.maxFiles}`;
    if (existsSync(oldestFile)) {
      unlinkSync(oldestFile);
    }

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      const current = `${base}.${i}`;
      if (existsSync(current)) {
        renameSync(current, `${base}.${i + 1}`);
      }
    }

    if (existsSync(base)) {
      renameSync(base, `${base}.1`);
    }
  }

  writeLog(entry: StructuredLogEntry): void {
    if (!this.enabled || levelPriority[entry.level] < levelPriority[this.config.level]) {
      return;
    }

    try {
      if (this.needsRotation()) {
        this.rotateLogFiles();
      }
      appendFileSync(this.config.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      // Stop writing after the first failure; one warning is enough
      this.enabled = false;
      console.error(`Failed to write log file ${this.config.filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

let fileLogger: StructuredFileLogger | undefined;

export function initStructuredFileLogging(config: Partial<StructuredFileLoggerConfig>): StructuredFileLogger {
  fileLogger?.disable();
  fileLogger = new StructuredFileLogger(config);
  fileLogger.enable();
  return fileLogger;
}

export function disableStructuredFileLogging(): void {
  fileLogger?.disable();
  fileLogger = undefined;
}

export function getStructuredFileLogger(): StructuredFileLogger | undefined {
  return fileLogger;
}

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Settings shared by a root logger and every child created from it
 */
interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  correlationId?: string;
  includeTimestamp: boolean;
}

class Logger {
  private settings: LoggerSettings;
  private prefix: string;

  constructor(options: LoggerOptions = { level: 'info' }, settings?: LoggerSettings) {
    this.prefix = options.prefix || '';
    this.settings = settings ?? {
      level: options.level,
      format: options.format || 'pretty',
      correlationId: options.correlationId,
      includeTimestamp: options.includeTimestamp ?? true,
    };
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  setFormat(format: LogFormat): void {
    this.settings.format = format;
  }

  /**
   * Set the correlation ID stamped on every entry of this invocation
   */
  setCorrelationId(id: string): void {
    this.settings.correlationId = id;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.settings.level];
  }

  private createLogEntry(level: LogLevel, message: string, meta?: object): StructuredLogEntry {
    const entry: StructuredLogEntry = { level, message };

    if (this.settings.includeTimestamp) {
      entry.timestamp = new Date().toISOString();
    }
    if (this.settings.correlationId) {
      entry.correlationId = this.settings.correlationId;
    }
    if (this.prefix) {
      entry.component = this.prefix;
    }
    if (meta && Object.keys(meta).length > 0) {
      entry.meta = { ...meta };
    }

    return entry;
  }

  private formatPretty(level: LogLevel, message: string, meta?: object): string {
    const timestampStr = this.settings.includeTimestamp ? `${chalk.gray(new Date().toISOString())} ` : '';
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    let formatted = `${timestampStr}${levelIcons[level]} ${levelColors[level](level.toUpperCase().padEnd(5))} ${prefix}${message}`;

    if (meta && Object.keys(meta).length > 0) {
      formatted += ` ${chalk.gray(JSON.stringify(meta))}`;
    }

    return formatted;
  }

  private writeLog(level: LogLevel, message: string, meta?: object): void {
    fileLogger?.writeLog(this.createLogEntry(level, message, meta));

    if (!this.shouldLog(level)) {
      return;
    }

    // Logs go to stderr so command output on stdout stays clean
    if (this.settings.format === 'json') {
      console.error(JSON.stringify(this.createLogEntry(level, message, meta)));
    } else {
      const output = level === 'warn' ? console.warn : console.error;
      output(this.formatPretty(level, message, meta));
    }
  }

  debug(message: string, meta?: object): void {
    this.writeLog('debug', message, meta);
  }

  info(message: string, meta?: object): void {
    this.writeLog('info', message, meta);
  }

  warn(message: string, meta?: object): void {
    this.writeLog('warn', message, meta);
  }

  error(message: string, meta?: object): void {
    this.writeLog('error', message, meta);
  }

  /**
   * Log a structured error with its context, recovery suggestions, and optional stack trace
   */
  structuredError(error: StructuredError, options: ErrorLogOptions = {}): void {
    const { includeStack = this.settings.level === 'debug', includeRecovery = true } = options;

    const entry = this.createLogEntry('error', error.message);
    entry.error = {
      code: error.code,
      message: error.message,
      severity: error.severity,
      context: { ...error.context, ...options.context },
      cause: error.cause?.message,
      stack: includeStack ? error.stack : undefined,
      recoveryActions: includeRecovery
        ? error.recoveryActions.map((a) => ({ description: a.description, automatic: a.automatic }))
        : undefined,
    };
    fileLogger?.writeLog(entry);

    if (this.settings.format === 'json') {
      console.error(JSON.stringify(entry));
      return;
    }

    const severityColor = this.getSeverityColor(error.severity);
    console.error(severityColor(formatError(error)));
    if (includeStack && error.stack) {
      console.error(chalk.gray(error.stack));
    }
  }

  private getSeverityColor(severity: string): (text: string) => string {
    switch (severity) {
      case 'critical':
        return chalk.red.bold;
      case 'error':
        return chalk.red;
      case 'warning':
        return chalk.yellow;
      case 'transient':
        return chalk.cyan;
      default:
        return chalk.white;
    }
  }

  /**
   * Create a child logger with a component prefix. Level, format and
   * correlation ID stay shared with the parent.
   */
  child(prefix: string): Logger {
    return new Logger({ level: this.settings.level, prefix }, this.settings);
  }
}

export type { Logger };

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : 'warn' });
