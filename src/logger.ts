/**
 * Centralized logging system with multiple output levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  context?: string;
  level?: LogLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// Loggers created without an explicit level follow this one, so a single
// --debug flag reaches every module.
let sharedLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  sharedLevel = level;
}

export function getLogLevel(): LogLevel {
  return sharedLevel;
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs = 1000;
  private readonly context?: string;
  private readonly level?: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.level = options.level;
  }

  private shouldLog(level: LogLevel): boolean {
    const minIndex = LOG_LEVELS.indexOf(this.level ?? sharedLevel);
    const levelIndex = LOG_LEVELS.indexOf(level);
    return levelIndex >= minIndex;
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, error?: Error): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      context: this.context
    });
  }

  success(message: string): void {
    const formatted = `✅ ${message}`;
    console.log(`\x1b[32m${formatted}\x1b[0m`);
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : this.logs;
  }

  clear(): void {
    this.logs = [];
  }
}

// Shared instance
export const logger = new Logger();

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public exitCode: number = 1,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Normalizes anything thrown into an AppError and logs it
 */
export function handleError(error: unknown, log: Logger = logger): AppError {
  if (error instanceof AppError) {
    log.error(error.message, error);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR');
    log.error(error.message, error);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR');
  log.error(String(error));
  return appError;
}
