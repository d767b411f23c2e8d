/**
 * Application logger
 * Structured console logging with module and operation tags
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  /** Log level */
  level: LogLevel;

  /** Message text */
  message: string;

  /** Dotted module name */
  module: string;

  /** Operation name */
  operation?: string;

  timestamp: Date;

  /** Extra structured data */
  data?: Record<string, unknown>;

  error?: Error;
}

export interface LoggerOptions {
  /**
   * Minimum level for this logger. When unset the process-wide level applies.
   */
  minLevel?: LogLevel;

  /** Write to the console */
  consoleOutput?: boolean;

  /** Module name */
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

let globalMinLevel: LogLevel = LogLevel.INFO;

/**
 * Set the process-wide minimum level
 */
export function configureLogging(options: { minLevel: LogLevel }): void {
  globalMinLevel = options.minLevel;
}

/**
 * Parse a level name from configuration, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || '').toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class AppLogger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      consoleOutput: true,
      moduleName: 'app',
      ...options
    };
  }

  /**
   * Debug log
   */
  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  /**
   * Info log
   */
  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  /**
   * Warning log
   */
  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  /**
   * Error log
   */
  error(message: string, error?: unknown, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error === undefined ? undefined : toError(error));
  }

  /**
   * Fatal log
   */
  fatal(message: string, error?: unknown, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error === undefined ? undefined : toError(error));
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.options.moduleName || 'app',
      operation,
      timestamp: new Date(),
      data,
      error
    };

    if (this.options.consoleOutput) {
      this.writeToConsole(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const minLevel = this.options.minLevel || globalMinLevel;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  }

  /**
   * Format an entry as `timestamp LEVEL [module] [operation] message`
   */
  static format(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const moduleStr = `[${entry.module}]`;
    const operationStr = entry.operation ? ` [${entry.operation}]` : '';

    let logMessage = `${timestamp} ${levelStr} ${moduleStr}${operationStr} ${entry.message}`;

    if (entry.error) {
      logMessage += `\nError: ${entry.error.message}`;
      if (entry.error.stack) {
        logMessage += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      logMessage += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
    }

    return logMessage;
  }

  private writeToConsole(entry: LogEntry): void {
    const logMessage = AppLogger.format(entry);

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(logMessage);
        break;
    }
  }

  /**
   * Create a child logger for a sub-module
   */
  createSubLogger(moduleName: string): AppLogger {
    return new AppLogger({
      ...this.options,
      moduleName: `${this.options.moduleName}.${moduleName}`
    });
  }
}

/**
 * Root logger
 */
export const defaultLogger = new AppLogger();

export function createDatabaseLogger(): AppLogger {
  return defaultLogger.createSubLogger('db');
}

export function createAssistantLogger(): AppLogger {
  return defaultLogger.createSubLogger('assistant');
}

export function createAuthLogger(): AppLogger {
  return defaultLogger.createSubLogger('auth');
}

export function createServerLogger(): AppLogger {
  return defaultLogger.createSubLogger('server');
}

export function createIntegrationLogger(name: string): AppLogger {
  return defaultLogger.createSubLogger(`integration.${name}`);
}
