/**
 * Relay logging
 * Leveled, structured console logging with per-module sub-loggers
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  module: string;
  operation?: string;
  timestamp: Date;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  /** Entries below this level are dropped */
  minLevel?: LogLevel;
  consoleOutput?: boolean;
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return fallback;
  }
}

export class RelayLogger {
  private options: Required<LoggerOptions>;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      minLevel: LogLevel.INFO,
      consoleOutput: true,
      moduleName: 'relay',
      ...options
    };
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  fatal(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * Change the minimum level of this logger (sub-loggers created later inherit it)
   */
  setLevel(level: LogLevel): void {
    this.options.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.options.minLevel;
  }

  createSubLogger(moduleName: string): RelayLogger {
    return new RelayLogger({
      ...this.options,
      moduleName: `${this.options.moduleName}.${moduleName}`
    });
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string,
    error?: Error
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.options.moduleName,
      operation,
      timestamp: new Date(),
      data,
      error
    };

    if (this.options.consoleOutput) {
      this.writeToConsole(entry);
    }
  }

  private writeToConsole(entry: LogEntry): void {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const operationStr = entry.operation ? ` [${entry.operation}]` : '';

    let logMessage = `${timestamp} ${levelStr} [${entry.module}]${operationStr} ${entry.message}`;

    if (entry.error) {
      logMessage += `\nError: ${entry.error.message}`;
      if (entry.error.stack && LEVEL_ORDER[this.options.minLevel] <= LEVEL_ORDER[LogLevel.DEBUG]) {
        logMessage += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      logMessage += ` ${JSON.stringify(entry.data)}`;
    }

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
}

export const defaultLogger = new RelayLogger();

export function createModuleLogger(moduleName: string): RelayLogger {
  return defaultLogger.createSubLogger(moduleName);
}
