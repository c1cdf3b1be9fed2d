/**
 * Structured console logger shared by every delivery module.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  module: string;
  operation?: string;
  timestamp: Date;
  data?: LogData;
  error?: Error;
}

export type LogSink = (entry: LogEntry, line: string) => void;

export interface LoggerOptions {
  /** Minimum level; falls back to the process-wide level when unset */
  minLevel?: LogLevel;
  moduleName?: string;
  consoleOutput?: boolean;
  /** Extra sink, mostly for tests */
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

let processLevel: LogLevel = LogLevel.INFO;

/**
 * Set the minimum level for every logger that has no explicit level of its own.
 */
export function setLogLevel(level: LogLevel): void {
  processLevel = level;
}

export function getLogLevel(): LogLevel {
  return processLevel;
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  const match = Object.values(LogLevel).find(level => level === normalized);
  return match ?? null;
}

export class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      consoleOutput: true,
      moduleName: 'delivery',
      ...options
    };
  }

  debug(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  info(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  warn(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  error(message: string, error?: Error, data?: LogData, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  fatal(message: string, error?: Error, data?: LogData, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * Create a logger for a sub-module, e.g. `delivery.coordinator`
   */
  createSubLogger(moduleName: string): Logger {
    return new Logger({
      ...this.options,
      moduleName: `${this.options.moduleName}.${moduleName}`
    });
  }

  get moduleName(): string {
    return this.options.moduleName ?? 'delivery';
  }

  private log(level: LogLevel, message: string, data?: LogData, operation?: string, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.moduleName,
      operation,
      timestamp: new Date(),
      data,
      error
    };
    const line = formatLogEntry(entry);

    if (this.options.consoleOutput) {
      writeToConsole(entry.level, line);
    }
    this.options.sink?.(entry, line);
  }

  private shouldLog(level: LogLevel): boolean {
    const minLevel = this.options.minLevel ?? processLevel;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  }
}

export function formatLogEntry(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const operationStr = entry.operation ? ` [${entry.operation}]` : '';
  let line = `${entry.timestamp.toISOString()} ${levelStr} [${entry.module}]${operationStr} ${entry.message}`;

  if (entry.error) {
    line += `\nError: ${entry.error.message}`;
    if (entry.error.stack && LEVEL_ORDER[entry.level] >= LEVEL_ORDER[LogLevel.FATAL]) {
      line += `\nStack: ${entry.error.stack}`;
    }
  }

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
  }

  return line;
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    case LogLevel.ERROR:
    case LogLevel.FATAL:
      console.error(line);
      break;
  }
}

export const defaultLogger = new Logger();

export function createModuleLogger(moduleName: string): Logger {
  return defaultLogger.createSubLogger(moduleName);
}
