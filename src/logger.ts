/**
 * Structured leveled logger writing to the console.
 */

import { CONFIG } from './config.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_MAP: Record<AppLogLevel, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

type AppLogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: string;
  data?: unknown;
  error?: {
    message: string;
    name: string;
    code?: string;
  };
}

export interface LoggerOptions {
  level?: AppLogLevel;
  pretty?: boolean;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly pretty: boolean;

  constructor(private readonly context?: string, options: LoggerOptions = {}) {
    this.level = LOG_LEVEL_MAP[options.level ?? CONFIG.logging.level];
    this.pretty = options.pretty ?? CONFIG.logging.format === 'pretty';
  }

  /**
   * Create a child logger; contexts are joined with ':'
   */
  child(context: string): Logger {
    const childContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(childContext, { level: LOG_LEVEL_MAP_REVERSE[this.level], pretty: this.pretty });
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data, describeError(error));
  }

  private log(level: LogLevel, message: string, data?: unknown, error?: LogEntry['error']): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: this.context,
      data,
      error,
    };

    const output = this.pretty ? formatPretty(entry) : JSON.stringify(entry);
    writerFor(level)(output);
  }
}

const LOG_LEVEL_MAP_REVERSE: Record<LogLevel, AppLogLevel> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

function describeError(error: unknown): LogEntry['error'] {
  if (error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { message: error.message, name: error.name, code };
  }
  return { message: String(error), name: 'NonError' };
}

function formatPretty(entry: LogEntry): string {
  const parts: string[] = [`[${entry.timestamp}]`, `[${entry.level}]`];

  if (entry.context) {
    parts.push(`[${entry.context}]`);
  }

  parts.push(entry.message);

  if (entry.data !== undefined) {
    parts.push(JSON.stringify(entry.data));
  }

  if (entry.error) {
    parts.push(`(${entry.error.name}: ${entry.error.message})`);
  }

  return parts.join(' ');
}

function writerFor(level: LogLevel): (line: string) => void {
  switch (level) {
    case LogLevel.DEBUG:
      return console.debug;
    case LogLevel.INFO:
      return console.info;
    case LogLevel.WARN:
      return console.warn;
    case LogLevel.ERROR:
      return console.error;
  }
}

export const createLogger = (context: string, options?: LoggerOptions): Logger => {
  return new Logger(context, options);
};

export const logger = createLogger('scorer');
