/**
 * Diagnostic logging.
 *
 * Everything goes to stderr so command output on stdout stays machine-readable.
 * Modules take a scoped child of the root logger; children share the root's
 * level, so `setLevel` on the root quiets the whole library.
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 99,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
  /** Defaults to process.stderr, resolved on every write */
  sink?: LogSink;
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

const COLOR_BY_LEVEL: Record<Exclude<LogLevel, LogLevel.SILENT>, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.white,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
};

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_BY_NAME, value);
}

export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!name) return fallback;
  const key = name.trim().toLowerCase();
  return isLogLevelName(key) ? LEVEL_BY_NAME[key] : fallback;
}

export class Logger {
  private readonly options: LoggerOptions;

  constructor(
    options: Partial<LoggerOptions> = {},
    private readonly scope?: string,
    private readonly root?: Logger
  ) {
    this.options = { level: LogLevel.INFO, timestamps: false, colors: true, ...options };
  }

  /**
   * Logger that prefixes lines with `[scope]` and follows this logger's level
   */
  child(scope: string): Logger {
    const owner = this.root ?? this;
    return new Logger(owner.options, this.scope ? `${this.scope}:${scope}` : scope, owner);
  }

  setLevel(level: LogLevel): void {
    (this.root ?? this).options.level = level;
  }

  getLevel(): LogLevel {
    return (this.root ?? this).options.level;
  }

  shouldLog(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.getLevel();
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.write(LogLevel.WARN, message);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  private write(level: Exclude<LogLevel, LogLevel.SILENT>, message: string): void {
    if (!this.shouldLog(level)) return;

    const { timestamps, colors, sink } = (this.root ?? this).options;
    let line = this.scope ? `[${this.scope}] ${message}` : message;
    if (colors) line = COLOR_BY_LEVEL[level](line);
    if (timestamps) line = `${new Date().toISOString()} ${line}`;

    if (sink) {
      sink(line);
    } else {
      process.stderr.write(line + '\n');
    }
  }
}

export const logger = new Logger({ level: parseLogLevel(process.env.THREADPACK_LOG_LEVEL) });
