import { Logger, LogLevel } from '../types/index.js';

/**
 * Simple console-based logger with support for different log levels
 */
class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(level: LogLevel = LogLevel.INFO) {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
    const currentLevelIndex = levels.indexOf(this.level);
    const messageLevelIndex = levels.indexOf(level);
    return messageLevelIndex >= currentLevelIndex;
  }

  private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    const prefix = this.getPrefix(level);
    let formatted = `${timestamp} ${prefix} ${message}`;

    if (meta && typeof meta === 'object') {
      // JSON.stringify(new Error()) is {}
      const metaToLog = meta instanceof Error ? {
        ...meta,
        name: meta.name,
        message: meta.message,
        stack: meta.stack
      } : meta;
      formatted += `\n${JSON.stringify(metaToLog, replaceErrors, 2)}`;
    } else if (meta !== undefined) {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '[DEBUG]';
      case LogLevel.INFO:
        return '[INFO] ';
      case LogLevel.WARN:
        return '[WARN] ';
      case LogLevel.ERROR:
        return '[ERROR]';
      default:
        return '[LOG]  ';
    }
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.formatMessage(LogLevel.DEBUG, message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(LogLevel.INFO, message, meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, meta));
    }
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(LogLevel.ERROR, message, meta));
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

// Create and export a default logger instance
export const logger = new ConsoleLogger(
  process.env.MODPM_VERBOSE === '1'
    ? LogLevel.DEBUG
    : process.env.NODE_ENV === 'development'
      ? LogLevel.INFO
      : LogLevel.ERROR
);
