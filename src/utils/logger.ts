/**
 * Simple logging utility for pin composer
 */
/* eslint-disable no-console */

export interface LogContext {
  operation?: string;
  style?: number;
  url?: string;
  error?: Error;
  metadata?: Record<string, unknown>;
}

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Parse a level name such as "info" or "DEBUG"; unknown values yield undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized);
}

/**
 * Simple logger implementation
 */
export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.WARN;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [pin-composer]`;

    if (!context) {
      return `${prefix} ${message}`;
    }

    const contextParts: string[] = [];
    if (context.operation) contextParts.push(`operation=${context.operation}`);
    if (context.style !== undefined) contextParts.push(`style=${context.style}`);
    if (context.url) contextParts.push(`url=${context.url}`);
    if (context.metadata) {
      for (const [key, value] of Object.entries(context.metadata)) {
        contextParts.push(`${key}=${String(value)}`);
      }
    }

    const contextStr = contextParts.length > 0 ? ` {${contextParts.join(', ')}}` : '';
    return `${prefix} ${message}${contextStr}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.formatMessage(LogLevel.DEBUG, message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(LogLevel.INFO, message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, context));
      if (context?.error) {
        console.warn('Error details:', context.error);
      }
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(LogLevel.ERROR, message, context));
      if (context?.error) {
        console.error('Error details:', context.error);
      }
    }
  }
}

/**
 * Default logger instance
 */
export const logger = Logger.getInstance();

/**
 * Convenience functions for common logging patterns
 */
export const logFontFallback = (candidates: readonly string[], size: number): void => {
  logger.info(`No font from chain loaded, falling back to sans-serif`, {
    operation: 'font-resolve',
    metadata: { candidates: candidates.join('|'), size },
  });
};

export const logRenderError = (style: number, error: Error): void => {
  logger.error(`Pin rendering failed`, {
    operation: 'render',
    style,
    error,
  });
};

export const logSourceError = (operation: 'image-fetch' | 'image-generate', error: Error, url?: string): void => {
  logger.warn(`Image source failed`, {
    operation,
    url,
    error,
  });
};
