import logger from '../../../utils/logger';

/**
 * Log levels enum
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  NONE = 'none'
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Logger handed to crawler components, prefixed with the component tag
 */
export interface TaggedLogger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string | Error, context?: object): void;
}

/**
 * Utilities for logging in the crawler service
 */
export class LoggingUtils {
  private static currentLevel: LogLevel = LogLevel.DEBUG;
  private static disabledTags: Set<string> = new Set();

  /**
   * Sets the minimum level forwarded to winston
   * @param level The log level to set
   */
  static setLogLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  /**
   * Mute a component tag, e.g. `frontier` when only page outcomes matter
   */
  static disableTag(tag: string): void {
    this.disabledTags.add(tag.toLowerCase());
  }

  static enableTag(tag: string): void {
    this.disabledTags.delete(tag.toLowerCase());
  }

  static isTagEnabled(tag: string): boolean {
    return !this.disabledTags.has(tag.toLowerCase());
  }

  /**
   * Parse a level name coming from configuration
   * @returns The matching level, or null for an unknown name
   */
  static parseLevel(value: string): LogLevel | null {
    const normalized = value.trim().toLowerCase();
    const match = Object.values(LogLevel).find(level => level === normalized);
    return match ?? null;
  }

  static debug(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.DEBUG, message, tag, context);
  }

  static info(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.INFO, message, tag, context);
  }

  static warn(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.WARN, message, tag, context);
  }

  /**
   * Log an error message; an Error instance contributes its name and stack
   */
  static error(message: string | Error, tag?: string, context?: object): void {
    if (message instanceof Error) {
      this.log(LogLevel.ERROR, message.message, tag, {
        ...context,
        stack: message.stack,
        name: message.name
      });
    } else {
      this.log(LogLevel.ERROR, message, tag, context);
    }
  }

  private static log(level: LogLevel, message: string, tag?: string, context?: object): void {
    if (this.isLevelDisabled(level) || (tag && !this.isTagEnabled(tag))) {
      return;
    }

    logger.log(level, tag ? `[${tag}] ${message}` : message, context);
  }

  private static isLevelDisabled(level: LogLevel): boolean {
    return (
      this.currentLevel === LogLevel.NONE ||
      LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.currentLevel)
    );
  }

  /**
   * Create a scoped logger with a fixed tag
   * @param tag The tag to scope the logger with
   */
  static createTaggedLogger(tag: string): TaggedLogger {
    return {
      debug: (message: string, context?: object) => this.debug(message, tag, context),
      info: (message: string, context?: object) => this.info(message, tag, context),
      warn: (message: string, context?: object) => this.warn(message, tag, context),
      error: (message: string | Error, context?: object) => this.error(message, tag, context)
    };
  }
}
