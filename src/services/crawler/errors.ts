/**
 * Base class for errors raised by the crawler.
 * `isOperational` separates expected failures (a page that cannot be fetched,
 * a state file on a read-only disk) from programming errors.
 */
export class CrawlerError extends Error {
  isOperational: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export type FetchErrorKind = 'httpStatus' | 'transport' | 'decode';

/**
 * A page could not be turned into markup text
 */
export class FetchError extends CrawlerError {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly statusCode: number | null;

  constructor(kind: FetchErrorKind, url: string, message: string, statusCode: number | null = null, cause?: unknown) {
    super(message, { cause });
    this.kind = kind;
    this.url = url;
    this.statusCode = statusCode;
  }
}

/**
 * Writing an artifact or the state file failed.
 * A fatal error means the output location itself is unusable and the run must stop.
 */
export class PersistenceError extends CrawlerError {
  readonly path: string;
  readonly fatal: boolean;

  constructor(message: string, path: string, fatal = false, cause?: unknown) {
    super(message, { cause });
    this.path = path;
    this.fatal = fatal;
  }
}

export class ConfigError extends CrawlerError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
