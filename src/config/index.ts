import * as dotenv from 'dotenv';
import { z } from 'zod';
import { CrawlOptions } from '../services/crawler/interfaces/types';
import { ConfigError } from '../services/crawler/errors';
import { DEFAULT_USER_AGENT } from '../services/crawler/implementations/AxiosFetcher';
import { LogLevel, LoggingUtils } from '../services/crawler/utils/LoggingUtils';

export const DEFAULT_START_URL = 'https://tr.wikipedia.org/wiki/Recep_Tayyip_Erdo%C4%9Fan';
export const DEFAULT_SITE_SCOPE = 'tr.wikipedia.org';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  crawl: CrawlOptions;
  logging: {
    level: LogLevel;
  };
}

// Unset and empty variables both fall back to the default
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema);
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  MAX_FILES: fromEnv(z.coerce.number().int().positive().default(50)),
  START_URLS: fromEnv(z.string().default(DEFAULT_START_URL)),
  SITE_SCOPE: fromEnv(z.string().default(DEFAULT_SITE_SCOPE)),
  OUTPUT_DIR: fromEnv(z.string().default('data')),
  STATE_FILE: fromEnv(z.string().default('data/crawl_state.json')),
  FETCH_TIMEOUT_SECONDS: fromEnv(z.coerce.number().positive().default(30)),
  USER_AGENT: fromEnv(z.string().default(DEFAULT_USER_AGENT)),
  MAX_FETCH_ATTEMPTS: fromEnv(z.coerce.number().int().positive().default(3)),
  DEDUPE_QUEUE: fromEnv(booleanFlag),
  EMPTY_PAGE_POLICY: fromEnv(z.enum(['write', 'skip']).default('write')),
  LOG_LEVEL: fromEnv(z.string().default('info')),
});

/**
 * Load `.env` into process.env. Variables already set in the environment win.
 */
export function loadDotenv(): void {
  const result = dotenv.config();
  if (result.error) {
    LoggingUtils.debug(`No .env file loaded: ${result.error.message}`, 'config');
  } else {
    LoggingUtils.debug('Environment variables loaded from .env file', 'config');
  }
}

/**
 * Build the crawler configuration from environment variables
 * @throws ConfigError when a variable holds an invalid value
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const startUrls = values.START_URLS.split(',').map(url => url.trim()).filter(Boolean);
  if (startUrls.length === 0) {
    throw new ConfigError('START_URLS must name at least one URL');
  }

  const level = LoggingUtils.parseLevel(values.LOG_LEVEL);
  if (level === null) {
    throw new ConfigError(`Unknown LOG_LEVEL: ${values.LOG_LEVEL}`);
  }

  return {
    crawl: {
      startUrls,
      maxFiles: values.MAX_FILES,
      siteScope: values.SITE_SCOPE,
      outputDir: values.OUTPUT_DIR,
      stateFile: values.STATE_FILE,
      fetchTimeoutSeconds: values.FETCH_TIMEOUT_SECONDS,
      userAgent: values.USER_AGENT,
      maxFetchAttempts: values.MAX_FETCH_ATTEMPTS,
      dedupeQueue: values.DEDUPE_QUEUE,
      emptyPagePolicy: values.EMPTY_PAGE_POLICY,
    },
    logging: { level },
  };
}
