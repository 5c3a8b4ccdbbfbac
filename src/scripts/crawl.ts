#!/usr/bin/env node
/**
 * Crawl CLI
 *
 * Crawls the configured wiki breadth-first and writes one text file per article.
 * Settings come from the environment (or a .env file); flags override them.
 * Re-running with the same state file resumes where the last run stopped.
 *
 * @example
 * ```
 * npm run crawl -- --max-files 20 --start-urls https://tr.wikipedia.org/wiki/Ankara
 * ```
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import logger from '../utils/logger';
import { Env, loadConfig, loadDotenv } from '../config';
import { ServiceFactory } from '../services/crawler/factories/ServiceFactory';
import { LogLevel, LoggingUtils } from '../services/crawler/utils/LoggingUtils';
import { describeError } from '../services/crawler/errors';

interface CliArgs {
  'max-files'?: number;
  'start-urls'?: string;
  'site-scope'?: string;
  'output-dir'?: string;
  'state-file'?: string;
  timeout?: number;
  'max-fetch-attempts'?: number;
  'dedupe-queue'?: boolean;
  'empty-pages'?: string;
  verbose: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  return yargs(argv)
    .usage('Usage: $0 [options]')
    .option('max-files', { type: 'number', describe: 'Number of articles to save (MAX_FILES)' })
    .option('start-urls', { type: 'string', describe: 'Comma-separated seed URLs (START_URLS)' })
    .option('site-scope', { type: 'string', describe: 'Host substring links must match (SITE_SCOPE)' })
    .option('output-dir', { type: 'string', describe: 'Directory for article files (OUTPUT_DIR)' })
    .option('state-file', { type: 'string', describe: 'Crawl state JSON file (STATE_FILE)' })
    .option('timeout', { type: 'number', describe: 'Fetch timeout in seconds (FETCH_TIMEOUT_SECONDS)' })
    .option('max-fetch-attempts', { type: 'number', describe: 'Failed fetches before a URL is given up (MAX_FETCH_ATTEMPTS)' })
    .option('dedupe-queue', { type: 'boolean', describe: 'Drop already queued URLs when enqueuing (DEDUPE_QUEUE)' })
    .option('empty-pages', { type: 'string', choices: ['write', 'skip'], describe: 'Pages without article content (EMPTY_PAGE_POLICY)' })
    .option('verbose', { type: 'boolean', alias: 'v', default: false, describe: 'Log every step' })
    .strict()
    .help()
    .parseSync();
}

/**
 * Overlay CLI flags on the environment so both go through the same validation
 */
function toEnv(args: CliArgs, env: Env): Env {
  const overrides: Env = {
    MAX_FILES: args['max-files']?.toString(),
    START_URLS: args['start-urls'],
    SITE_SCOPE: args['site-scope'],
    OUTPUT_DIR: args['output-dir'],
    STATE_FILE: args['state-file'],
    FETCH_TIMEOUT_SECONDS: args.timeout?.toString(),
    MAX_FETCH_ATTEMPTS: args['max-fetch-attempts']?.toString(),
    DEDUPE_QUEUE: args['dedupe-queue']?.toString(),
    EMPTY_PAGE_POLICY: args['empty-pages'],
    LOG_LEVEL: args.verbose ? LogLevel.DEBUG : undefined,
  };

  const merged: Env = { ...env };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

async function main(): Promise<void> {
  loadDotenv();
  const args = parseArgs(hideBin(process.argv));
  const config = loadConfig(toEnv(args, process.env));

  LoggingUtils.setLogLevel(config.logging.level);
  if (config.logging.level === LogLevel.NONE) {
    logger.silent = true;
  } else {
    logger.level = config.logging.level;
  }

  const factory = new ServiceFactory(config.crawl);
  const crawler = await factory.createCrawler();

  // First Ctrl+C finishes the current page and saves state; a second one exits immediately
  let interrupted = false;
  process.on('SIGINT', () => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;
    crawler.stop();
  });

  const summary = await crawler.crawl(config.crawl.startUrls);
  logger.info(`Crawl ${summary.stopReason}: ${summary.fileCount} files in ${config.crawl.outputDir}`);
}

main().catch(error => {
  logger.error(`Crawl failed: ${describeError(error)}`);
  process.exit(1);
});
