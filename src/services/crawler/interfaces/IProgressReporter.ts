import { CrawlProgress, CrawlSummary } from './types';

/**
 * Observer notified as the crawl advances
 */
export interface IProgressReporter {
  /**
   * Called after every crawl step, including rejected ones
   */
  report(progress: CrawlProgress): void;

  /**
   * Called once when the crawl loop ends
   */
  finish?(summary: CrawlSummary): void;
}
