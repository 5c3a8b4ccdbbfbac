import { CrawlProgress, CrawlSummary } from './types';

/**
 * Interface for crawler implementations that drive the crawl loop
 */
export interface ICrawler {
  /**
   * Run the crawl from the given seeds until the budget is spent, the queue is empty or stop() is called
   * @param startUrls Seed URLs
   */
  crawl(startUrls: string[]): Promise<CrawlSummary>;

  /**
   * Ask the loop to end after the page currently in flight
   */
  stop(): void;

  /**
   * Get the most recent progress event, or null before the first step
   */
  getProgress(): CrawlProgress | null;
}
