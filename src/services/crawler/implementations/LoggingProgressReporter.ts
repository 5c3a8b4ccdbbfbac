import { IProgressReporter } from '../interfaces/IProgressReporter';
import { CrawlProgress, CrawlSummary } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Progress reporter writing one log line per crawl step
 */
export class LoggingProgressReporter implements IProgressReporter {
  private readonly logger = LoggingUtils.createTaggedLogger('progress');

  report(progress: CrawlProgress): void {
    const line = `${progress.pagesCompleted}/${progress.totalBudget} pages, queue ${progress.queueDepth}, ` +
      `attempted ${progress.attempted}: ${progress.outcome} ${progress.url}`;

    // Rejections are routine (already visited, off-site) and would drown the log
    if (progress.outcome === 'rejected') {
      this.logger.debug(line);
    } else {
      this.logger.info(line);
    }
  }

  finish(summary: CrawlSummary): void {
    this.logger.info(
      `Done: ${summary.stopReason}, ${summary.succeeded} ok, ${summary.failed} failed, ` +
      `${summary.rejected} skipped, ${summary.queueDepth} left in queue`
    );
  }
}
