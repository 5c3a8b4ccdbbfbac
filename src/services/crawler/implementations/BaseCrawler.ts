import { ICrawler } from '../interfaces/ICrawler';
import { IFrontier } from '../interfaces/IFrontier';
import { IProgressReporter } from '../interfaces/IProgressReporter';
import { CrawlProgress, CrawlSummary, CrawlerState, StepOutcome, StopReason } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';

interface StepCounters {
  attempted: number;
  succeeded: number;
  failed: number;
  rejected: number;
}

/**
 * Abstract base class for crawler implementations.
 * Holds the run state, step counters and progress reporting shared by all crawl loops.
 */
export abstract class BaseCrawler implements ICrawler {
  protected state: CrawlerState = CrawlerState.IDLE;
  protected logger = LoggingUtils.createTaggedLogger('crawler');
  protected counters: StepCounters = { attempted: 0, succeeded: 0, failed: 0, rejected: 0 };
  private lastProgress: CrawlProgress | null = null;

  /**
   * @param frontier Frontier deciding what to crawl next
   * @param progressReporter Observer notified after each step
   * @param maxFiles Page budget, reported as the progress total
   */
  constructor(
    protected readonly frontier: IFrontier,
    protected readonly progressReporter: IProgressReporter,
    protected readonly maxFiles: number
  ) {}

  abstract crawl(startUrls: string[]): Promise<CrawlSummary>;

  /**
   * Stop after the page in flight. The frontier state saved so far lets a later run resume.
   */
  stop(): void {
    if (this.state === CrawlerState.RUNNING) {
      this.logger.info('Stopping crawler after the current page');
      this.state = CrawlerState.STOPPING;
    } else {
      this.logger.warn(`Cannot stop crawler in state: ${this.state}`);
    }
  }

  getProgress(): CrawlProgress | null {
    return this.lastProgress;
  }

  protected resetCounters(): void {
    this.counters = { attempted: 0, succeeded: 0, failed: 0, rejected: 0 };
    this.lastProgress = null;
  }

  /**
   * Count a finished step and notify the progress reporter
   */
  protected recordStep(url: string, outcome: StepOutcome): void {
    switch (outcome) {
      case 'written':
      case 'empty':
        this.counters.attempted++;
        this.counters.succeeded++;
        break;
      case 'failed':
        this.counters.attempted++;
        this.counters.failed++;
        break;
      case 'rejected':
        this.counters.rejected++;
        break;
    }

    this.lastProgress = {
      pagesCompleted: this.frontier.fileCount(),
      totalBudget: this.maxFiles,
      queueDepth: this.frontier.pendingCount(),
      attempted: this.counters.attempted,
      url,
      outcome,
    };
    this.progressReporter.report(this.lastProgress);
  }

  protected buildSummary(stopReason: StopReason): CrawlSummary {
    return {
      stopReason,
      ...this.counters,
      fileCount: this.frontier.fileCount(),
      queueDepth: this.frontier.pendingCount(),
    };
  }
}
