import { BaseCrawler } from './BaseCrawler';
import { IArtifactWriter } from '../interfaces/IArtifactWriter';
import { IContentExtractor } from '../interfaces/IContentExtractor';
import { IFetcher } from '../interfaces/IFetcher';
import { IFrontier } from '../interfaces/IFrontier';
import { IProgressReporter } from '../interfaces/IProgressReporter';
import { IStateStore } from '../interfaces/IStateStore';
import { CrawlSummary, CrawlerState, EmptyPagePolicy, PageResult, StepOutcome, StopReason } from '../interfaces/types';
import { FetchError, PersistenceError, describeError } from '../errors';
import { ContentFilter } from '../utils/ContentFilter';
import { UrlUtils } from '../utils/UrlUtils';

export interface StandardCrawlerOptions {
  maxFiles: number;
  fetchTimeoutSeconds: number;
  emptyPagePolicy: EmptyPagePolicy;
}

/**
 * Sequential breadth-first crawler.
 * For each dequeued URL: fetch, extract, filter, write the artifact, then
 * update the frontier and save its state. One page is in flight at a time.
 */
export class StandardCrawler extends BaseCrawler {
  constructor(
    frontier: IFrontier,
    private readonly fetcher: IFetcher,
    private readonly extractor: IContentExtractor,
    private readonly writer: IArtifactWriter,
    private readonly stateStore: IStateStore,
    progressReporter: IProgressReporter,
    private readonly options: StandardCrawlerOptions
  ) {
    super(frontier, progressReporter, options.maxFiles);
  }

  public async crawl(startUrls: string[]): Promise<CrawlSummary> {
    this.logger.info(`Starting crawl with ${startUrls.length} start URLs, budget ${this.options.maxFiles}`);
    this.state = CrawlerState.RUNNING;
    this.resetCounters();

    try {
      // An unusable output directory aborts the run before anything is fetched
      await this.writer.ensureReady();
      this.frontier.seed(startUrls);

      const stopReason = await this.runLoop();
      const summary = this.buildSummary(stopReason);

      this.state = CrawlerState.COMPLETED;
      this.logger.info(
        `Crawl finished (${stopReason}): ${summary.succeeded} pages, ${summary.failed} failures, ${summary.fileCount} files total`
      );
      this.progressReporter.finish?.(summary);
      return summary;
    } catch (error) {
      this.state = CrawlerState.ERROR;
      this.logger.error(`Crawl aborted: ${describeError(error)}`);
      throw error;
    }
  }

  private async runLoop(): Promise<StopReason> {
    for (;;) {
      if (this.state === CrawlerState.STOPPING) {
        return StopReason.STOPPED;
      }
      if (this.frontier.isBudgetExhausted()) {
        return StopReason.BUDGET;
      }

      const url = this.frontier.next();
      if (url === null) {
        return StopReason.EXHAUSTED;
      }

      const outcome = await this.processUrl(url);
      this.recordStep(url, outcome);
    }
  }

  /**
   * Process a single URL
   */
  private async processUrl(url: string): Promise<StepOutcome> {
    const decision = this.frontier.evaluate(url);
    if (!decision.admitted) {
      this.logger.debug(`Skipping ${url}: ${decision.reason}`);
      return 'rejected';
    }

    let page: PageResult;
    try {
      const html = await this.fetcher.fetch(url, this.options.fetchTimeoutSeconds);
      page = this.extractor.extract(html);
    } catch (error) {
      if (error instanceof FetchError) {
        this.logger.warn(`Fetch failed (${error.kind}): ${error.message}`);
      } else {
        this.logger.error(`Extraction failed for ${url}: ${describeError(error)}`);
      }
      this.frontier.recordFailure(url);
      await this.saveState();
      return 'failed';
    }

    if (page.blocks.length === 0 && this.options.emptyPagePolicy === 'skip') {
      this.logger.info(`No article content at ${url}, marking visited without an artifact`);
      this.frontier.recordEmpty(url, page.links);
      await this.saveState();
      return 'empty';
    }

    const title = page.title ?? UrlUtils.titleFromUrl(url) ?? 'Untitled';
    const blocks = ContentFilter.filter(page.blocks);
    const destination = this.frontier.nextArtifactPath(title);

    try {
      await this.writer.write(title, blocks, destination);
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      this.logger.error(error);
      // Rethrows as fatal when the directory itself has become unusable
      await this.writer.ensureReady();
      this.frontier.recordFailure(url);
      await this.saveState();
      return 'failed';
    }

    const fileCount = this.frontier.recordSuccess(url, page.links);
    this.logger.info(`[${fileCount}/${this.options.maxFiles}] ${title} -> ${destination}`);
    await this.saveState();
    return 'written';
  }

  /**
   * Save the frontier. A failure is reported but the in-memory state is kept,
   * so only durability of this step is lost.
   */
  private async saveState(): Promise<void> {
    try {
      await this.stateStore.save(this.frontier.snapshot());
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      this.logger.error(`State not saved, progress since the last save is lost on restart: ${error.message}`);
    }
  }
}
