import { IArtifactWriter } from '../interfaces/IArtifactWriter';
import { IContentExtractor } from '../interfaces/IContentExtractor';
import { ICrawler } from '../interfaces/ICrawler';
import { IFetcher } from '../interfaces/IFetcher';
import { IProgressReporter } from '../interfaces/IProgressReporter';
import { IStateStore } from '../interfaces/IStateStore';
import { IUrlQueue } from '../interfaces/IUrlQueue';
import { CrawlOptions, ExtractionOptions } from '../interfaces/types';
import { AxiosFetcher } from '../implementations/AxiosFetcher';
import { CheerioExtractor } from '../implementations/CheerioExtractor';
import { Frontier } from '../implementations/Frontier';
import { InMemoryUrlQueue } from '../implementations/InMemoryUrlQueue';
import { JsonFileStateStore } from '../implementations/JsonFileStateStore';
import { LoggingProgressReporter } from '../implementations/LoggingProgressReporter';
import { StandardCrawler } from '../implementations/StandardCrawler';
import { TextArtifactWriter } from '../implementations/TextArtifactWriter';

/**
 * Collaborators of the crawl loop. Any of them can be replaced, e.g. by test doubles.
 */
export interface CrawlerServices {
  fetcher: IFetcher;
  extractor: IContentExtractor;
  writer: IArtifactWriter;
  stateStore: IStateStore;
  progressReporter: IProgressReporter;
  urlQueue: IUrlQueue;
}

/**
 * Factory wiring crawler services from the crawl options
 */
export class ServiceFactory {
  private readonly services: CrawlerServices;

  /**
   * @param options Options for the crawl
   * @param overrides Implementations to use instead of the defaults
   * @param extraction Selectors for the article extractor
   */
  constructor(
    private readonly options: CrawlOptions,
    overrides: Partial<CrawlerServices> = {},
    extraction: ExtractionOptions = {}
  ) {
    this.services = {
      fetcher: overrides.fetcher ?? new AxiosFetcher({ userAgent: options.userAgent }),
      extractor: overrides.extractor ?? new CheerioExtractor(extraction),
      writer: overrides.writer ?? new TextArtifactWriter(options.outputDir),
      stateStore: overrides.stateStore ?? new JsonFileStateStore(options.stateFile),
      progressReporter: overrides.progressReporter ?? new LoggingProgressReporter(),
      urlQueue: overrides.urlQueue ?? new InMemoryUrlQueue({ dedupe: options.dedupeQueue }),
    };
  }

  /**
   * Load the saved frontier state and build a crawler resuming from it
   */
  async createCrawler(): Promise<ICrawler> {
    const state = await this.services.stateStore.load();
    const frontier = new Frontier(
      state,
      {
        maxFiles: this.options.maxFiles,
        siteScope: this.options.siteScope,
        outputDir: this.options.outputDir,
        maxFetchAttempts: this.options.maxFetchAttempts,
      },
      this.services.urlQueue
    );

    return new StandardCrawler(
      frontier,
      this.services.fetcher,
      this.services.extractor,
      this.services.writer,
      this.services.stateStore,
      this.services.progressReporter,
      {
        maxFiles: this.options.maxFiles,
        fetchTimeoutSeconds: this.options.fetchTimeoutSeconds,
        emptyPagePolicy: this.options.emptyPagePolicy,
      }
    );
  }
}
