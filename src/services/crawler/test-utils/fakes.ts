import { IArtifactWriter } from '../interfaces/IArtifactWriter';
import { IFetcher } from '../interfaces/IFetcher';
import { IProgressReporter } from '../interfaces/IProgressReporter';
import { IStateStore } from '../interfaces/IStateStore';
import { ContentBlock, CrawlProgress, CrawlSummary, FrontierState } from '../interfaces/types';
import { FetchError, FetchErrorKind, PersistenceError } from '../errors';
import { ArtifactFormatter } from '../utils/ArtifactFormatter';
import { emptyFrontierState } from '../implementations/JsonFileStateStore';

/**
 * Fetcher serving canned pages. Unknown URLs fail with HTTP 404.
 */
export class FakeFetcher implements IFetcher {
  readonly requests: string[] = [];
  private readonly pages = new Map<string, string>();
  private readonly failures = new Map<string, FetchErrorKind>();

  page(url: string, html: string): this {
    this.pages.set(url, html);
    return this;
  }

  fail(url: string, kind: FetchErrorKind): this {
    this.failures.set(url, kind);
    return this;
  }

  async fetch(url: string): Promise<string> {
    this.requests.push(url);

    const kind = this.failures.get(url);
    if (kind) {
      throw new FetchError(kind, url, `${kind} failure for ${url}`, kind === 'httpStatus' ? 500 : null);
    }

    const html = this.pages.get(url);
    if (html === undefined) {
      throw new FetchError('httpStatus', url, `HTTP 404 for ${url}`, 404);
    }
    return html;
  }
}

/**
 * State store keeping saved states in memory
 */
export class InMemoryStateStore implements IStateStore {
  saves = 0;
  failSaves = false;
  private state: FrontierState;

  constructor(initial: FrontierState = emptyFrontierState()) {
    this.state = initial;
  }

  async load(): Promise<FrontierState> {
    return this.copy(this.state);
  }

  async save(state: FrontierState): Promise<void> {
    if (this.failSaves) {
      throw new PersistenceError('disk full', 'memory://state');
    }
    this.saves++;
    this.state = this.copy(state);
  }

  current(): FrontierState {
    return this.copy(this.state);
  }

  private copy(state: FrontierState): FrontierState {
    return {
      visited: new Set(state.visited),
      fileCount: state.fileCount,
      failedAttempts: new Map(state.failedAttempts),
    };
  }
}

/**
 * Artifact writer rendering into a map keyed by destination
 */
export class InMemoryArtifactWriter implements IArtifactWriter {
  readonly files = new Map<string, string>();
  failingDestinations = new Set<string>();
  unusable = false;

  async ensureReady(): Promise<void> {
    if (this.unusable) {
      throw new PersistenceError('output directory is gone', 'memory://out', true);
    }
  }

  async write(title: string, blocks: ContentBlock[], destination: string): Promise<void> {
    if (this.unusable || this.failingDestinations.has(destination)) {
      throw new PersistenceError(`cannot write ${destination}`, destination);
    }
    this.files.set(destination, ArtifactFormatter.render(title, blocks));
  }
}

export class RecordingProgressReporter implements IProgressReporter {
  readonly events: CrawlProgress[] = [];
  summary: CrawlSummary | null = null;

  report(progress: CrawlProgress): void {
    this.events.push(progress);
  }

  finish(summary: CrawlSummary): void {
    this.summary = summary;
  }
}
