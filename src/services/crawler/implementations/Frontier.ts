import path from 'path';
import { IFrontier } from '../interfaces/IFrontier';
import { IUrlQueue } from '../interfaces/IUrlQueue';
import { AdmissionDecision, FrontierOptions, FrontierState, RejectReason } from '../interfaces/types';
import { ArtifactFormatter } from '../utils/ArtifactFormatter';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';
import { InMemoryUrlQueue } from './InMemoryUrlQueue';

/**
 * Crawl frontier: the visited set, the pending queue and the artifact counter.
 *
 * A URL is only marked visited once its page was handled; a failed fetch
 * leaves it unvisited so a later rediscovery can retry it, up to
 * `maxFetchAttempts` failures.
 */
export class Frontier implements IFrontier {
  private readonly logger = LoggingUtils.createTaggedLogger('frontier');
  private readonly state: FrontierState;

  constructor(
    initialState: FrontierState,
    private readonly options: FrontierOptions,
    private readonly queue: IUrlQueue = new InMemoryUrlQueue()
  ) {
    this.state = {
      visited: new Set(initialState.visited),
      fileCount: initialState.fileCount,
      failedAttempts: new Map(initialState.failedAttempts),
    };
    for (const url of this.state.visited) {
      this.queue.markVisited(url);
    }
  }

  seed(urls: string[]): void {
    for (const url of urls) {
      const normalized = UrlUtils.normalizeLink(url.trim());
      if (!normalized) {
        this.logger.warn(`Ignoring start URL that is not absolute: ${url}`);
        continue;
      }
      this.queue.add(normalized);
    }
    this.logger.info(`Seeded ${this.queue.size()} URLs`);
  }

  next(): string | null {
    return this.queue.getNext();
  }

  evaluate(url: string): AdmissionDecision {
    if (this.isBudgetExhausted()) {
      return { admitted: false, reason: RejectReason.BUDGET };
    }
    if (this.state.visited.has(url)) {
      return { admitted: false, reason: RejectReason.VISITED };
    }
    if (!UrlUtils.isInScope(url, this.options.siteScope)) {
      return { admitted: false, reason: RejectReason.SCOPE };
    }
    if ((this.state.failedAttempts.get(url) ?? 0) >= this.options.maxFetchAttempts) {
      return { admitted: false, reason: RejectReason.RETRIES };
    }
    return { admitted: true };
  }

  nextArtifactPath(title: string): string {
    return path.join(this.options.outputDir, ArtifactFormatter.fileName(this.state.fileCount + 1, title));
  }

  recordSuccess(url: string, links: string[]): number {
    this.state.fileCount += 1;
    this.markVisited(url);
    this.enqueueLinks(url, links);
    return this.state.fileCount;
  }

  recordEmpty(url: string, links: string[]): void {
    this.markVisited(url);
    this.enqueueLinks(url, links);
  }

  recordFailure(url: string): number {
    const attempts = (this.state.failedAttempts.get(url) ?? 0) + 1;
    this.state.failedAttempts.set(url, attempts);
    if (attempts >= this.options.maxFetchAttempts) {
      this.logger.warn(`Giving up on ${url} after ${attempts} failed attempts`);
    }
    return attempts;
  }

  isBudgetExhausted(): boolean {
    return this.state.fileCount >= this.options.maxFiles;
  }

  pendingCount(): number {
    return this.queue.size();
  }

  fileCount(): number {
    return this.state.fileCount;
  }

  snapshot(): FrontierState {
    return {
      visited: new Set(this.state.visited),
      fileCount: this.state.fileCount,
      failedAttempts: new Map(this.state.failedAttempts),
    };
  }

  private markVisited(url: string): void {
    this.state.visited.add(url);
    this.state.failedAttempts.delete(url);
    this.queue.markVisited(url);
  }

  private enqueueLinks(pageUrl: string, links: string[]): void {
    let queued = 0;
    for (const link of links) {
      const normalized = UrlUtils.normalizeLink(link, pageUrl);
      if (!normalized || this.state.visited.has(normalized)) {
        continue;
      }
      if (!UrlUtils.isInScope(normalized, this.options.siteScope)) {
        continue;
      }
      if (this.queue.add(normalized)) {
        queued++;
      }
    }
    this.logger.debug(`Queued ${queued} of ${links.length} links from ${pageUrl}`);
  }
}
