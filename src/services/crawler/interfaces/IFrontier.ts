import { AdmissionDecision, FrontierState } from './types';

/**
 * Interface for the crawl frontier.
 * The frontier owns the visited set, the pending queue and the file counter;
 * nothing else mutates them.
 */
export interface IFrontier {
  /**
   * Queue the start URLs. Seeds are checked against the visited set when dequeued, not here.
   */
  seed(urls: string[]): void;

  next(): string | null;

  /**
   * Decide whether a dequeued URL should be crawled. Does not change state.
   */
  evaluate(url: string): AdmissionDecision;

  /**
   * Path of the artifact the next successful page will be written to
   */
  nextArtifactPath(title: string): string;

  /**
   * Record a written page: count the artifact, mark the URL visited and queue its links
   * @param url The crawled URL
   * @param links Raw link targets found on the page
   * @returns The new file count
   */
  recordSuccess(url: string, links: string[]): number;

  /**
   * Mark a URL visited without counting an artifact
   */
  recordEmpty(url: string, links: string[]): void;

  /**
   * Record a failed fetch
   * @returns How many times the URL has failed so far
   */
  recordFailure(url: string): number;

  isBudgetExhausted(): boolean;

  pendingCount(): number;

  fileCount(): number;

  /**
   * Copy of the persistent part of the state
   */
  snapshot(): FrontierState;
}
