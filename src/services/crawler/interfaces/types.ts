/**
 * Common types and enums for the crawler service
 */

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeadingBlock {
  readonly type: 'heading';
  readonly level: HeadingLevel;
  readonly text: string;
}

export interface ParagraphBlock {
  readonly type: 'paragraph';
  readonly text: string;
}

/**
 * A unit of article content, in the document order of its source element
 */
export type ContentBlock = HeadingBlock | ParagraphBlock;

/**
 * Result of extracting one page
 */
export interface PageResult {
  title: string | null;
  blocks: ContentBlock[];
  /** Raw `href` values, verbatim and in document order */
  links: string[];
}

/**
 * Selectors locating the article parts of a page
 */
export interface ExtractionOptions {
  titleSelector?: string;
  contentSelector?: string;
}

/**
 * Frontier state that survives restarts
 */
export interface FrontierState {
  visited: Set<string>;
  fileCount: number;
  failedAttempts: Map<string, number>;
}

/**
 * What to do with a page whose content container is missing or empty.
 * `write` stores a header-only artifact and counts it; `skip` only marks the URL visited.
 */
export type EmptyPagePolicy = 'write' | 'skip';

export interface FrontierOptions {
  maxFiles: number;
  /** Substring a URL's host must contain to be crawled */
  siteScope: string;
  outputDir: string;
  maxFetchAttempts: number;
}

export enum RejectReason {
  VISITED = 'visited',
  BUDGET = 'budget',
  SCOPE = 'scope',
  RETRIES = 'retries'
}

export type AdmissionDecision =
  | { admitted: true }
  | { admitted: false; reason: RejectReason };

/**
 * Options for crawling
 */
export interface CrawlOptions extends FrontierOptions {
  startUrls: string[];
  fetchTimeoutSeconds: number;
  userAgent: string;
  dedupeQueue: boolean;
  emptyPagePolicy: EmptyPagePolicy;
  stateFile: string;
}

export enum CrawlerState {
  IDLE = 'idle',
  RUNNING = 'running',
  STOPPING = 'stopping',
  COMPLETED = 'completed',
  ERROR = 'error'
}

export enum StopReason {
  /** The page budget was reached */
  BUDGET = 'budget',
  /** The pending queue ran dry */
  EXHAUSTED = 'exhausted',
  /** stop() was called */
  STOPPED = 'stopped'
}

export type StepOutcome = 'written' | 'empty' | 'rejected' | 'failed';

/**
 * Progress event emitted after every crawl step
 */
export interface CrawlProgress {
  pagesCompleted: number;
  totalBudget: number;
  queueDepth: number;
  attempted: number;
  url: string;
  outcome: StepOutcome;
}

export interface CrawlSummary {
  stopReason: StopReason;
  attempted: number;
  succeeded: number;
  failed: number;
  rejected: number;
  fileCount: number;
  queueDepth: number;
}
