import axios from 'axios';
import { TextDecoder } from 'util';
import { IFetcher } from '../interfaces/IFetcher';
import { FetchError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';

export const DEFAULT_USER_AGENT = 'WikiFrontierCrawler/1.0';

export interface AxiosFetcherOptions {
  userAgent?: string;
  maxRedirects?: number;
}

/**
 * Fetcher implementation using axios.
 * Bodies are decoded as strict UTF-8: invalid byte sequences fail the fetch
 * instead of being replaced.
 */
export class AxiosFetcher implements IFetcher {
  private readonly logger = LoggingUtils.createTaggedLogger('fetcher');
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });
  private readonly userAgent: string;
  private readonly maxRedirects: number;

  constructor(options: AxiosFetcherOptions = {}) {
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
    this.maxRedirects = options.maxRedirects ?? 5;
  }

  async fetch(url: string, timeoutSeconds: number): Promise<string> {
    const startTime = Date.now();
    let body: ArrayBuffer;

    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: timeoutSeconds * 1000,
        maxRedirects: this.maxRedirects,
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'text/html,application/xhtml+xml',
        },
      });
      body = response.data;
    } catch (error) {
      throw this.toFetchError(url, error);
    }

    let html: string;
    try {
      html = this.decoder.decode(body);
    } catch (error) {
      throw new FetchError('decode', url, `Response from ${url} is not valid UTF-8`, null, error);
    }

    this.logger.debug(`Fetched ${url} in ${Date.now() - startTime}ms`);
    return html;
  }

  private toFetchError(url: string, error: unknown): FetchError {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        return new FetchError('httpStatus', url, `HTTP ${status} for ${url}`, status, error);
      }
      const code = error.code ? ` (${error.code})` : '';
      return new FetchError('transport', url, `Request to ${url} failed${code}: ${error.message}`, null, error);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new FetchError('transport', url, `Request to ${url} failed: ${message}`, null, error);
  }
}
