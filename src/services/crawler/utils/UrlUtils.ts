import { URL } from 'url';

/**
 * Utilities for handling URLs in the crawler service
 */
export class UrlUtils {
  /**
   * Turns a raw `href` into a crawlable absolute URL.
   *
   * Root-relative paths are joined onto `scheme://host` of the page they were
   * found on, without resolving `.` or `..` segments. Absolute `http(s)` URLs
   * pass through unchanged. Fragments, protocol-relative and relative paths
   * and other schemes (`mailto:`, `javascript:`) are dropped.
   *
   * @param href The raw link target
   * @param baseUrl URL of the page the link was found on
   * @returns The absolute URL, or null when the link is not followed
   */
  static normalizeLink(href: string, baseUrl?: string): string | null {
    if (!href || href.startsWith('#')) {
      return null;
    }

    if (href.startsWith('//')) {
      return null;
    }

    if (href.startsWith('/')) {
      if (!baseUrl) {
        return null;
      }
      const root = this.getRootUrl(baseUrl);
      return root ? `${root}${href}` : null;
    }

    if (href.startsWith('http')) {
      return href;
    }

    return null;
  }

  /**
   * Checks whether a URL belongs to the crawled site
   * @param url The URL to check
   * @param siteScope Substring the host must contain
   */
  static isInScope(url: string, siteScope: string): boolean {
    const host = this.extractDomain(url);
    return host !== null && host.length > 0 && host.includes(siteScope);
  }

  /**
   * Extracts the host name from a URL
   * @returns The host name or null if the URL is invalid
   */
  static extractDomain(url: string): string | null {
    try {
      return new URL(url).hostname;
    } catch (error) {
      return null;
    }
  }

  /**
   * Gets `scheme://host[:port]` from a URL
   * @returns The root URL, or null if the URL cannot be parsed
   */
  static getRootUrl(url: string): string | null {
    try {
      const parsedUrl = new URL(url);
      return `${parsedUrl.protocol}//${parsedUrl.host}`;
    } catch (error) {
      return null;
    }
  }

  /**
   * Readable page name from the last path segment, used when a page has no title
   * @example UrlUtils.titleFromUrl('https://tr.wikipedia.org/wiki/T%C3%BCrkiye') // 'Türkiye'
   */
  static titleFromUrl(url: string): string | null {
    try {
      const segments = new URL(url).pathname.split('/').filter(Boolean);
      const last = segments[segments.length - 1];
      if (!last) {
        return null;
      }
      return decodeURIComponent(last).replace(/_/g, ' ').trim() || null;
    } catch (error) {
      return null;
    }
  }
}
