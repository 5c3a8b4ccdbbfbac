import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { IContentExtractor } from '../interfaces/IContentExtractor';
import { ContentBlock, ExtractionOptions, HeadingLevel, PageResult } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';

export const DEFAULT_TITLE_SELECTOR = 'span.mw-page-title-main';
export const DEFAULT_CONTENT_SELECTOR = 'div.mw-content-ltr';

const HEADING_LEVELS: Partial<Record<string, HeadingLevel>> = {
  h1: 1,
  h2: 2,
  h3: 3,
  h4: 4,
  h5: 5,
  h6: 6
};

/**
 * Article extractor for MediaWiki pages, built on Cheerio.
 *
 * Only the top of the article body is read: paragraphs that are direct
 * children of the content container, and headings that sit directly in it or
 * one wrapper deeper (MediaWiki wraps section headings in
 * `<div class="mw-heading">`). Infoboxes, navboxes and reference lists nest
 * deeper and are left out.
 */
export class CheerioExtractor implements IContentExtractor {
  private readonly logger = LoggingUtils.createTaggedLogger('extractor');
  private readonly titleSelector: string;
  private readonly contentSelector: string;

  constructor(options: ExtractionOptions = {}) {
    this.titleSelector = options.titleSelector || DEFAULT_TITLE_SELECTOR;
    this.contentSelector = options.contentSelector || DEFAULT_CONTENT_SELECTOR;
  }

  extract(html: string): PageResult {
    const $ = cheerio.load(html);

    const title = $(this.titleSelector).first().text().trim() || null;
    const container = $(this.contentSelector).first();

    if (container.length === 0) {
      this.logger.debug(`No element matches ${this.contentSelector}`);
      return { title, blocks: [], links: [] };
    }

    const blocks: ContentBlock[] = [];
    const links: string[] = [];

    // One walk over two levels visits candidates in document order
    container.children().each((_, child) => {
      const level = this.headingLevel(child);
      if (level !== null) {
        blocks.push({ type: 'heading', level, text: $(child).text().trim() });
      } else if (child.tagName.toLowerCase() === 'p') {
        this.collectParagraph($, child, blocks, links);
      }

      $(child).children().each((__, grandchild) => {
        const nestedLevel = this.headingLevel(grandchild);
        if (nestedLevel !== null) {
          blocks.push({ type: 'heading', level: nestedLevel, text: $(grandchild).text().trim() });
        }
      });
    });

    this.logger.debug(`Extracted ${blocks.length} blocks and ${links.length} links`, { title });
    return { title, blocks, links };
  }

  private collectParagraph(
    $: cheerio.CheerioAPI,
    paragraph: Element,
    blocks: ContentBlock[],
    links: string[]
  ): void {
    $(paragraph).find('a').each((_, anchor) => {
      const href = $(anchor).attr('href');
      if (href) {
        links.push(href);
      }
    });

    const text = $(paragraph).text().trim();
    if (text) {
      blocks.push({ type: 'paragraph', text });
    }
  }

  private headingLevel(element: Element): HeadingLevel | null {
    return HEADING_LEVELS[element.tagName.toLowerCase()] ?? null;
  }
}
