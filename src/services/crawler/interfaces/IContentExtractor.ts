import { PageResult } from './types';

/**
 * Interface for content extraction strategies.
 * Implementations turn page markup into a title, ordered content blocks
 * and the raw link targets found in the article body.
 */
export interface IContentExtractor {
  /**
   * Extract the article from page markup
   * @param html Markup of the page
   * @returns Title, blocks and links; empty blocks and links when the article body is missing
   */
  extract(html: string): PageResult;
}
