import { ContentBlock } from '../interfaces/types';

/**
 * Post-processing of extracted content blocks
 */
export class ContentFilter {
  /**
   * Drops headings that introduce no text: a heading survives only when a
   * paragraph follows it before the next heading or the end of the list.
   * Paragraphs are always kept and the relative order is unchanged.
   *
   * @example
   * ContentFilter.filter([h1('A'), h2('B'), p('x')]) // [h2('B'), p('x')]
   */
  static filter(blocks: readonly ContentBlock[]): ContentBlock[] {
    // Walk backwards so each heading knows whether its section has a paragraph
    const keep: boolean[] = new Array<boolean>(blocks.length);
    let paragraphAhead = false;

    for (let i = blocks.length - 1; i >= 0; i--) {
      if (blocks[i].type === 'paragraph') {
        keep[i] = true;
        paragraphAhead = true;
      } else {
        keep[i] = paragraphAhead;
        paragraphAhead = false;
      }
    }

    return blocks.filter((_, index) => keep[index]);
  }
}
