import { ContentBlock } from '../interfaces/types';

export const SEPARATOR_WIDTH = 50;
export const MIN_INDEX_WIDTH = 3;
// File names are capped at 255 bytes; this leaves room for the counter and extension
export const MAX_TITLE_BYTES = 200;

/**
 * Text layout and naming of page artifacts
 */
export class ArtifactFormatter {
  /**
   * Render a page as the artifact text:
   * a `Title:` line, a rule of `=`, a blank line, then each block followed by a blank line.
   * Headings are written with one `#` per level.
   */
  static render(title: string, blocks: readonly ContentBlock[]): string {
    const parts = [`Title: ${title}\n`, `${'='.repeat(SEPARATOR_WIDTH)}\n\n`];

    for (const block of blocks) {
      if (block.type === 'heading') {
        parts.push(`${'#'.repeat(block.level)} ${block.text}\n\n`);
      } else {
        parts.push(`${block.text}\n\n`);
      }
    }

    return parts.join('');
  }

  /**
   * Make a title safe to use inside a file name.
   * Whitespace and path separators become underscores, and the result is cut
   * to `MAX_TITLE_BYTES` of UTF-8 at a character boundary.
   */
  static sanitizeTitle(title: string): string {
    const sanitized = title.trim().replace(/[\s/\\]/g, '_');
    return this.truncateBytes(sanitized, MAX_TITLE_BYTES) || 'untitled';
  }

  /**
   * File name for the artifact with the given counter value
   * @example ArtifactFormatter.fileName(7, 'Ankara Kalesi') // '007_Ankara_Kalesi.txt'
   */
  static fileName(index: number, title: string): string {
    return `${String(index).padStart(MIN_INDEX_WIDTH, '0')}_${this.sanitizeTitle(title)}.txt`;
  }

  private static truncateBytes(value: string, maxBytes: number): string {
    let result = '';
    let bytes = 0;
    for (const char of value) {
      bytes += Buffer.byteLength(char, 'utf-8');
      if (bytes > maxBytes) {
        break;
      }
      result += char;
    }
    return result;
  }
}
