import { constants as fsConstants, promises as fs } from 'fs';
import path from 'path';
import { IArtifactWriter } from '../interfaces/IArtifactWriter';
import { ContentBlock } from '../interfaces/types';
import { PersistenceError, describeError } from '../errors';
import { ArtifactFormatter } from '../utils/ArtifactFormatter';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Writes page artifacts as UTF-8 text files under an output directory
 */
export class TextArtifactWriter implements IArtifactWriter {
  private readonly logger = LoggingUtils.createTaggedLogger('writer');

  constructor(private readonly outputDir: string) {}

  async ensureReady(): Promise<void> {
    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.access(this.outputDir, fsConstants.W_OK);
    } catch (error) {
      throw new PersistenceError(
        `Output directory ${this.outputDir} is not writable: ${describeError(error)}`,
        this.outputDir,
        true,
        error
      );
    }
  }

  async write(title: string, blocks: ContentBlock[], destination: string): Promise<void> {
    const text = ArtifactFormatter.render(title, blocks);

    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(destination, text, 'utf-8');
    } catch (error) {
      throw new PersistenceError(`Failed to write ${destination}: ${describeError(error)}`, destination, false, error);
    }

    this.logger.debug(`Wrote ${blocks.length} blocks to ${destination}`);
  }
}
