import { ContentBlock } from './types';

/**
 * Interface for persisting extracted pages
 */
export interface IArtifactWriter {
  /**
   * Check that the output location exists and accepts writes, creating it if needed.
   * Rejects with a fatal `PersistenceError` otherwise.
   */
  ensureReady(): Promise<void>;

  /**
   * Write one page artifact, replacing any existing file at the destination
   * @param title Page title for the header line
   * @param blocks Filtered content blocks
   * @param destination File path of the artifact
   */
  write(title: string, blocks: ContentBlock[], destination: string): Promise<void>;
}
