/**
 * Interface for the pending URL queue.
 * URLs come out in the order they went in.
 */
export interface IUrlQueue {
  /**
   * Append a URL to the back of the queue
   * @returns False when the queue refused the URL as a duplicate
   */
  add(url: string): boolean;

  /**
   * Remove and return the front URL
   * @returns The URL, or null if the queue is empty
   */
  getNext(): string | null;

  size(): number;

  /**
   * Tell the queue a URL was crawled, so duplicate suppression can refuse it later
   */
  markVisited(url: string): void;
}
