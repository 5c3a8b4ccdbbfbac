import { IUrlQueue } from '../interfaces/IUrlQueue';

export interface UrlQueueOptions {
  /**
   * Refuse URLs that were queued or visited before.
   * Off by default: a URL may then sit in the queue several times and the
   * extra copies are rejected by the frontier when they are dequeued.
   */
  dedupe?: boolean;
}

/**
 * In-memory FIFO implementation of the URL queue
 */
export class InMemoryUrlQueue implements IUrlQueue {
  private queue: string[] = [];
  private head = 0;
  private readonly seen: Set<string> = new Set();
  private readonly dedupe: boolean;

  constructor(options: UrlQueueOptions = {}) {
    this.dedupe = options.dedupe ?? false;
  }

  add(url: string): boolean {
    if (this.dedupe) {
      if (this.seen.has(url)) {
        return false;
      }
      this.seen.add(url);
    }

    this.queue.push(url);
    return true;
  }

  getNext(): string | null {
    if (this.head >= this.queue.length) {
      return null;
    }

    const url = this.queue[this.head];
    this.head++;

    // Drop the consumed prefix once it dominates the backing array
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }

    return url;
  }

  size(): number {
    return this.queue.length - this.head;
  }

  markVisited(url: string): void {
    if (this.dedupe) {
      this.seen.add(url);
    }
  }
}
