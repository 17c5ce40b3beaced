/**
 * QueueManager holds the crawl frontier and the visited set
 *
 * The frontier is FIFO, giving breadth-first order. Only the crawl
 * coordinator calls into it, so each operation is a single step.
 */

/**
 * Queue item representing a URL to be crawled
 */
export interface QueueItem {
  /** URL to crawl */
  url: string;

  /** Links followed from a seed to reach this URL */
  depth: number;

  /** URL that linked to this URL; empty for seeds */
  parentUrl: string;
}

export class QueueManager {
  /** URLs queued for processing */
  private queue: QueueItem[] = [];
  private head = 0;

  /** URLs in the queue, for duplicate checks */
  private queued = new Set<string>();

  /** URLs a fetch was attempted for, or that a redirect landed on */
  private visited = new Set<string>();

  private maxDepthReached = 0;

  /**
   * Queue a URL unless it is already queued or visited
   */
  addUrl(url: string, depth: number, parentUrl: string): boolean {
    if (this.visited.has(url) || this.queued.has(url)) {
      return false;
    }
    this.queue.push({ url, depth, parentUrl });
    this.queued.add(url);
    return true;
  }

  /**
   * Take the oldest queued URL
   */
  next(): QueueItem | undefined {
    if (this.head >= this.queue.length) {
      return undefined;
    }
    const item = this.queue[this.head++];
    this.queued.delete(item.url);

    // Drop the consumed prefix once it dominates the array
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  /**
   * Mark a URL visited; false when it already was
   */
  claim(url: string, depth = 0): boolean {
    if (this.visited.has(url)) {
      return false;
    }
    this.visited.add(url);
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    return true;
  }

  markVisited(url: string): void {
    this.visited.add(url);
    this.queued.delete(url);
  }

  getStats(): { queued: number; visited: number; maxDepthReached: number } {
    return {
      queued: this.queue.length - this.head,
      visited: this.visited.size,
      maxDepthReached: this.maxDepthReached
    };
  }
}
