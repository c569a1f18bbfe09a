import type { FrontierEntry } from '../../types.js';
import type { VisitedSet } from './visited.js';

const COMPACT_THRESHOLD = 32;

/**
 * FIFO of (url, depth) pairs for one seed. A URL is held at most once at a
 * time, never once it has been visited, and never deeper than `maxDepth`.
 */
export class Frontier {
  private queue: FrontierEntry[] = [];
  private head = 0;
  private readonly queued = new Set<string>();

  constructor(
    private readonly visited: VisitedSet,
    private readonly maxDepth: number,
  ) {}

  enqueueIfNew(url: string, depth: number): boolean {
    if (depth > this.maxDepth || this.queued.has(url) || this.visited.has(url)) {
      return false;
    }

    this.queued.add(url);
    this.queue.push({ url, depth });
    return true;
  }

  dequeue(): FrontierEntry | undefined {
    const next = this.queue[this.head];
    if (!next) {
      return undefined;
    }

    this.head += 1;
    this.queued.delete(next.url);

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }

    return next;
  }

  get pending(): number {
    return this.queue.length - this.head;
  }
}
