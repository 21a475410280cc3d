/**
 * Crawling Queue
 * Breadth-first frontier with a seen set scoped to one host
 */

import { EnqueueResult, FrontierEntry } from './crawling.types';
import { isSameDomain } from './url-normalizer';

export class CrawlingQueue {
  private queue: FrontierEntry[] = [];
  private head = 0;
  private seen: Set<string> = new Set();

  constructor(private readonly domain: string) {}

  /**
   * Add URL to the tail of the queue (BFS order).
   * A URL is accepted once per run; off-domain URLs are never accepted.
   */
  enqueue(url: string, depth: number): EnqueueResult {
    if (this.seen.has(url)) {
      return 'seen';
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return 'out_of_scope';
    }
    if (!isSameDomain(parsed, this.domain)) {
      return 'out_of_scope';
    }

    this.seen.add(url);
    this.queue.push({ url, depth });
    return 'enqueued';
  }

  /**
   * Get next entry from the head of the queue (FIFO for BFS).
   * The URL stays in the seen set.
   */
  dequeue(): FrontierEntry | null {
    if (this.head >= this.queue.length) {
      return null;
    }

    const entry = this.queue[this.head];
    this.head++;

    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }

    return entry;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  /**
   * Entries still waiting
   */
  size(): number {
    return this.queue.length - this.head;
  }

  hasSeen(url: string): boolean {
    return this.seen.has(url);
  }

  seenCount(): number {
    return this.seen.size;
  }

  getDomain(): string {
    return this.domain;
  }
}
