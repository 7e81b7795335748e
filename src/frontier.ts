/**
 * Breadth-first work queue deduplicated against the visited set
 */

import type { DiscoveredLink, RefKind } from './types.js';

export interface FrontierEntry {
  url: string;
  href: string;
  depth: number;
  kind: RefKind;
}

export type PushOutcome = 'queued' | 'seen' | 'max-pages' | 'max-depth';

export interface FrontierOptions {
  /** Upper bound on URLs ever enqueued, root included */
  maxPages?: number;
  /** Deepest page link followed; asset references are exempt */
  maxDepth?: number;
}

/**
 * Holds the visited set, the FIFO queue and the in-flight set.
 *
 * `push` does its membership test and insertion in one synchronous step, so
 * two concurrent tasks resuming on the event loop can never both see a URL
 * as new.
 */
export class Frontier {
  private readonly queue: FrontierEntry[] = [];
  private readonly visited = new Set<string>();
  private readonly inFlight = new Set<string>();

  constructor(private readonly options: FrontierOptions = {}) {}

  push(link: DiscoveredLink, depth: number): PushOutcome {
    if (this.visited.has(link.url)) return 'seen';
    const { maxDepth, maxPages } = this.options;
    if (link.kind === 'page' && maxDepth !== undefined && depth > maxDepth) return 'max-depth';
    if (maxPages !== undefined && this.visited.size >= maxPages) return 'max-pages';
    this.visited.add(link.url);
    this.queue.push({ url: link.url, href: link.href, depth, kind: link.kind });
    return 'queued';
  }

  /**
   * Mark a URL visited without queueing it, for a redirect target reached
   * by a request already in flight. False when it was already visited.
   */
  claim(url: string): boolean {
    if (this.visited.has(url)) return false;
    this.visited.add(url);
    return true;
  }

  /** Next URL in enqueue order; it counts as in flight until `complete` */
  pop(): FrontierEntry | undefined {
    const entry = this.queue.shift();
    if (entry) this.inFlight.add(entry.url);
    return entry;
  }

  complete(url: string): void {
    this.inFlight.delete(url);
  }

  /** Whether the URL was ever enqueued, i.e. an attempt was or will be made */
  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  /** Empty queue and nothing in flight that could still enqueue more */
  isDrained(): boolean {
    return this.queue.length === 0 && this.inFlight.size === 0;
  }

  /** Remove and return everything still queued */
  clear(): FrontierEntry[] {
    return this.queue.splice(0, this.queue.length);
  }

  get pending(): number {
    return this.queue.length;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get visitedCount(): number {
    return this.visited.size;
  }
}
