/**
 * Per-run crawl state owned by the coordinator
 */

import { Frontier, type FrontierOptions } from './frontier.js';
import type {
  CrawlCounts,
  FailedUrl,
  MirroredPage,
  SkipReason,
  SkippedUrl,
} from './types.js';

export type RedirectClaim = 'own' | 'claimed' | 'taken';

/**
 * Frontier plus the terminal record of every URL the crawl has touched.
 * Each URL lands in exactly one of pages, failed or skipped.
 */
export class CrawlState {
  readonly frontier: Frontier;
  private readonly pages = new Map<string, MirroredPage>();
  private readonly failed = new Map<string, FailedUrl>();
  private readonly skipped = new Map<string, SkipReason>();
  private readonly claimedBy = new Map<string, string>();

  constructor(options: FrontierOptions = {}) {
    this.frontier = new Frontier(options);
  }

  recordFetched(url: string, page: MirroredPage): void {
    this.pages.set(url, page);
  }

  recordFailed(failure: FailedUrl): void {
    if (!this.failed.has(failure.url)) this.failed.set(failure.url, failure);
  }

  /**
   * Visited URLs can only be skipped as cancelled or duplicate; anything
   * else keeps the first reason it was skipped for.
   */
  recordSkipped(url: string, reason: SkipReason): void {
    if (this.pages.has(url) || this.failed.has(url) || this.skipped.has(url)) return;
    if (reason !== 'cancelled' && reason !== 'duplicate' && this.frontier.hasVisited(url)) {
      return;
    }
    this.skipped.set(url, reason);
  }

  /**
   * Gate a redirect hop from canonical `source` to canonical `target`.
   * `own`: nothing to claim (same resource, repeat attempt, or a request
   * outside the frontier such as a sitemap lookup). `claimed`: the target
   * now belongs to the source's request. `taken`: another request has it.
   */
  claimRedirect(source: string, target: string): RedirectClaim {
    if (source === target || !this.frontier.hasVisited(source)) return 'own';
    if (this.claimedBy.get(target) === source) return 'own';
    if (!this.frontier.claim(target)) return 'taken';
    this.claimedBy.set(target, source);
    this.recordSkipped(target, 'duplicate');
    return 'claimed';
  }

  /** A URL skipped for depth can still be enqueued later via a shorter path */
  clearSkipped(url: string): void {
    this.skipped.delete(url);
  }

  get counts(): CrawlCounts {
    let skippedOutOfScope = 0;
    for (const reason of this.skipped.values()) {
      if (reason === 'out-of-scope') skippedOutOfScope++;
    }
    return {
      fetched: this.pages.size,
      failed: this.failed.size,
      skipped: this.skipped.size,
      skippedOutOfScope,
    };
  }

  get fetchedPages(): MirroredPage[] {
    return [...this.pages.values()];
  }

  get failures(): FailedUrl[] {
    return [...this.failed.values()];
  }

  get skips(): SkippedUrl[] {
    return [...this.skipped].map(([url, reason]) => ({ url, reason }));
  }
}
