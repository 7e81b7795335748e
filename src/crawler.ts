/**
 * Main crawling logic
 */

import path from 'node:path';
import { ConfigError, StorageError, errorMessage } from './errors.js';
import type { FrontierEntry } from './frontier.js';
import { FetcherPool, type Transport } from './network/fetch.js';
import { extractLinks } from './parsers/links.js';
import { discoverFromSitemap } from './parsers/sitemap.js';
import { CrawlState } from './state.js';
import { MirrorStore } from './storage/store.js';
import type {
  CrawlPhase,
  CrawlReport,
  DiscoveredLink,
  FetchSuccess,
  ImagePolicy,
  Scope,
} from './types.js';
import { type Logger, silentLogger } from './utils/logger.js';
import { canonicalOf, canonicalize, inScope, isCrawlable, normalizeUrl } from './utils/url.js';

export interface CrawlOptions {
  maxConcurrency: number;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  maxRedirects: number;
  maxPages?: number;
  maxDepth?: number;
  scope: Scope;
  sitemap: boolean;
  assets: boolean;
  images: ImagePolicy;
  retries: number;
  backoffMs: number;
  delayMs: number;
  userAgent?: string;
  referer?: string;
  /** Stop the whole crawl after this many milliseconds */
  crawlTimeoutMs?: number;
  logger?: Logger;
  transport?: Transport;
  signal?: AbortSignal;
}

export const DEFAULT_CRAWL_OPTIONS: CrawlOptions = {
  maxConcurrency: 4,
  timeoutMs: 15_000,
  maxRedirects: 5,
  scope: 'same-origin',
  sitemap: false,
  assets: true,
  images: 'mirror',
  retries: 0,
  backoffMs: 400,
  delayMs: 0,
};

/**
 * Drives one crawl: Idle -> Running -> Draining -> Done, or straight to Done
 * when stopped. All "is this URL new" decisions go through the frontier
 * owned by this instance's CrawlState.
 */
export class CrawlCoordinator {
  private phase: CrawlPhase = 'idle';
  private started = false;
  private readonly root: URL;
  private readonly rootHref: string;
  private readonly options: CrawlOptions;
  private readonly logger: Logger;
  private readonly state: CrawlState;
  private readonly pool: FetcherPool;
  private readonly store: MirrorStore;
  private readonly controller = new AbortController();
  private readonly stopped: Promise<void>;

  constructor(
    startUrl: string,
    private readonly outDir: string,
    options: Partial<CrawlOptions> = {},
  ) {
    const normalized = normalizeUrl(undefined, startUrl);
    if (!normalized.ok || !isCrawlable(normalized.href)) {
      throw new ConfigError(`Invalid root URL: ${startUrl}`);
    }
    if (options.maxConcurrency !== undefined && !(options.maxConcurrency >= 1)) {
      throw new ConfigError(`maxConcurrency must be at least 1, got ${options.maxConcurrency}`);
    }
    this.root = new URL(normalized.url);
    this.rootHref = normalized.href;
    this.options = { ...DEFAULT_CRAWL_OPTIONS, ...options };
    this.logger = this.options.logger ?? silentLogger;

    const { maxPages, maxDepth, scope } = this.options;
    this.state = new CrawlState({ maxPages, maxDepth });
    this.pool = new FetcherPool({
      maxConcurrency: this.options.maxConcurrency,
      timeoutMs: this.options.timeoutMs,
      maxRedirects: this.options.maxRedirects,
      retries: this.options.retries,
      backoffMs: this.options.backoffMs,
      delayMs: this.options.delayMs,
      userAgent: this.options.userAgent,
      referer: this.options.referer,
      allowRedirect: (url) => inScope(url, this.root, scope),
      claimRedirect: (from, to) => this.claimRedirect(from, to),
      transport: this.options.transport,
    });
    this.store = new MirrorStore({
      root: this.root,
      outDir,
      images: this.options.images,
      isAttempted: (url) => this.state.frontier.hasVisited(url),
    });
    this.stopped = new Promise((resolve) => {
      this.controller.signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  get currentPhase(): CrawlPhase {
    return this.phase;
  }

  /**
   * External stop: no further dispatches, in-flight fetches are aborted.
   * Files already written stay valid.
   */
  stop(reason = 'stopped'): void {
    if (this.controller.signal.aborted) return;
    this.logger.warn(`Stopping crawl: ${reason}`);
    this.phase = 'done';
    this.controller.abort(reason);
  }

  async run(): Promise<CrawlReport> {
    if (this.started) throw new Error('A crawl can only be run once');
    this.started = true;
    const startedAt = Date.now();
    if (this.phase === 'idle') this.phase = 'running';

    const { signal, crawlTimeoutMs } = this.options;
    const onAbort = () => this.stop('aborted by caller');
    if (signal?.aborted) onAbort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer =
      crawlTimeoutMs !== undefined
        ? setTimeout(() => this.stop(`crawl timeout of ${crawlTimeoutMs}ms reached`), crawlTimeoutMs)
        : undefined;

    try {
      this.enqueue([{ url: this.root.href, href: this.rootHref, kind: 'page' }], 0);
      if (this.options.sitemap && !this.controller.signal.aborted) {
        await this.seedFromSitemap();
      }
      await this.loop();
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    for (const entry of this.state.frontier.clear()) {
      this.state.recordSkipped(entry.url, 'cancelled');
    }
    this.phase = 'done';

    const counts = this.state.counts;
    this.logger.info(
      `Crawl finished: ${counts.fetched} fetched, ${counts.failed} failed, ${counts.skipped} skipped`,
    );
    return {
      root: this.root.href,
      outDir: this.outDir,
      phase: this.phase,
      cancelled: this.controller.signal.aborted,
      counts,
      pages: this.state.fetchedPages,
      failed: this.state.failures,
      skipped: this.state.skips,
      durationMs: Date.now() - startedAt,
    };
  }

  /**
   * Keep up to maxConcurrency tasks in flight, refilling as each settles,
   * until the frontier is drained or the crawl is stopped.
   */
  private async loop(): Promise<void> {
    const { frontier } = this.state;
    const running = new Set<Promise<void>>();

    while (!this.controller.signal.aborted) {
      while (running.size < this.options.maxConcurrency) {
        const entry = frontier.pop();
        if (!entry) break;
        const task: Promise<void> = this.process(entry).finally(() => {
          running.delete(task);
          frontier.complete(entry.url);
        });
        running.add(task);
      }
      if (frontier.isDrained()) {
        this.phase = 'draining';
        break;
      }
      await Promise.race([...running, this.stopped]);
    }

    // process() records its own outcome and never rejects
    await Promise.all(running);
  }

  private async process(entry: FrontierEntry): Promise<void> {
    const { signal } = this.controller;
    try {
      const result = await this.pool.fetch(entry.href, signal);
      if (signal.aborted) {
        this.state.recordSkipped(entry.url, 'cancelled');
        return;
      }
      if (result.status === 'aliased') {
        await this.store.persistAlias(entry.url);
        this.state.recordSkipped(entry.url, 'duplicate');
        this.logger.debug(`Duplicate: ${entry.href} redirects to ${result.finalUrl}`);
        return;
      }
      if (result.status !== 'success') {
        this.state.recordFailed({
          url: entry.url,
          kind: result.kind,
          message: result.message,
          statusCode: result.statusCode,
        });
        this.logger.warn(`Skipping ${entry.href}: ${result.message}`);
        return;
      }

      this.discover(result, entry.depth);
      const page = await this.store.persist(result);
      this.state.recordFetched(entry.url, page);
      this.logger.info(`Saved: ${entry.href} -> ${path.relative(this.outDir, page.path)}`);
    } catch (err) {
      const kind = err instanceof StorageError ? 'StorageError' : 'UnexpectedError';
      this.state.recordFailed({ url: entry.url, kind, message: errorMessage(err) });
      this.logger.error(`Failed ${entry.href}: ${errorMessage(err)}`);
    }
  }

  /**
   * Runs the target of every redirect hop through the frontier, so a URL
   * reached by redirect is fetched once however it was found. The loser of
   * a race becomes an alias of the winner's file.
   */
  private claimRedirect(from: string, to: URL): boolean {
    const source = canonicalOf(from);
    const target = canonicalize(to);
    const claim = this.state.claimRedirect(source, target);
    if (claim === 'claimed') this.store.alias(target, source);
    if (claim === 'taken') this.store.alias(source, target);
    return claim !== 'taken';
  }

  private discover(result: FetchSuccess, depth: number): void {
    const extracted = extractLinks(result.contentType, result.body, result.finalUrl, {
      root: this.root,
      scope: this.options.scope,
      assets: this.options.assets,
      images: this.options.images,
    });
    if (extracted.parseError) {
      this.logger.debug(`Partial parse of ${result.url}: ${extracted.parseError}`);
    }
    for (const bad of extracted.malformed) {
      this.state.recordFailed({ url: bad.raw, kind: 'MalformedURL', message: bad.message });
      this.logger.debug(`Malformed reference in ${result.url}: ${bad.raw}`);
    }
    for (const url of extracted.outOfScope) {
      this.state.recordSkipped(url, 'out-of-scope');
    }
    this.enqueue(extracted.links, depth + 1);
    for (const url of extracted.excluded) {
      this.state.recordSkipped(url, 'excluded-by-policy');
    }
  }

  private enqueue(links: DiscoveredLink[], depth: number): void {
    for (const link of links) {
      const outcome = this.state.frontier.push(link, depth);
      if (outcome === 'queued') {
        this.state.clearSkipped(link.url);
      } else if (outcome !== 'seen') {
        this.state.recordSkipped(link.url, outcome);
      }
    }
  }

  private async seedFromSitemap(): Promise<void> {
    const locs = await discoverFromSitemap(this.root, this.pool, this.controller.signal);
    const links: DiscoveredLink[] = [];
    for (const loc of locs) {
      const normalized = normalizeUrl(undefined, loc);
      if (!normalized.ok) {
        this.state.recordFailed({ url: loc, kind: 'MalformedURL', message: normalized.message });
      } else if (!inScope(normalized.url, this.root, this.options.scope)) {
        this.state.recordSkipped(normalized.url, 'out-of-scope');
      } else {
        links.push({ url: normalized.url, href: normalized.href, kind: 'page' });
      }
    }
    this.logger.debug(`Sitemap seeded ${links.length} URLs`);
    this.enqueue(links, 1);
  }
}

/**
 * Mirror a website into outDir and report what happened to every URL found.
 */
export async function crawl(
  startUrl: string,
  outDir: string,
  options: Partial<CrawlOptions> = {},
): Promise<CrawlReport> {
  return new CrawlCoordinator(startUrl, outDir, options).run();
}
