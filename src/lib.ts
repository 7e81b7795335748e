export { CrawlCoordinator, DEFAULT_CRAWL_OPTIONS, crawl, type CrawlOptions } from './crawler.js';
export { ConfigError, StorageError } from './errors.js';
export { Frontier, type FrontierEntry, type FrontierOptions, type PushOutcome } from './frontier.js';
export { FetcherPool, type FetcherOptions, type Transport } from './network/fetch.js';
export { withRetry } from './network/retry.js';
export { extractLinks, type ExtractOptions, type ExtractResult } from './parsers/links.js';
export { parseHtmlRefs, type ParseResult } from './parsers/html.js';
export { MirrorStore, type StoreOptions } from './storage/store.js';
export { PathRegistry, urlToLocalPath } from './storage/paths.js';
export { createConsoleLogger, silentLogger, type Logger } from './utils/logger.js';
export { canonicalize, inScope, normalizeUrl, type NormalizeResult } from './utils/url.js';
export type * from './types.js';
