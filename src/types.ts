/**
 * Shared crawl types
 */

export type Scope = 'same-origin' | 'same-host-subdomains';

export type ImagePolicy = 'mirror' | 'placeholder' | 'skip';

/** What kind of reference pointed at a URL; drives depth and asset policy. */
export type RefKind = 'page' | 'asset' | 'image';

export type FetchStatus =
  | 'success'
  | 'redirect'
  | 'aliased'
  | 'client-error'
  | 'server-error'
  | 'transport-error';

export type FailureKind =
  | 'MalformedURL'
  | 'TransportError'
  | 'HTTPError'
  | 'RedirectLoop'
  | 'RedirectOutOfScope'
  | 'StorageError'
  | 'UnexpectedError';

/**
 * `excluded-by-policy`: an asset or image reference not followed under the
 * asset and image policy. `duplicate`: a URL that redirects to, or is
 * redirected to from, a URL mirrored under another name.
 */
export type SkipReason =
  | 'out-of-scope'
  | 'excluded-by-policy'
  | 'max-pages'
  | 'max-depth'
  | 'duplicate'
  | 'cancelled';

export type CrawlPhase = 'idle' | 'running' | 'draining' | 'done';

export interface FetchSuccess {
  status: 'success';
  url: string;
  finalUrl: string;
  statusCode: number;
  contentType: string;
  body: Buffer;
}

export interface FetchFailure {
  status: Exclude<FetchStatus, 'success' | 'aliased'>;
  url: string;
  finalUrl: string;
  statusCode?: number;
  kind: Exclude<FailureKind, 'MalformedURL' | 'StorageError' | 'UnexpectedError'>;
  message: string;
}

/** Stopped at a redirect hop whose target is fetched by another request */
export interface FetchAliased {
  status: 'aliased';
  url: string;
  /** The already-claimed hop target */
  finalUrl: string;
  statusCode: number;
}

export type FetchResult = FetchSuccess | FetchFailure | FetchAliased;

export interface DiscoveredLink {
  /** Canonical form, used for dedup and storage paths */
  url: string;
  /** Resolved URL without fragment, in the form it was first seen */
  href: string;
  kind: RefKind;
}

export interface MirroredPage {
  url: string;
  path: string;
  contentType: string;
  bytes: number;
}

export interface FailedUrl {
  url: string;
  kind: FailureKind;
  message: string;
  statusCode?: number;
}

export interface SkippedUrl {
  url: string;
  reason: SkipReason;
}

export interface CrawlCounts {
  fetched: number;
  failed: number;
  skipped: number;
  skippedOutOfScope: number;
}

export interface CrawlReport {
  root: string;
  outDir: string;
  phase: CrawlPhase;
  cancelled: boolean;
  counts: CrawlCounts;
  pages: MirroredPage[];
  failed: FailedUrl[];
  skipped: SkippedUrl[];
  durationMs: number;
}
