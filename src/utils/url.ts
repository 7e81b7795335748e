/**
 * URL manipulation utilities
 */

import path from 'node:path';
import type { Scope } from '../types.js';

export type NormalizeResult =
  | {
      ok: true;
      /** Canonical form: no fragment, no empty query, no trailing slash except on "/" */
      url: string;
      /** Resolved href with the fragment stripped but the path left as written */
      href: string;
      /** Fragment including "#", or "" */
      hash: string;
    }
  | { ok: false; raw: string; message: string };

const CRAWLABLE_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Schemes that never name a fetchable resource; references using them are
 * neither crawled nor rewritten.
 */
const IGNORED_SCHEMES = /^(?:mailto|tel|javascript|data|blob|about|sms):/i;

export function isIgnoredReference(raw: string): boolean {
  const ref = raw.trim();
  return !ref || ref.startsWith('#') || IGNORED_SCHEMES.test(ref);
}

/**
 * Canonical string for an already-parsed URL.
 * Scheme and host are lower-cased and default ports dropped by the URL parser.
 */
export function canonicalize(input: URL): string {
  const url = new URL(input.href);
  url.hash = '';
  if (!url.search) url.search = '';
  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '') || '/';
  }
  return url.href;
}

/** Canonical form of an absolute URL string, or the string itself if unparseable */
export function canonicalOf(url: string): string {
  const normalized = normalizeUrl(undefined, url);
  return normalized.ok ? normalized.url : url;
}

/**
 * Resolve a raw reference against a base URL and canonicalize it.
 * Never throws: unparseable references come back as `{ ok: false }`.
 */
export function normalizeUrl(base: string | URL | undefined, raw: string): NormalizeResult {
  let url: URL;
  try {
    url = base === undefined ? new URL(raw.trim()) : new URL(raw.trim(), base);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, raw, message };
  }
  const hash = url.hash;
  url.hash = '';
  return { ok: true, url: canonicalize(url), href: url.href, hash };
}

export function isCrawlable(url: string | URL): boolean {
  try {
    return CRAWLABLE_PROTOCOLS.has((typeof url === 'string' ? new URL(url) : url).protocol);
  } catch {
    return false;
  }
}

/**
 * True when the URL belongs to the crawl's scope.
 * "same-origin" compares scheme, host and port; "same-host-subdomains"
 * accepts the root host and any of its subdomains over http or https.
 */
export function inScope(url: string | URL, root: URL, scope: Scope = 'same-origin'): boolean {
  let target: URL;
  try {
    target = typeof url === 'string' ? new URL(url) : url;
  } catch {
    return false;
  }
  if (!CRAWLABLE_PROTOCOLS.has(target.protocol)) return false;
  if (scope === 'same-origin') return target.origin === root.origin;
  return target.hostname === root.hostname || target.hostname.endsWith(`.${root.hostname}`);
}

/**
 * Create a relative path from one file to another
 * Ensures the result starts with ./ for consistency
 */
export function makeRelative(fromFile: string, toFile: string): string {
  let rel = path.relative(path.dirname(fromFile), toFile);
  if (!rel.startsWith('.')) rel = `./${rel}`;
  return rel.replace(/\\/g, '/');
}
