/**
 * Link extraction: raw references -> canonical, scoped URLs
 */

import type { DiscoveredLink, ImagePolicy, RefKind, Scope } from "../types.js";
import { decodeText } from "../utils/charset.js";
import { inScope, isIgnoredReference, normalizeUrl } from "../utils/url.js";
import { parseCssRefs } from "./css.js";
import { type RawRef, parseHtmlRefs } from "./html.js";

export type DocumentType = "html" | "css" | "other";

export interface ExtractOptions {
  root: URL;
  scope: Scope;
  /** Follow stylesheets, scripts, media and other non-page references */
  assets: boolean;
  images: ImagePolicy;
}

export interface MalformedRef {
  raw: string;
  message: string;
}

export interface ExtractResult {
  /** In-scope links, one per canonical URL */
  links: DiscoveredLink[];
  /** Canonical URLs that resolved outside the crawl scope */
  outOfScope: string[];
  /** In-scope canonical URLs the asset and image policy does not follow */
  excluded: string[];
  malformed: MalformedRef[];
  parseError?: string;
}

/**
 * Classify a response body; falls back to the URL's extension when the
 * server sent no usable content type.
 */
export function documentType(contentType: string, url: string): DocumentType {
  const mime = contentType.split(";")[0].trim().toLowerCase();
  if (mime === "text/html" || mime === "application/xhtml+xml") return "html";
  if (mime === "text/css") return "css";
  if (mime) return "other";
  const { pathname } = new URL(url);
  if (/\.css$/i.test(pathname)) return "css";
  if (pathname.endsWith("/") || /\.x?html?$/i.test(pathname)) return "html";
  return "other";
}

/** Whether references of this kind are followed under the asset policy */
export function follows(kind: RefKind, options: Pick<ExtractOptions, "assets" | "images">): boolean {
  if (kind === "page") return true;
  if (!options.assets) return false;
  return kind === "asset" || options.images !== "skip";
}

/**
 * Base for resolving a document's references: its <base href> when present
 * and valid, otherwise the URL it was served from.
 */
export function effectiveBase(baseUrl: string, base: string | undefined): string {
  if (!base) return baseUrl;
  const resolved = normalizeUrl(baseUrl, base);
  return resolved.ok ? resolved.href : baseUrl;
}

/**
 * Find the outbound references of an HTML or CSS document. Other content
 * types have none. A parse failure yields whatever was found before it.
 */
export function extractLinks(
  contentType: string,
  bytes: Buffer,
  baseUrl: string,
  options: ExtractOptions,
): ExtractResult {
  const result: ExtractResult = { links: [], outOfScope: [], excluded: [], malformed: [] };
  const type = documentType(contentType, baseUrl);
  if (type === "other") return result;

  const { text } = decodeText(bytes, contentType, type);
  let refs: RawRef[];
  let base = baseUrl;
  if (type === "html") {
    const parsed = parseHtmlRefs(text);
    refs = parsed.refs;
    base = effectiveBase(baseUrl, parsed.base);
    result.parseError = parsed.error;
  } else {
    refs = parseCssRefs(text);
  }

  const byUrl = new Map<string, DiscoveredLink>();
  const outOfScope = new Set<string>();
  const excluded = new Set<string>();
  for (const ref of refs) {
    if (isIgnoredReference(ref.value)) continue;
    const normalized = normalizeUrl(base, ref.value);
    if (!normalized.ok) {
      result.malformed.push({ raw: ref.value, message: normalized.message });
      continue;
    }
    if (!inScope(normalized.url, options.root, options.scope)) {
      if (/^https?:/.test(normalized.url)) outOfScope.add(normalized.url);
      continue;
    }
    if (!follows(ref.kind, options)) {
      excluded.add(normalized.url);
      continue;
    }
    const existing = byUrl.get(normalized.url);
    if (!existing) {
      byUrl.set(normalized.url, { url: normalized.url, href: normalized.href, kind: ref.kind });
    } else if (existing.kind === "page" && ref.kind !== "page") {
      // an asset reference exempts the URL from the depth limit
      existing.kind = ref.kind;
    }
  }

  result.links = [...byUrl.values()];
  result.outOfScope = [...outOfScope];
  // a URL also referenced in a followed way is not excluded
  result.excluded = [...excluded].filter((url) => !byUrl.has(url));
  return result;
}
