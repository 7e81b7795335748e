/**
 * Rewriter/Store: local paths, link rewriting and writes
 */

import { StorageError } from '../errors.js';
import { documentType } from '../parsers/links.js';
import { rewriteHtml } from '../processors/html.js';
import { isPlaceholderCandidate, renderPlaceholder } from '../processors/image.js';
import { rewriteStylesheet } from '../processors/stylesheet.js';
import type { FetchSuccess, ImagePolicy, MirroredPage } from '../types.js';
import { CSS_CHARSET_RE, decodeText } from '../utils/charset.js';
import { writeFileAtomic } from '../utils/filesystem.js';
import {
  canonicalOf,
  isCrawlable,
  isIgnoredReference,
  makeRelative,
  normalizeUrl,
} from '../utils/url.js';
import { PathRegistry } from './paths.js';

const ABSOLUTE_REF = /^[a-z][a-z0-9+.-]*:/i;

export interface StoreOptions {
  root: URL;
  outDir: string;
  images: ImagePolicy;
  /** Whether a canonical URL was enqueued for fetching in this run */
  isAttempted: (url: string) => boolean;
}

export class MirrorStore {
  private readonly paths: PathRegistry;
  private readonly aliases = new Map<string, string>();

  constructor(private readonly options: StoreOptions) {
    this.paths = new PathRegistry(options.root, options.outDir);
  }

  /**
   * Local file for a canonical URL; stable for the lifetime of the store.
   * An alias resolves to the file of the URL it stands for.
   */
  path(url: string): string {
    return this.paths.pathFor(this.resolve(url));
  }

  /**
   * Record that `from` is mirrored by `to`'s file. The first alias of a URL
   * wins, and one that would close a cycle is ignored.
   */
  alias(from: string, to: string): void {
    if (this.aliases.has(from) || this.resolve(to) === from) return;
    this.aliases.set(from, to);
  }

  /**
   * Rewrite the document's references and write it to `path(url)`.
   * Distinct URLs never share a file, so concurrent calls for different
   * URLs do not interfere.
   */
  async persist(result: FetchSuccess): Promise<MirroredPage> {
    const file = this.path(canonicalOf(result.url));
    let data: Buffer | string;
    try {
      data = await this.render(result, file);
      await writeFileAtomic(file, data);
    } catch (err) {
      throw new StorageError(file, err);
    }
    return {
      url: result.url,
      path: file,
      contentType: result.contentType,
      bytes: typeof data === 'string' ? Buffer.byteLength(data) : data.length,
    };
  }

  /**
   * For an aliased URL whose own file would be an HTML page, write a stub
   * there that forwards to the file it is mirrored by, so references
   * rewritten before the alias was known still land. Returns the stub path.
   */
  async persistAlias(url: string): Promise<string | undefined> {
    const own = this.paths.pathFor(url);
    const target = this.path(url);
    if (own === target || !own.endsWith('.html')) return undefined;
    const href = makeRelative(own, target);
    const stub = `<!DOCTYPE html><html><head><meta charset="utf-8"><meta http-equiv="refresh" content="0; url=${href}"><link rel="canonical" href="${href}"></head><body><a href="${href}">${href}</a></body></html>`;
    try {
      await writeFileAtomic(own, stub);
    } catch (err) {
      throw new StorageError(own, err);
    }
    return own;
  }

  /**
   * Replacement for one reference found in the document stored at `fromFile`:
   * a relative path when the target was attempted, otherwise the absolute
   * live URL.
   */
  mapReference(raw: string, base: string, fromFile: string): string | undefined {
    if (isIgnoredReference(raw)) return undefined;
    const normalized = normalizeUrl(base, raw);
    if (!normalized.ok || !isCrawlable(normalized.href)) return undefined;
    if (this.options.isAttempted(normalized.url)) {
      return makeRelative(fromFile, this.path(normalized.url)) + normalized.hash;
    }
    if (ABSOLUTE_REF.test(raw.trim())) return undefined;
    return normalized.href + normalized.hash;
  }

  private resolve(url: string): string {
    let current = url;
    for (let next = this.aliases.get(current); next !== undefined; next = this.aliases.get(current)) {
      current = next;
    }
    return current;
  }

  private async render(result: FetchSuccess, file: string): Promise<Buffer | string> {
    const mapRef = (raw: string, base: string) => this.mapReference(raw, base, file);
    const type = documentType(result.contentType, result.finalUrl);
    if (type === 'html') {
      const { text, encoding } = decodeText(result.body, result.contentType, type);
      return rewriteHtml(text, result.finalUrl, mapRef, { declareUtf8: encoding !== 'utf-8' });
    }
    if (type === 'css') {
      const { text, encoding } = decodeText(result.body, result.contentType, type);
      const css = rewriteStylesheet(text, result.finalUrl, mapRef);
      return encoding === 'utf-8' ? css : css.replace(CSS_CHARSET_RE, '@charset "UTF-8";');
    }
    if (this.options.images === 'placeholder' && isPlaceholderCandidate(result.contentType)) {
      return renderPlaceholder(result.body);
    }
    return result.body;
  }
}
