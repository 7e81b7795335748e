/**
 * HTML reference collection on top of cheerio
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { RefKind } from "../types.js";
import { parseCssRefs } from "./css.js";

interface RefAttribute {
  selector: string;
  attribute: string;
  kind: RefKind;
  srcset?: boolean;
}

/** Every element attribute that can point at another resource we mirror */
const REF_ATTRIBUTES: RefAttribute[] = [
  { selector: "a[href]", attribute: "href", kind: "page" },
  { selector: "area[href]", attribute: "href", kind: "page" },
  { selector: "iframe[src]", attribute: "src", kind: "page" },
  { selector: "frame[src]", attribute: "src", kind: "page" },
  { selector: 'link[rel~="stylesheet"][href]', attribute: "href", kind: "asset" },
  { selector: 'link[rel~="icon"][href]', attribute: "href", kind: "image" },
  { selector: 'link[rel~="apple-touch-icon"][href]', attribute: "href", kind: "image" },
  { selector: 'link[rel~="manifest"][href]', attribute: "href", kind: "asset" },
  { selector: 'link[rel~="preload"][href]', attribute: "href", kind: "asset" },
  { selector: 'link[rel~="modulepreload"][href]', attribute: "href", kind: "asset" },
  { selector: "script[src]", attribute: "src", kind: "asset" },
  { selector: "img[src]", attribute: "src", kind: "image" },
  { selector: "img[srcset]", attribute: "srcset", kind: "image", srcset: true },
  { selector: "source[srcset]", attribute: "srcset", kind: "image", srcset: true },
  { selector: "source[src]", attribute: "src", kind: "asset" },
  { selector: 'input[type="image"][src]', attribute: "src", kind: "image" },
  { selector: "video[poster]", attribute: "poster", kind: "image" },
  { selector: "video[src]", attribute: "src", kind: "asset" },
  { selector: "audio[src]", attribute: "src", kind: "asset" },
  { selector: "track[src]", attribute: "src", kind: "asset" },
  { selector: "embed[src]", attribute: "src", kind: "asset" },
  { selector: "object[data]", attribute: "data", kind: "asset" },
];

export interface HtmlRef {
  value: string;
  kind: RefKind;
  srcset: boolean;
  replace(value: string): void;
}

export interface StyleBlock {
  css: string;
  replace(css: string): void;
}

export interface SrcsetCandidate {
  url: string;
  descriptor: string;
}

export function parseSrcset(value: string): SrcsetCandidate[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      const [url, ...rest] = part.split(/\s+/);
      return { url, descriptor: rest.join(" ") };
    });
}

export function serializeSrcset(candidates: SrcsetCandidate[]): string {
  return candidates
    .map((c) => (c.descriptor ? `${c.url} ${c.descriptor}` : c.url))
    .join(", ");
}

/**
 * Collect each (element, attribute) pair once, even when an element matches
 * several selectors (e.g. rel="preload icon").
 */
export function collectHtmlRefs($: CheerioAPI): HtmlRef[] {
  const refs: HtmlRef[] = [];
  const seen = new Map<unknown, Set<string>>();
  for (const spec of REF_ATTRIBUTES) {
    $(spec.selector).each((_, el) => {
      const done = seen.get(el) ?? new Set<string>();
      if (done.has(spec.attribute)) return;
      done.add(spec.attribute);
      seen.set(el, done);

      const $el = $(el);
      const value = $el.attr(spec.attribute);
      if (value === undefined) return;
      refs.push({
        value,
        kind: spec.kind,
        srcset: spec.srcset ?? false,
        replace: (next) => {
          $el.attr(spec.attribute, next);
        },
      });
    });
  }
  return refs;
}

/** <style> contents and style="" attributes */
export function collectStyleBlocks($: CheerioAPI): StyleBlock[] {
  const blocks: StyleBlock[] = [];
  $("style").each((_, el) => {
    const $el = $(el);
    blocks.push({ css: $el.text(), replace: (css) => $el.text(css) });
  });
  $("[style]").each((_, el) => {
    const $el = $(el);
    const css = $el.attr("style");
    if (css === undefined) return;
    blocks.push({
      css,
      replace: (next) => {
        $el.attr("style", next);
      },
    });
  });
  return blocks;
}

/** Href of the first <base> element, if any */
export function baseHref($: CheerioAPI): string | undefined {
  const href = $("base[href]").first().attr("href");
  return href?.trim() || undefined;
}

export interface RawRef {
  value: string;
  kind: RefKind;
}

export interface ParseResult {
  refs: RawRef[];
  base?: string;
  /** Set when parsing gave up; refs then holds whatever was found */
  error?: string;
}

/**
 * The parse capability: raw href/src strings out of an HTML document.
 * Never throws.
 */
export function parseHtmlRefs(html: string): ParseResult {
  const refs: RawRef[] = [];
  try {
    const $ = cheerio.load(html);
    for (const ref of collectHtmlRefs($)) {
      if (ref.srcset) {
        for (const candidate of parseSrcset(ref.value)) {
          refs.push({ value: candidate.url, kind: ref.kind });
        }
      } else {
        refs.push({ value: ref.value, kind: ref.kind });
      }
    }
    for (const block of collectStyleBlocks($)) {
      refs.push(...parseCssRefs(block.css));
    }
    return { refs, base: baseHref($) };
  } catch (err) {
    return { refs, error: err instanceof Error ? err.message : String(err) };
  }
}
