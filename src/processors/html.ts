/**
 * HTML rewriting
 */

import * as cheerio from "cheerio";
import {
  baseHref,
  collectHtmlRefs,
  collectStyleBlocks,
  parseSrcset,
  serializeSrcset,
} from "../parsers/html.js";
import { effectiveBase } from "../parsers/links.js";
import { type RefMapper, rewriteStylesheet } from "./stylesheet.js";

export interface RewriteHtmlOptions {
  /** Replace the document's charset declaration; the output is written as UTF-8 */
  declareUtf8?: boolean;
}

function declareUtf8($: cheerio.CheerioAPI): void {
  $("meta[charset]").remove();
  $("meta[http-equiv]")
    .filter((_, el) => ($(el).attr("http-equiv") ?? "").toLowerCase() === "content-type")
    .remove();
  $("head").prepend('<meta charset="utf-8">');
}

/**
 * Rewrite every resource reference in a document through `mapRef`:
 * attributes, srcset candidates, <style> blocks and style="" attributes.
 * A <base href> is honoured for resolution and then dropped, since the
 * rewritten references are relative to the local file.
 */
export function rewriteHtml(
  html: string,
  baseUrl: string,
  mapRef: RefMapper,
  options: RewriteHtmlOptions = {},
): string {
  const $ = cheerio.load(html);
  const base = effectiveBase(baseUrl, baseHref($));
  $("base").remove();
  if (options.declareUtf8) declareUtf8($);

  for (const ref of collectHtmlRefs($)) {
    if (ref.srcset) {
      const candidates = parseSrcset(ref.value).map((c) => ({
        ...c,
        url: mapRef(c.url, base) ?? c.url,
      }));
      ref.replace(serializeSrcset(candidates));
      continue;
    }
    const next = mapRef(ref.value, base);
    if (next !== undefined) ref.replace(next);
  }

  for (const block of collectStyleBlocks($)) {
    const css = rewriteStylesheet(block.css, base, mapRef);
    if (css !== block.css) block.replace(css);
  }

  return $.html();
}
