/**
 * Sitemap.xml parsing utilities
 */

import * as cheerio from "cheerio";
import type { FetcherPool } from "../network/fetch.js";

/**
 * <loc> entries of a sitemap or sitemap index
 */
export function parseSitemap(xml: string): string[] {
  const $ = cheerio.load(xml, { xml: true });
  return $("loc")
    .map((_, el) => $(el).text().trim())
    .get()
    .filter(Boolean);
}

/**
 * Discover URLs from sitemap.xml or sitemap_index.xml
 * Missing or broken sitemaps simply contribute nothing
 */
export async function discoverFromSitemap(
  root: URL,
  pool: FetcherPool,
  signal?: AbortSignal,
): Promise<string[]> {
  const candidates = [
    new URL("/sitemap.xml", root).toString(),
    new URL("/sitemap_index.xml", root).toString(),
  ];
  const found: string[] = [];
  for (const url of candidates) {
    const result = await pool.fetch(url, signal);
    if (result.status !== "success") continue;
    found.push(...parseSitemap(result.body.toString("utf8")));
  }
  return found;
}
