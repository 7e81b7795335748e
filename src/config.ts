/**
 * CLI argument parsing and validation
 */

import path from "node:path";
import minimist from "minimist";
import { type CrawlOptions, DEFAULT_CRAWL_OPTIONS } from "./crawler.js";
import { ConfigError } from "./errors.js";
import type { ImagePolicy, Scope } from "./types.js";
import { safeFilename } from "./utils/filesystem.js";
import { isCrawlable, normalizeUrl } from "./utils/url.js";

export const USAGE =
  "Usage: webmirror <url> [--out <dir>] [--concurrency 4] [--timeout 15000] [--maxRedirects 5] [--maxPages N] [--maxDepth N] [--scope same-origin|same-host-subdomains] [--sitemap] [--no-assets] [--images mirror|placeholder|skip] [--retries 0] [--delayMs 0] [--userAgent <string>] [--referer <url>] [--crawlTimeout <ms>] [--clean] [--verbose] [--quiet]";

const SCOPES: readonly Scope[] = ["same-origin", "same-host-subdomains"];
const IMAGE_POLICIES: readonly ImagePolicy[] = ["mirror", "placeholder", "skip"];

export type MirrorCrawlOptions = Omit<CrawlOptions, "logger" | "transport" | "signal">;

export interface MirrorConfig {
  startUrl: string;
  outDir: string;
  /** Empty the output directory before crawling */
  clean: boolean;
  verbose: boolean;
  quiet: boolean;
  crawl: MirrorCrawlOptions;
}

export function parseArgs(args: string[]): minimist.ParsedArgs {
  return minimist(args, {
    boolean: ["sitemap", "assets", "clean", "verbose", "quiet", "help"],
    string: ["out", "scope", "images", "userAgent", "referer"],
    alias: { h: "help" },
    default: {
      assets: true,
    },
  });
}

function integer(name: string, value: unknown, min: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`--${name} must be an integer >= ${min}, got ${String(value)}`);
  }
  return n;
}

function withDefault(name: string, value: unknown, min: number, fallback: number): number {
  return value === undefined ? fallback : integer(name, value, min);
}

function optional(name: string, value: unknown, min: number): number | undefined {
  return value === undefined ? undefined : integer(name, value, min);
}

function oneOf<T extends string>(name: string, value: unknown, allowed: readonly T[], fallback: T): T {
  if (value === undefined) return fallback;
  const match = allowed.find((option) => option === value);
  if (!match) {
    throw new ConfigError(`--${name} must be one of ${allowed.join(", ")}, got ${String(value)}`);
  }
  return match;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

/**
 * Turn parsed arguments into a validated configuration.
 * Throws ConfigError on anything unusable.
 */
export function resolveConfig(argv: minimist.ParsedArgs, cwd = process.cwd()): MirrorConfig {
  const [start] = argv._;
  if (!start) throw new ConfigError("Missing root URL");

  const root = normalizeUrl(undefined, String(start));
  if (!root.ok || !isCrawlable(root.href)) {
    throw new ConfigError(`Invalid URL provided: ${String(start)}`);
  }

  const host = safeFilename(new URL(root.url).host);
  const out = optionalString(argv.out);
  if (!out && !host) throw new ConfigError("Unable to derive output directory name");
  const outDir = out ? path.resolve(cwd, out) : path.resolve(cwd, "output", host);

  const referer = optionalString(argv.referer);
  if (referer && !normalizeUrl(undefined, referer).ok) {
    throw new ConfigError(`--referer must be an absolute URL, got ${referer}`);
  }

  const d = DEFAULT_CRAWL_OPTIONS;
  return {
    startUrl: root.href,
    outDir,
    clean: Boolean(argv.clean),
    verbose: Boolean(argv.verbose),
    quiet: Boolean(argv.quiet),
    crawl: {
      maxConcurrency: withDefault("concurrency", argv.concurrency, 1, d.maxConcurrency),
      timeoutMs: withDefault("timeout", argv.timeout, 1, d.timeoutMs),
      maxRedirects: withDefault("maxRedirects", argv.maxRedirects, 0, d.maxRedirects),
      maxPages: optional("maxPages", argv.maxPages, 1),
      maxDepth: optional("maxDepth", argv.maxDepth, 0),
      scope: oneOf("scope", argv.scope, SCOPES, d.scope),
      sitemap: Boolean(argv.sitemap),
      assets: argv.assets !== false,
      images: oneOf("images", argv.images, IMAGE_POLICIES, d.images),
      retries: withDefault("retries", argv.retries, 0, d.retries),
      backoffMs: d.backoffMs,
      delayMs: withDefault("delayMs", argv.delayMs, 0, d.delayMs),
      userAgent: optionalString(argv.userAgent),
      referer,
      crawlTimeoutMs: optional("crawlTimeout", argv.crawlTimeout, 1),
    },
  };
}
