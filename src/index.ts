#!/usr/bin/env node
/**
 * webmirror
 *
 * A TypeScript CLI to mirror a website to a local folder.
 * - Crawls same-origin (or same-host-and-subdomain) links breadth-first,
 *   optionally seeded from sitemap.xml
 * - Fetches with bounded concurrency, per-request timeouts and a redirect cap
 * - Saves pages in a hierarchical directory structure (path/to/page/index.html)
 * - Mirrors stylesheets, scripts and media, rewriting references to local
 *   relative paths; links it did not fetch point at the live site
 * - Images can be mirrored, swapped for same-size local placeholders (sharp),
 *   or left remote
 *
 * Usage:
 *   webmirror <url> [--out dir] [--concurrency 4] [--maxPages 500]
 *     [--images mirror|placeholder|skip] [--sitemap] [--no-assets]
 *
 * Library use:
 *   import { crawl } from 'webmirror';
 */

import { runCLI } from './cli.js';

runCLI()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
