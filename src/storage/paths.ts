/**
 * URL -> local file mapping
 */

import { createHash } from 'node:crypto';
import path from 'node:path';
import { safeFilename, safeSegment } from '../utils/filesystem.js';

function hash8(value: string): string {
  return createHash('sha1').update(value).digest('hex').slice(0, 8);
}

/** Insert a suffix before the file extension */
function withSuffix(file: string, suffix: string): string {
  const ext = path.extname(file);
  return ext ? `${file.slice(0, -ext.length)}${suffix}${ext}` : `${file}${suffix}`;
}

/**
 * Map a canonical URL to a local file path inside outDir, mirroring its
 * structure: "/" and extensionless paths become ".../index.html", other
 * hosts get their own subfolder, a query adds "~q<hash>" before the extension.
 */
export function urlToLocalPath(root: URL, target: string | URL, outDir: string): string {
  const url = new URL(target);
  const segments = url.pathname.split('/').slice(1);
  const last = segments.pop() ?? '';
  const dirs = segments.map(safeSegment);

  let name = 'index.html';
  if (last && /\.[a-z0-9]+$/i.test(last)) name = safeSegment(last);
  else if (last) dirs.push(safeSegment(last));

  if (url.search) name = withSuffix(name, `~q${hash8(url.search)}`);

  const hostDir = url.host === root.host ? [] : [safeFilename(url.host)];
  return path.join(outDir, ...hostDir, ...dirs, name);
}

/**
 * Run-scoped URL -> path assignments. The structural mapping can fold
 * distinct URLs onto one file (character replacement, "/a" vs "/a/index.html")
 * or make one URL's file another's directory ("/v1.0" vs "/v1.0/intro").
 * Later claimants get a "~u<hash>" suffix on the clashing component, which
 * no structural path contains.
 */
export class PathRegistry {
  private readonly byUrl = new Map<string, string>();
  private readonly owners = new Map<string, string>();
  /** Every directory some owned file lives under, outDir excluded */
  private readonly dirs = new Set<string>();

  constructor(
    private readonly root: URL,
    private readonly outDir: string,
  ) {}

  pathFor(url: string): string {
    const known = this.byUrl.get(url);
    if (known) return known;

    const tag = `~u${hash8(url)}`;
    let candidate = urlToLocalPath(this.root, url, this.outDir);
    for (let n = 1; ; n++) {
      const clashing = this.clash(candidate);
      if (!clashing) break;
      const suffix = n === 1 ? tag : `-${n}`;
      candidate = withSuffix(clashing, suffix) + candidate.slice(clashing.length);
    }

    this.owners.set(candidate, url);
    for (let dir = path.dirname(candidate); this.isUnderOutDir(dir); dir = path.dirname(dir)) {
      this.dirs.add(dir);
    }
    this.byUrl.set(url, candidate);
    return candidate;
  }

  /**
   * The component of `file` that cannot be created: the file itself when it
   * is already owned or used as a directory, else the nearest parent
   * directory that is an owned file.
   */
  private clash(file: string): string | undefined {
    if (this.owners.has(file) || this.dirs.has(file)) return file;
    for (let dir = path.dirname(file); this.isUnderOutDir(dir); dir = path.dirname(dir)) {
      if (this.owners.has(dir)) return dir;
    }
    return undefined;
  }

  private isUnderOutDir(dir: string): boolean {
    const rel = path.relative(this.outDir, dir);
    return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
  }
}
