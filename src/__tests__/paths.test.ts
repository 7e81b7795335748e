import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { PathRegistry, urlToLocalPath } from '../storage/paths.js';

const root = new URL('http://ex.com/');
const out = path.join(path.sep, 'out');

describe('urlToLocalPath', () => {
  it('mirrors the URL path structure', () => {
    expect(urlToLocalPath(root, 'http://ex.com/', out)).toBe(path.join(out, 'index.html'));
    expect(urlToLocalPath(root, 'http://ex.com/docs', out)).toBe(path.join(out, 'docs', 'index.html'));
    expect(urlToLocalPath(root, 'http://ex.com/css/site.css', out)).toBe(path.join(out, 'css', 'site.css'));
    expect(urlToLocalPath(root, 'http://ex.com/a/b.html', out)).toBe(path.join(out, 'a', 'b.html'));
  });

  it('replaces unsafe characters', () => {
    expect(urlToLocalPath(root, 'http://ex.com/a%20b/c.html', out)).toBe(path.join(out, 'a_20b', 'c.html'));
  });

  it('keeps other hosts in their own folder', () => {
    expect(urlToLocalPath(root, 'http://blog.ex.com/post', out)).toBe(
      path.join(out, 'blog.ex.com', 'post', 'index.html'),
    );
  });

  it('tags query strings with a hash before the extension', () => {
    const page2 = urlToLocalPath(root, 'http://ex.com/list?page=2', out);
    const page3 = urlToLocalPath(root, 'http://ex.com/list?page=3', out);
    expect(path.relative(out, page2)).toMatch(/^list\/index~q[0-9a-f]{8}\.html$/);
    expect(page2).not.toBe(page3);
    expect(urlToLocalPath(root, 'http://ex.com/list?page=2', out)).toBe(page2);
  });
});

describe('PathRegistry', () => {
  it('returns the same path for the same URL', () => {
    const registry = new PathRegistry(root, out);
    const first = registry.pathFor('http://ex.com/a');
    expect(registry.pathFor('http://ex.com/a')).toBe(first);
  });

  it('gives colliding URLs distinct paths', () => {
    const registry = new PathRegistry(root, out);
    const dir = registry.pathFor('http://ex.com/a');
    const index = registry.pathFor('http://ex.com/a/index.html');
    expect(dir).toBe(path.join(out, 'a', 'index.html'));
    expect(path.relative(out, index)).toMatch(/^a\/index~u[0-9a-f]{8}\.html$/);

    const spaced = registry.pathFor('http://ex.com/x%20y.html');
    const underscored = registry.pathFor('http://ex.com/x_20y.html');
    expect(spaced).not.toBe(underscored);
  });

  it('does not map a file where another URL needs a directory', () => {
    const registry = new PathRegistry(root, out);
    const file = registry.pathFor('http://ex.com/docs/v1.0');
    const nested = registry.pathFor('http://ex.com/docs/v1.0/intro');
    expect(file).toBe(path.join(out, 'docs', 'v1.0'));
    expect(path.relative(out, nested)).toMatch(/^docs\/v1~u[0-9a-f]{8}\.0\/intro\/index\.html$/);
  });

  it('does not map a file onto an existing directory', () => {
    const registry = new PathRegistry(root, out);
    const nested = registry.pathFor('http://ex.com/docs/v1.0/intro');
    const file = registry.pathFor('http://ex.com/docs/v1.0');
    expect(nested).toBe(path.join(out, 'docs', 'v1.0', 'intro', 'index.html'));
    expect(path.relative(out, file)).toMatch(/^docs\/v1~u[0-9a-f]{8}\.0$/);
    expect(registry.pathFor('http://ex.com/docs/v1.0/other')).toBe(
      path.join(out, 'docs', 'v1.0', 'other', 'index.html'),
    );
  });
});
