import { describe, expect, it } from 'vitest';
import { canonicalize, inScope, isIgnoredReference, makeRelative, normalizeUrl } from '../utils/url.js';

function canonical(base: string | undefined, raw: string): string {
  const result = normalizeUrl(base, raw);
  if (!result.ok) throw new Error(`expected ${raw} to normalize`);
  return result.url;
}

describe('normalizeUrl', () => {
  it('lower-cases scheme and host, drops default port, fragment and trailing slash', () => {
    const result = normalizeUrl(undefined, 'HTTP://Example.COM:80/a/#frag');
    expect(result).toEqual({
      ok: true,
      url: 'http://example.com/a',
      href: 'http://example.com/a/',
      hash: '#frag',
    });
  });

  it('resolves relative references against the base', () => {
    expect(canonical('http://ex.com/dir/page', '../x?q=1')).toBe('http://ex.com/x?q=1');
    expect(canonical('http://ex.com/dir/', 'sub/')).toBe('http://ex.com/dir/sub');
    expect(canonical('http://ex.com/dir/page', '//cdn.ex.com/lib.js')).toBe('http://cdn.ex.com/lib.js');
  });

  it('keeps the root path and drops an empty query', () => {
    expect(canonical(undefined, 'http://ex.com')).toBe('http://ex.com/');
    expect(canonical(undefined, 'http://ex.com/a?')).toBe('http://ex.com/a');
    expect(canonical(undefined, 'https://ex.com:443/')).toBe('https://ex.com/');
  });

  it('treats fragment and trailing-slash variants as one URL', () => {
    const variants = ['http://ex.com/docs', 'http://ex.com/docs/', 'http://ex.com/docs#intro'];
    expect(new Set(variants.map((v) => canonical(undefined, v)))).toEqual(
      new Set(['http://ex.com/docs']),
    );
  });

  it('is idempotent', () => {
    const inputs = [
      'HTTP://Ex.com:80/a/b/?x=1#y',
      'https://ex.com/',
      'http://ex.com/a%20b/',
      'http://ex.com:8080/path/?',
      'http://ex.com//double//',
    ];
    for (const input of inputs) {
      const once = canonical(undefined, input);
      expect(canonical(undefined, once)).toBe(once);
    }
  });

  it('reports malformed references instead of throwing', () => {
    const result = normalizeUrl('http://ex.com/', 'http://[::1');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.raw).toBe('http://[::1');
  });
});

describe('canonicalize', () => {
  it('does not modify its argument', () => {
    const url = new URL('http://ex.com/a/#x');
    expect(canonicalize(url)).toBe('http://ex.com/a');
    expect(url.href).toBe('http://ex.com/a/#x');
  });
});

describe('inScope', () => {
  const root = new URL('http://ex.com/');

  it('compares origins for same-origin scope', () => {
    expect(inScope('http://ex.com/a', root)).toBe(true);
    expect(inScope('https://ex.com/a', root)).toBe(false);
    expect(inScope('http://ex.com:8080/a', root)).toBe(false);
    expect(inScope('http://blog.ex.com/a', root)).toBe(false);
  });

  it('admits subdomains for same-host-subdomains scope', () => {
    expect(inScope('http://blog.ex.com/a', root, 'same-host-subdomains')).toBe(true);
    expect(inScope('https://ex.com/a', root, 'same-host-subdomains')).toBe(true);
    expect(inScope('http://notex.com/', root, 'same-host-subdomains')).toBe(false);
  });

  it('rejects non-http schemes and garbage', () => {
    expect(inScope('mailto:me@ex.com', root)).toBe(false);
    expect(inScope('not a url', root)).toBe(false);
  });
});

describe('isIgnoredReference', () => {
  it('ignores fragments, empty values and non-fetchable schemes', () => {
    expect(isIgnoredReference('')).toBe(true);
    expect(isIgnoredReference('#top')).toBe(true);
    expect(isIgnoredReference('javascript:void(0)')).toBe(true);
    expect(isIgnoredReference('data:image/png;base64,AAAA')).toBe(true);
    expect(isIgnoredReference('/about')).toBe(false);
  });
});

describe('makeRelative', () => {
  it('builds ./-prefixed paths between files', () => {
    expect(makeRelative('/out/index.html', '/out/a/index.html')).toBe('./a/index.html');
    expect(makeRelative('/out/css/site.css', '/out/img/bg.png')).toBe('../img/bg.png');
  });
});
