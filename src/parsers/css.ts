/**
 * CSS reference scanning: url(...) and @import "..."
 */

import type { RefKind } from '../types.js';

// quoted values may contain ")"; unquoted ones end at the first
const URL_RE = /url\(\s*(?:(['"])(.*?)\1|([^'")\s][^)]*?))\s*\)/gi;
const IMPORT_RE = /@import\s+(['"])([^'"]+)\1/gi;
const IMAGE_EXT_RE = /\.(png|jpe?g|gif|svg|webp|avif|ico|bmp)$/i;

export interface CssRef {
  value: string;
  kind: RefKind;
}

/** Guess from the path alone whether a reference names an image */
export function isImagePath(ref: string): boolean {
  return IMAGE_EXT_RE.test(ref.split(/[?#]/)[0]);
}

/**
 * Call `replace` for every reference in the stylesheet and splice in what it
 * returns; `undefined` keeps the original text.
 */
export function replaceCssRefs(css: string, replace: (ref: CssRef) => string | undefined): string {
  const withImports = css.replace(IMPORT_RE, (match, quote: string, value: string) => {
    const next = replace({ value, kind: 'asset' });
    return next === undefined ? match : `@import ${quote}${next}${quote}`;
  });
  return withImports.replace(
    URL_RE,
    (match, _quote: string | undefined, quoted: string | undefined, bare: string | undefined) => {
      const value = quoted ?? bare ?? '';
      if (!value || value.startsWith('data:')) return match;
      const next = replace({ value, kind: isImagePath(value) ? 'image' : 'asset' });
      return next === undefined ? match : `url(${JSON.stringify(next)})`;
    },
  );
}

export function parseCssRefs(css: string): CssRef[] {
  const refs: CssRef[] = [];
  replaceCssRefs(css, (ref) => {
    refs.push(ref);
    return undefined;
  });
  return refs;
}
