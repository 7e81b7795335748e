/**
 * CSS rewriting
 */

import { replaceCssRefs } from '../parsers/css.js';

/**
 * Maps a raw reference, resolved against `base`, to its replacement text.
 * `undefined` leaves the reference as written.
 */
export type RefMapper = (raw: string, base: string) => string | undefined;

/**
 * Rewrite url() and @import references of a stylesheet
 */
export function rewriteStylesheet(css: string, base: string, mapRef: RefMapper): string {
  return replaceCssRefs(css, (ref) => mapRef(ref.value, base));
}
