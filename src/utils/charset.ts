/**
 * Text decoding for HTML and CSS bodies
 */

import { TextDecoder } from 'node:util';

const HEADER_CHARSET_RE = /;\s*charset\s*=\s*"?([^";\s]+)"?/i;
const META_CHARSET_RE = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i;
export const CSS_CHARSET_RE = /^@charset\s+"([^"]+)"\s*;/i;

export interface DecodedText {
  text: string;
  /** WHATWG encoding name the body was decoded with, e.g. "utf-8" */
  encoding: string;
}

function decoderFor(label: string | undefined): TextDecoder | undefined {
  if (!label) return undefined;
  try {
    return new TextDecoder(label);
  } catch {
    return undefined; // unknown label
  }
}

/**
 * Decode a body using the charset from the Content-Type header, then the
 * document's own declaration (<meta charset> or @charset), then UTF-8.
 */
export function decodeText(body: Buffer, contentType: string, type: 'html' | 'css'): DecodedText {
  const head = body.subarray(0, 1024).toString('latin1');
  const declared = (type === 'html' ? META_CHARSET_RE : CSS_CHARSET_RE).exec(head)?.[1];
  const decoder =
    decoderFor(HEADER_CHARSET_RE.exec(contentType)?.[1]) ??
    decoderFor(declared) ??
    new TextDecoder('utf-8');
  return { text: decoder.decode(body), encoding: decoder.encoding };
}
