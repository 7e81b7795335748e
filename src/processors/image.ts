/**
 * Image placeholder processing utilities
 */

import probe from 'probe-image-size';
import sharp from 'sharp';

const FALLBACK_WIDTH = 800;
const FALLBACK_HEIGHT = 450;
const MAX_SIDE = 4096;

export interface ImageSize {
  width: number;
  height: number;
}

/** Raster images only; an SVG stays an SVG */
export function isPlaceholderCandidate(contentType: string): boolean {
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return mime.startsWith('image/') && mime !== 'image/svg+xml';
}

/**
 * Read dimensions from the image header, falling back to 800x450 when the
 * format is unknown or the bytes are truncated
 */
export function probeSize(bytes: Buffer): ImageSize {
  let meta: probe.ProbeResult | null = null;
  try {
    meta = probe.sync(bytes);
  } catch {
    meta = null; // corrupt header
  }
  const clamp = (n: number) => Math.max(1, Math.min(MAX_SIDE, Math.round(n)));
  return {
    width: clamp(meta?.width || FALLBACK_WIDTH),
    height: clamp(meta?.height || FALLBACK_HEIGHT),
  };
}

/**
 * A flat grey PNG with the original image's dimensions
 */
export async function renderPlaceholder(bytes: Buffer): Promise<Buffer> {
  const { width, height } = probeSize(bytes);
  return sharp({
    create: { width, height, channels: 3, background: '#e5e7eb' },
  })
    .png()
    .toBuffer();
}
