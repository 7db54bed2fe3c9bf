import type { ImageFormat, ImageHeader, ImageMetadata } from './types.js';

/**
 * Canonical names for each format
 */
const FORMAT_NAMES: Record<ImageFormat, string> = {
  jpeg: 'JPEG',
  gif: 'GIF',
  png: 'PNG',
  bmp: 'BMP',
  pcx: 'PCX',
  iff: 'IFF',
  ras: 'RAS',
  pbm: 'PBM',
  pgm: 'PGM',
  ppm: 'PPM',
  psd: 'PSD',
  unknown: '?',
};

/**
 * MIME types for each format
 */
const MIME_TYPES: Record<Exclude<ImageFormat, 'unknown'>, string> = {
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  png: 'image/png',
  bmp: 'image/bmp',
  pcx: 'image/pcx',
  iff: 'image/iff',
  ras: 'image/ras',
  pbm: 'image/x-portable-bitmap',
  pgm: 'image/x-portable-graymap',
  ppm: 'image/x-portable-pixmap',
  psd: 'image/psd',
};

const PROGRESSIVE_JPEG_MIME_TYPE = 'image/pjpeg';

/**
 * Get the canonical name of a format ("JPEG", "PGM", …)
 */
export function getFormatName(format: ImageFormat): string {
  return FORMAT_NAMES[format];
}

function knownMimeType(format: Exclude<ImageFormat, 'unknown'>, progressive: boolean): string {
  return format === 'jpeg' && progressive ? PROGRESSIVE_JPEG_MIME_TYPE : MIME_TYPES[format];
}

/**
 * Get MIME type for a format. Progressive JPEG has its own type.
 * `undefined` for unknown data.
 */
export function getMimeType(format: ImageFormat, progressive = false): string | undefined {
  return format === 'unknown' ? undefined : knownMimeType(format, progressive);
}

/**
 * MIME type of a detected image
 */
export function getMetadataMimeType(metadata: ImageMetadata): string {
  return knownMimeType(metadata.format, metadata.progressive);
}

function toInches(pixels: number, dpi: number | undefined): number | undefined {
  if (dpi === undefined || dpi <= 0 || pixels <= 0) {
    return undefined;
  }
  return pixels / dpi;
}

/**
 * Printed width in inches, or `undefined` when the resolution is unknown
 */
export function physicalWidthInch(metadata: ImageMetadata): number | undefined {
  return toInches(metadata.width, metadata.physicalWidthDpi);
}

/**
 * Printed height in inches, or `undefined` when the resolution is unknown
 */
export function physicalHeightInch(metadata: ImageMetadata): number | undefined {
  return toInches(metadata.height, metadata.physicalHeightDpi);
}

/**
 * Freeze a checker's header and the comments gathered alongside it into
 * the record handed to callers
 */
export function buildMetadata(header: ImageHeader, comments: readonly string[]): ImageMetadata {
  const metadata: ImageMetadata = {
    format: header.format,
    width: header.width,
    height: header.height,
    bitsPerPixel: header.bitsPerPixel,
    progressive: header.progressive,
    numberOfImages: header.numberOfImages,
    ...(header.physicalWidthDpi !== undefined && { physicalWidthDpi: header.physicalWidthDpi }),
    ...(header.physicalHeightDpi !== undefined && { physicalHeightDpi: header.physicalHeightDpi }),
    comments: Object.freeze([...comments]),
  };
  return Object.freeze(metadata);
}
