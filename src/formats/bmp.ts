import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError } from '../errors.js';
import { ensureDimensions } from './context.js';
import * as dataview from '../binary/dataview.js';

/**
 * Bytes after "BM": the rest of the file header (12) and the first
 * 32 bytes of the info header
 */
const HEADER_LENGTH = 44;

const VALID_DEPTHS: ReadonlySet<number> = new Set([1, 4, 8, 16, 24, 32]);

const INCHES_PER_METRE = 0.0254;

/**
 * Read a BITMAPINFOHEADER-style header
 */
export function check(source: ByteSource, _context: CheckContext): ImageHeader {
  const a = source.read(HEADER_LENGTH);

  const width = dataview.readInt32LE(a, 16);
  const height = dataview.readInt32LE(a, 20);
  ensureDimensions(width, height, source);

  const bitsPerPixel = dataview.readUint16LE(a, 26);
  if (!VALID_DEPTHS.has(bitsPerPixel)) {
    throw new MalformedHeaderError(`Invalid BMP bit depth ${bitsPerPixel}`, source.position);
  }

  const header: ImageHeader = {
    format: 'bmp',
    width,
    height,
    bitsPerPixel,
    progressive: false,
    numberOfImages: 1,
  };

  // Resolution is stored as pixels per metre
  const x = Math.trunc(dataview.readInt32LE(a, 36) * INCHES_PER_METRE);
  if (x > 0) {
    header.physicalWidthDpi = x;
  }
  const y = Math.trunc(dataview.readInt32LE(a, 40) * INCHES_PER_METRE);
  if (y > 0) {
    header.physicalHeightDpi = y;
  }

  return header;
}

export const bmp = {
  check,
};

export default bmp;
