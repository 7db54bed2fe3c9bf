import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError } from '../errors.js';
import { ensureDimensions } from './context.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { SIGNATURE_TAILS } from '../signatures.js';

/**
 * Signature tail (6), IHDR length and type (8), IHDR fields (13)
 */
const HEADER_LENGTH = 27;

/**
 * Color types that store three samples per pixel
 */
const COLOR_TYPE_TRUECOLOR = 2;
const COLOR_TYPE_TRUECOLOR_ALPHA = 6;

/**
 * Read the IHDR chunk that must follow the PNG signature
 */
export function check(source: ByteSource, _context: CheckContext): ImageHeader {
  const a = source.read(HEADER_LENGTH);

  if (!buffer.startsWith(a, SIGNATURE_TAILS.PNG)) {
    throw new MalformedHeaderError('Invalid PNG: bad signature', 2);
  }

  const width = dataview.readInt32BE(a, 14);
  const height = dataview.readInt32BE(a, 18);
  ensureDimensions(width, height, source);

  let bitsPerPixel = a[22]!;
  if (bitsPerPixel < 1) {
    throw new MalformedHeaderError('Invalid PNG bit depth 0', 2 + 22);
  }
  const colorType = a[23]!;
  if (colorType === COLOR_TYPE_TRUECOLOR || colorType === COLOR_TYPE_TRUECOLOR_ALPHA) {
    bitsPerPixel *= 3;
  }

  return {
    format: 'png',
    width,
    height,
    bitsPerPixel,
    progressive: a[26] !== 0,
    numberOfImages: 1,
  };
}

export const png = {
  check,
};

export default png;
