import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError } from '../errors.js';
import { ensureDimensions } from './context.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { SIGNATURE_TAILS } from '../signatures.js';

const HEADER_LENGTH = 14;
const MAX_DEPTH = 24;

/**
 * Read a Sun Raster header
 */
export function check(source: ByteSource, _context: CheckContext): ImageHeader {
  const a = source.read(HEADER_LENGTH);

  if (!buffer.startsWith(a, SIGNATURE_TAILS.RAS)) {
    throw new MalformedHeaderError('Invalid Sun Raster signature', 2);
  }

  const width = dataview.readInt32BE(a, 2);
  const height = dataview.readInt32BE(a, 6);
  ensureDimensions(width, height, source);

  const bitsPerPixel = dataview.readInt32BE(a, 10);
  if (bitsPerPixel < 1 || bitsPerPixel > MAX_DEPTH) {
    throw new MalformedHeaderError(`Invalid Sun Raster depth ${bitsPerPixel}`, 12);
  }

  return { format: 'ras', width, height, bitsPerPixel, progressive: false, numberOfImages: 1 };
}

export const ras = {
  check,
};

export default ras;
