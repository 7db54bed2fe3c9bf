import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError } from '../errors.js';
import { ensureDimensions } from './context.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { SIGNATURE_TAILS } from '../signatures.js';

/**
 * "PS", version, reserved (6), channels, rows, columns, depth, color mode
 */
const HEADER_LENGTH = 24;
const MAX_BITS_PER_PIXEL = 64;

export function check(source: ByteSource, _context: CheckContext): ImageHeader {
  const a = source.read(HEADER_LENGTH);

  if (!buffer.startsWith(a, SIGNATURE_TAILS.PSD)) {
    throw new MalformedHeaderError('Invalid PSD: missing 8BPS signature', 2);
  }

  const channels = dataview.readUint16BE(a, 10);
  const height = dataview.readInt32BE(a, 12);
  const width = dataview.readInt32BE(a, 16);
  const depth = dataview.readUint16BE(a, 20);
  ensureDimensions(width, height, source);

  const bitsPerPixel = channels * depth;
  if (bitsPerPixel < 1 || bitsPerPixel > MAX_BITS_PER_PIXEL) {
    throw new MalformedHeaderError(
      `Invalid PSD depth: ${channels} channel(s) of ${depth} bits`,
      source.position
    );
  }

  return { format: 'psd', width, height, bitsPerPixel, progressive: false, numberOfImages: 1 };
}

export const psd = {
  check,
};

export default psd;
