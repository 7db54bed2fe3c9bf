import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError } from '../errors.js';
import * as dataview from '../binary/dataview.js';

/** Bytes after the manufacturer and version bytes */
const HEADER_LENGTH = 64;

const ENCODING_RLE = 1;

const PALETTED_DEPTHS: ReadonlySet<number> = new Set([1, 2, 4, 8]);

/**
 * Read a ZSoft PCX header.
 *
 * Both resolution values come from the horizontal DPI field. Consumers
 * rely on that, so the vertical field at offset 12 is left unread.
 */
export function check(source: ByteSource, _context: CheckContext): ImageHeader {
  const a = source.read(HEADER_LENGTH);

  if (a[0] !== ENCODING_RLE) {
    throw new MalformedHeaderError(`Invalid PCX encoding ${a[0]}`, 2);
  }

  const x1 = dataview.readUint16LE(a, 2);
  const y1 = dataview.readUint16LE(a, 4);
  const x2 = dataview.readUint16LE(a, 6);
  const y2 = dataview.readUint16LE(a, 8);
  if (x2 < x1 || y2 < y1) {
    throw new MalformedHeaderError(`Invalid PCX window (${x1},${y1})-(${x2},${y2})`, 4);
  }

  const bits = a[1]!;
  const planes = a[63]!;
  let bitsPerPixel: number;
  if (planes === 1 && PALETTED_DEPTHS.has(bits)) {
    bitsPerPixel = bits;
  } else if (planes === 3 && bits === 8) {
    bitsPerPixel = 24;
  } else {
    throw new MalformedHeaderError(`Unsupported PCX depth: ${planes} plane(s) of ${bits} bits`, 3);
  }

  const dpi = dataview.readUint16LE(a, 10);

  return {
    format: 'pcx',
    width: x2 - x1 + 1,
    height: y2 - y1 + 1,
    bitsPerPixel,
    progressive: false,
    numberOfImages: 1,
    physicalWidthDpi: dpi,
    physicalHeightDpi: dpi,
  };
}

export const pcx = {
  check,
};

export default pcx;
