import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError, TruncatedInputError } from '../errors.js';
import { ensureDimensions } from './context.js';
import { trimLatin1 } from '../binary/buffer.js';

type PnmFormat = 'pbm' | 'pgm' | 'ppm';

/** Indexed by (digit - 1) % 3: P1/P4, P2/P5, P3/P6 */
const PNM_FORMATS: readonly PnmFormat[] = ['pbm', 'pgm', 'ppm'];

/** Largest supported sample depth, in bits */
const MAX_SAMPLE_BITS = 25;

const INTEGER = /^[+-]?\d+$/;

/**
 * Parse a decimal header field. Anything but a plain 32-bit integer is a
 * malformed header; there is no fallback value.
 */
function parseInteger(text: string, field: string, source: ByteSource): number {
  const value = INTEGER.test(text) ? Number.parseInt(text, 10) : NaN;
  if (!Number.isSafeInteger(value) || value > 0x7fffffff || value < -0x80000000) {
    throw new MalformedHeaderError(`Invalid PNM ${field} "${text}"`, source.position);
  }
  return value;
}

/**
 * Next trimmed line that is neither blank nor a comment
 */
function nextDataLine(source: ByteSource, context: CheckContext): string {
  for (;;) {
    const raw = source.readLine();
    if (raw === null) {
      throw new TruncatedInputError(1, 0);
    }
    const line = trimLatin1(raw);
    if (line.length === 0) {
      continue;
    }
    if (line.startsWith('#')) {
      if (context.collectComments && line.length > 1) {
        context.addComment(line.substring(1));
      }
      continue;
    }
    return line;
  }
}

/**
 * Read the textual header of a PBM, PGM or PPM file. The format digit is
 * the second magic byte.
 */
export function check(source: ByteSource, context: CheckContext): ImageHeader {
  const digit = context.magic[1] - 0x30;
  if (digit < 1 || digit > 6) {
    throw new MalformedHeaderError(`Invalid PNM type P${String.fromCharCode(context.magic[1])}`, 1);
  }
  const format = PNM_FORMATS[(digit - 1) % 3]!;

  // "343 966": width before the first space, height after the last one
  const size = nextDataLine(source, context);
  const firstSpace = size.indexOf(' ');
  if (firstSpace === -1) {
    throw new MalformedHeaderError(`Invalid PNM size line "${size}"`, source.position);
  }
  const width = parseInteger(size.substring(0, firstSpace), 'width', source);
  const height = parseInteger(size.substring(size.lastIndexOf(' ') + 1), 'height', source);
  ensureDimensions(width, height, source);

  if (format === 'pbm') {
    return { format, width, height, bitsPerPixel: 1, progressive: false, numberOfImages: 1 };
  }

  const maxSample = parseInteger(nextDataLine(source, context), 'maximum sample value', source);
  if (maxSample < 0) {
    throw new MalformedHeaderError(`Invalid PNM maximum sample value ${maxSample}`, source.position);
  }

  for (let i = 0; i < MAX_SAMPLE_BITS; i++) {
    if (maxSample < 1 << (i + 1)) {
      const bits = i + 1;
      return {
        format,
        width,
        height,
        bitsPerPixel: format === 'ppm' ? bits * 3 : bits,
        progressive: false,
        numberOfImages: 1,
      };
    }
  }

  throw new MalformedHeaderError(`PNM maximum sample value ${maxSample} too large`, source.position);
}

export const pnm = {
  check,
};

export default pnm;
