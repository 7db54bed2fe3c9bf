import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError } from '../errors.js';
import { ensureDimensions } from './context.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { JFIF_ID } from '../signatures.js';

/**
 * JPEG marker types
 */
const MARKERS = {
  APP0: 0xffe0, // JFIF
  COM: 0xfffe, // Comment
  SOF_FIRST: 0xffc0,
  SOF_LAST: 0xffcf,
  DHT: 0xffc4, // Huffman table, shares the SOF range
  JPG: 0xffc8, // Reserved, shares the SOF range
} as const;

const PROGRESSIVE_SOF: ReadonlySet<number> = new Set([0xffc2, 0xffc6, 0xffca, 0xffce]);

/** Smallest APP0 length that holds a JFIF density block */
const JFIF_SEGMENT_LENGTH = 14;
const JFIF_BODY_LENGTH = 12;
const SOF_BODY_LENGTH = 6;

/**
 * JFIF density units
 */
const UNITS = {
  DOTS_PER_INCH: 1,
  DOTS_PER_CM: 2,
} as const;

const CM_PER_INCH = 2.54;

function isFrameMarker(marker: number): boolean {
  return (
    marker >= MARKERS.SOF_FIRST &&
    marker <= MARKERS.SOF_LAST &&
    marker !== MARKERS.DHT &&
    marker !== MARKERS.JPG
  );
}

/**
 * Walk marker segments until the first start-of-frame
 */
export function check(source: ByteSource, context: CheckContext): ImageHeader {
  let physicalWidthDpi: number | undefined;
  let physicalHeightDpi: number | undefined;

  for (;;) {
    const segment = source.read(4);
    const marker = dataview.readUint16BE(segment, 0);
    const size = dataview.readUint16BE(segment, 2);

    if ((marker & 0xff00) !== 0xff00) {
      throw new MalformedHeaderError(
        `Invalid JPEG: expected marker, found 0x${marker.toString(16)}`,
        source.position - 4
      );
    }

    if (marker === MARKERS.APP0) {
      if (size < JFIF_SEGMENT_LENGTH) {
        source.skip(size - 2);
        continue;
      }
      const data = source.read(JFIF_BODY_LENGTH);
      if (buffer.startsWith(data, JFIF_ID)) {
        const x = dataview.readUint16BE(data, 8);
        const y = dataview.readUint16BE(data, 10);
        if (data[7] === UNITS.DOTS_PER_INCH) {
          physicalWidthDpi = x;
          physicalHeightDpi = y;
        } else if (data[7] === UNITS.DOTS_PER_CM) {
          physicalWidthDpi = Math.trunc(x * CM_PER_INCH);
          physicalHeightDpi = Math.trunc(y * CM_PER_INCH);
        }
      }
      source.skip(size - JFIF_SEGMENT_LENGTH);
    } else if (context.collectComments && size > 2 && marker === MARKERS.COM) {
      const text = source.read(size - 2);
      context.addComment(buffer.trimLatin1(buffer.toLatin1(text)));
    } else if (isFrameMarker(marker)) {
      const data = source.read(SOF_BODY_LENGTH);
      const bitsPerPixel = data[0]! * data[5]!;
      const height = dataview.readUint16BE(data, 1);
      const width = dataview.readUint16BE(data, 3);
      ensureDimensions(width, height, source);
      if (bitsPerPixel < 1) {
        throw new MalformedHeaderError('Invalid JPEG frame: zero precision or components', source.position);
      }

      const header: ImageHeader = {
        format: 'jpeg',
        width,
        height,
        bitsPerPixel,
        progressive: PROGRESSIVE_SOF.has(marker),
        numberOfImages: 1,
      };
      if (physicalWidthDpi !== undefined) header.physicalWidthDpi = physicalWidthDpi;
      if (physicalHeightDpi !== undefined) header.physicalHeightDpi = physicalHeightDpi;
      return header;
    } else {
      source.skip(size - 2);
    }
  }
}

export const jpeg = {
  check,
};

export default jpeg;
