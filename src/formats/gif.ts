import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError, TruncatedInputError } from '../errors.js';
import { ensureDimensions } from './context.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { SIGNATURE_TAILS } from '../signatures.js';

/**
 * GIF block types
 */
const BLOCKS = {
  EXTENSION: 0x21, // Extension introducer
  IMAGE: 0x2c, // Image descriptor
  TRAILER: 0x3b, // End of file
} as const;

/**
 * Extension types
 */
const EXTENSIONS = {
  COMMENT: 0xfe,
} as const;

const FLAG_COLOR_TABLE = 0x80;
const FLAG_INTERLACED = 0x40;

/** Rest of the signature ("F87a" / "F89a") plus the logical screen descriptor */
const HEADER_LENGTH = 11;
const IMAGE_DESCRIPTOR_LENGTH = 9;

function colorTableLength(sizeField: number): number {
  return (1 << ((sizeField & 0x07) + 1)) * 3;
}

function nextByte(source: ByteSource): number {
  const value = source.readByte();
  if (value === null) {
    throw new TruncatedInputError(1, 0);
  }
  return value;
}

/**
 * Skip a sequence of length-prefixed sub-blocks up to the zero terminator
 */
function skipSubBlocks(source: ByteSource): void {
  let n = nextByte(source);
  while (n > 0) {
    source.skip(n);
    n = nextByte(source);
  }
}

/**
 * Join the bytes of a sub-block sequence into one string
 */
function readSubBlockText(source: ByteSource): string {
  let text = '';
  let n = nextByte(source);
  while (n > 0) {
    text += buffer.toLatin1(source.read(n));
    n = nextByte(source);
  }
  return text;
}

/**
 * Read the logical screen descriptor and, when images are counted, walk
 * every block up to the trailer. Comments are only seen during the walk.
 */
export function check(source: ByteSource, context: CheckContext): ImageHeader {
  const a = source.read(HEADER_LENGTH);

  if (!buffer.startsWith(a, SIGNATURE_TAILS.GIF89a) && !buffer.startsWith(a, SIGNATURE_TAILS.GIF87a)) {
    throw new MalformedHeaderError('Invalid GIF: missing GIF87a/GIF89a signature', 2);
  }

  const width = dataview.readUint16LE(a, 4);
  const height = dataview.readUint16LE(a, 6);
  ensureDimensions(width, height, source);

  const flags = a[8]!;
  let bitsPerPixel = ((flags >> 4) & 0x07) + 1;
  let progressive = false;

  if (!context.countImages) {
    return { format: 'gif', width, height, bitsPerPixel, progressive, numberOfImages: 1 };
  }

  if ((flags & FLAG_COLOR_TABLE) !== 0) {
    source.skip(colorTableLength(flags));
  }

  let images = 0;
  let blockType: number;
  do {
    blockType = nextByte(source);
    switch (blockType) {
      case BLOCKS.IMAGE: {
        const descriptor = source.read(IMAGE_DESCRIPTOR_LENGTH);
        const imageFlags = descriptor[8]!;
        progressive = (imageFlags & FLAG_INTERLACED) !== 0;

        const localBits = (imageFlags & 0x07) + 1;
        if (localBits > bitsPerPixel) {
          bitsPerPixel = localBits;
        }
        if ((imageFlags & FLAG_COLOR_TABLE) !== 0) {
          source.skip(colorTableLength(imageFlags));
        }

        source.skip(1); // LZW minimum code size
        skipSubBlocks(source);
        images++;
        break;
      }
      case BLOCKS.EXTENSION: {
        const extensionType = nextByte(source);
        if (context.collectComments && extensionType === EXTENSIONS.COMMENT) {
          context.addComment(readSubBlockText(source));
        } else {
          skipSubBlocks(source);
        }
        break;
      }
      case BLOCKS.TRAILER:
        break;
      default:
        throw new MalformedHeaderError(
          `Invalid GIF: unexpected block type 0x${blockType.toString(16)}`,
          source.position - 1
        );
    }
  } while (blockType !== BLOCKS.TRAILER);

  if (images === 0) {
    throw new MalformedHeaderError('Invalid GIF: no image descriptor before trailer', source.position);
  }

  return {
    format: 'gif',
    width,
    height,
    bitsPerPixel,
    progressive,
    numberOfImages: images,
  };
}

export const gif = {
  check,
};

export default gif;
