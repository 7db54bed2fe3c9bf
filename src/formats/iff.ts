import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import type { CheckContext } from './context.js';
import { MalformedHeaderError } from '../errors.js';
import { ensureDimensions } from './context.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { IFF_IDS, SIGNATURE_TAILS } from '../signatures.js';

/** "RM" of "FORM", form size, form type */
const FORM_HEADER_LENGTH = 10;
const CHUNK_HEADER_LENGTH = 8;
const BMHD_LENGTH = 9;

/**
 * Find the BMHD chunk of an ILBM or PBM form
 */
export function check(source: ByteSource, _context: CheckContext): ImageHeader {
  const a = source.read(FORM_HEADER_LENGTH);

  if (!buffer.startsWith(a, SIGNATURE_TAILS.IFF)) {
    throw new MalformedHeaderError('Invalid IFF: missing FORM signature', 2);
  }
  const type = dataview.readUint32BE(a, 6);
  if (type !== IFF_IDS.ILBM && type !== IFF_IDS.PBM) {
    throw new MalformedHeaderError(`Unsupported IFF form type "${buffer.toLatin1(a, 6, 4)}"`, 8);
  }

  for (;;) {
    const chunk = source.read(CHUNK_HEADER_LENGTH);
    const chunkId = dataview.readUint32BE(chunk, 0);
    let size = dataview.readUint32BE(chunk, 4);
    if ((size & 1) === 1) {
      size++;
    }

    if (chunkId !== IFF_IDS.BMHD) {
      source.skip(size);
      continue;
    }

    const bmhd = source.read(BMHD_LENGTH);
    const width = dataview.readUint16BE(bmhd, 0);
    const height = dataview.readUint16BE(bmhd, 2);
    ensureDimensions(width, height, source);

    const bitsPerPixel = bmhd[8]!;
    if (bitsPerPixel < 1 || bitsPerPixel > 32) {
      throw new MalformedHeaderError(`Invalid IFF plane count ${bitsPerPixel}`, source.position - 1);
    }

    return { format: 'iff', width, height, bitsPerPixel, progressive: false, numberOfImages: 1 };
  }
}

export const iff = {
  check,
};

export default iff;
