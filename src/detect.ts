import type { DetectOptions, DetectionFailure, DetectionResult } from './types.js';
import type { ByteSource } from './io/byte-source.js';
import type { CheckContext, FormatChecker } from './formats/context.js';
import {
  MalformedHeaderError,
  TruncatedInputError,
  UnrecognizedFormatError,
} from './errors.js';
import { buildMetadata } from './metadata.js';
import { MAGIC } from './signatures.js';

import { gif } from './formats/gif.js';
import { png } from './formats/png.js';
import { jpeg } from './formats/jpeg.js';
import { bmp } from './formats/bmp.js';
import { pcx } from './formats/pcx.js';
import { iff } from './formats/iff.js';
import { ras } from './formats/ras.js';
import { pnm } from './formats/pnm.js';
import { psd } from './formats/psd.js';

// ─── Magic byte → checker table ───────────────────────────────────────────────

interface DispatchEntry {
  matches: (b1: number, b2: number) => boolean;
  check: FormatChecker;
}

function pair(magic: readonly [number, number]): DispatchEntry['matches'] {
  return (b1, b2) => b1 === magic[0] && b2 === magic[1];
}

/**
 * Evaluated in order; the first match wins. Real magic numbers never
 * overlap, and a checker consumes its input, so there is no second guess.
 */
const DISPATCH: readonly DispatchEntry[] = [
  { matches: pair(MAGIC.GIF), check: gif.check },
  { matches: pair(MAGIC.PNG), check: png.check },
  { matches: pair(MAGIC.JPEG), check: jpeg.check },
  { matches: pair(MAGIC.BMP), check: bmp.check },
  { matches: (b1, b2) => b1 === MAGIC.PCX && b2 < 0x06, check: pcx.check },
  { matches: pair(MAGIC.IFF), check: iff.check },
  { matches: pair(MAGIC.RAS), check: ras.check },
  { matches: (b1, b2) => b1 === MAGIC.PNM && b2 >= 0x31 && b2 <= 0x36, check: pnm.check },
  { matches: pair(MAGIC.PSD), check: psd.check },
];

function readMagicByte(source: ByteSource): number {
  const value = source.readByte();
  if (value === null) {
    throw new TruncatedInputError(2, source.position);
  }
  return value;
}

/**
 * Map an engine error onto the failure it reports. Anything else is a
 * fault in the caller's environment or in this library and is rethrown.
 */
function toFailure(err: unknown, source: ByteSource): DetectionFailure | undefined {
  if (err instanceof UnrecognizedFormatError) {
    return { kind: 'unrecognized-format', message: err.message, offset: source.position };
  }
  if (err instanceof MalformedHeaderError) {
    return { kind: 'malformed-header', message: err.message, offset: err.offset ?? source.position };
  }
  if (err instanceof TruncatedInputError) {
    return { kind: 'truncated', message: err.message, offset: source.position };
  }
  return undefined;
}

/**
 * Identify the image in `source` from its two magic bytes and read its
 * header.
 *
 * Reads only as far as the format's grammar requires. Bad or short input
 * is reported through the result, never thrown. The source is left where
 * the checker stopped and is not closed.
 */
export function detect(source: ByteSource, options: DetectOptions = {}): DetectionResult {
  const comments: string[] = [];

  try {
    const b1 = readMagicByte(source);
    const b2 = readMagicByte(source);

    const entry = DISPATCH.find(e => e.matches(b1, b2));
    if (!entry) {
      throw new UnrecognizedFormatError([b1, b2]);
    }

    const context: CheckContext = {
      collectComments: options.collectComments ?? false,
      countImages: options.countImages ?? false,
      magic: [b1, b2],
      addComment: text => {
        comments.push(text);
      },
    };

    const header = entry.check(source, context);
    return { ok: true, metadata: buildMetadata(header, comments) };
  } catch (err) {
    const failure = toFailure(err, source);
    if (!failure) {
      throw err;
    }
    return { ok: false, failure };
  }
}
