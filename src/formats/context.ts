import type { ByteSource } from '../io/byte-source.js';
import type { ImageHeader } from '../types.js';
import { MalformedHeaderError } from '../errors.js';

/**
 * Per-call state handed to a format checker. A fresh context is built for
 * every detection, so nothing leaks from one call into the next.
 */
export interface CheckContext {
  readonly collectComments: boolean;
  readonly countImages: boolean;
  /** The two magic bytes already consumed by the probe. */
  readonly magic: readonly [number, number];
  addComment(text: string): void;
}

/**
 * Parses the rest of a header after its magic bytes. Returns a complete
 * header or throws; never returns partial fields.
 */
export type FormatChecker = (source: ByteSource, context: CheckContext) => ImageHeader;

/**
 * Reject non-positive pixel dimensions
 */
export function ensureDimensions(width: number, height: number, source: ByteSource): void {
  if (width < 1 || height < 1) {
    throw new MalformedHeaderError(`Invalid dimensions ${width}x${height}`, source.position);
  }
}
