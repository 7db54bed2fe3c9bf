/**
 * probe(): inspect an image held in memory.
 *
 * Returns the header metadata of the detected format, or the reason
 * detection failed.
 */

import { detect } from '../detect.js';
import { BufferByteSource } from '../io/byte-source.js';
import { InvalidInputError } from '../errors.js';
import type { DetectOptions, DetectionResult, ImageFormat, ProbeInput } from '../types.js';

/**
 * File extensions treated as images by `isValidImageExtension`
 */
export const IMAGE_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'gif', 'png', 'bmp'];

/**
 * Convert supported input types to Uint8Array
 */
export function normalizeInput(input: ProbeInput): Uint8Array {
  if (typeof input === 'string') {
    if (input.startsWith('data:')) {
      const commaIndex = input.indexOf(',');
      if (commaIndex === -1) {
        throw new InvalidInputError('Invalid data URL format');
      }
      const binaryString = atob(input.slice(commaIndex + 1));
      const data = new Uint8Array(binaryString.length);
      for (let i = 0; i < binaryString.length; i++) {
        data[i] = binaryString.charCodeAt(i);
      }
      return data;
    }
    throw new InvalidInputError('String input must be a data URL');
  }
  if (input instanceof ArrayBuffer) {
    return new Uint8Array(input);
  }
  if (input instanceof Uint8Array) {
    return input;
  }
  throw new InvalidInputError();
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Inspect an image header synchronously.
 *
 * @param input  Uint8Array, ArrayBuffer, or data URL (base64)
 */
export function probeSync(input: ProbeInput, options: DetectOptions = {}): DetectionResult {
  return detect(new BufferByteSource(normalizeInput(input)), options);
}

/**
 * Inspect an image header asynchronously. Also accepts a Blob.
 */
export async function probe(
  input: ProbeInput | Blob,
  options: DetectOptions = {},
): Promise<DetectionResult> {
  let data: ProbeInput;
  if (typeof Blob !== 'undefined' && input instanceof Blob) {
    data = new Uint8Array(await input.arrayBuffer());
  } else if (typeof input === 'string' || input instanceof ArrayBuffer || input instanceof Uint8Array) {
    data = input;
  } else {
    throw new InvalidInputError('Input must be Uint8Array, ArrayBuffer, Blob, or data URL string');
  }
  return probeSync(data, options);
}

/**
 * Format of the image in `input`, or `'unknown'` when detection fails
 */
export function detectFormat(input: ProbeInput): ImageFormat {
  const result = probeSync(input);
  return result.ok ? result.metadata.format : 'unknown';
}

/**
 * `true` when `input` holds a complete, well-formed header of a supported
 * format
 */
export function isImage(input: ProbeInput): boolean {
  return probeSync(input).ok;
}

/**
 * Case-insensitive check of a file extension (without the dot)
 */
export function isValidImageExtension(ext: string): boolean {
  return IMAGE_EXTENSIONS.includes(ext.toLowerCase());
}
