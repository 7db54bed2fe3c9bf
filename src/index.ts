/**
 * imgprobe - Image header inspection library
 *
 * Read format, dimensions, colour depth, resolution, image count and
 * comments from JPEG, GIF, PNG, BMP, PCX, IFF, Sun Raster, PBM/PGM/PPM
 * and PSD headers without decoding pixel data.
 *
 * @packageDocumentation
 */

// Main API
export {
  probe,
  probeSync,
  detectFormat,
  isImage,
  isValidImageExtension,
  IMAGE_EXTENSIONS,
} from './operations/probe.js';

// Core probe over any byte source
export { detect } from './detect.js';
export { BufferByteSource, SequentialByteSource } from './io/byte-source.js';
export type { ByteSource } from './io/byte-source.js';

// Metadata helpers
export {
  getFormatName,
  getMimeType,
  getMetadataMimeType,
  physicalWidthInch,
  physicalHeightInch,
} from './metadata.js';

// Types
export type {
  ImageFormat,
  ImageMetadata,
  DetectOptions,
  DetectionFailure,
  DetectionFailureKind,
  DetectionResult,
  ProbeInput,
} from './types.js';

// Error classes
export {
  ImgProbeError,
  UnrecognizedFormatError,
  MalformedHeaderError,
  TruncatedInputError,
  BufferOverflowError,
  InvalidInputError,
  HttpStatusError,
} from './errors.js';

// Format-specific checkers for advanced usage
export { gif } from './formats/gif.js';
export { png } from './formats/png.js';
export { jpeg } from './formats/jpeg.js';
export { bmp } from './formats/bmp.js';
export { pcx } from './formats/pcx.js';
export { iff } from './formats/iff.js';
export { ras } from './formats/ras.js';
export { pnm } from './formats/pnm.js';
export { psd } from './formats/psd.js';
export type { CheckContext, FormatChecker } from './formats/context.js';

// Binary utilities for advanced usage
export * as buffer from './binary/buffer.js';
export * as dataview from './binary/dataview.js';

// Magic numbers for format detection
export { MAGIC, SIGNATURE_TAILS } from './signatures.js';

// Default export for convenience
import { probe } from './operations/probe.js';
export default probe;
