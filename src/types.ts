/**
 * Image formats whose headers can be inspected
 */
export type ImageFormat =
  | 'jpeg'
  | 'gif'
  | 'png'
  | 'bmp'
  | 'pcx'
  | 'iff'
  | 'ras'
  | 'pbm'
  | 'pgm'
  | 'ppm'
  | 'psd'
  | 'unknown';

/**
 * Per-call switches for `detect` and the entry points built on it
 */
export interface DetectOptions {
  /**
   * Collect textual comments (JPEG COM segments, PNM `#` lines, and GIF
   * comment extensions when `countImages` is also set).
   */
  collectComments?: boolean;
  /**
   * Walk every GIF block to count the embedded images. Without it GIF
   * detection stops after the logical screen descriptor and reports one
   * image.
   */
  countImages?: boolean;
}

/**
 * Header fields produced by a format checker, before comments are attached
 */
export interface ImageHeader {
  format: Exclude<ImageFormat, 'unknown'>;
  width: number;
  height: number;
  bitsPerPixel: number;
  progressive: boolean;
  numberOfImages: number;
  physicalWidthDpi?: number;
  physicalHeightDpi?: number;
}

/**
 * Structural metadata of a recognised image
 */
export interface ImageMetadata {
  readonly format: Exclude<ImageFormat, 'unknown'>;
  readonly width: number;
  readonly height: number;
  readonly bitsPerPixel: number;
  /** Interlaced (GIF, PNG) or progressive scan (JPEG). */
  readonly progressive: boolean;
  /** Always 1 unless GIF image counting was requested. */
  readonly numberOfImages: number;
  /** Absent when the header carries no resolution. */
  readonly physicalWidthDpi?: number;
  readonly physicalHeightDpi?: number;
  /** In stream order; empty unless comment collection was requested. */
  readonly comments: readonly string[];
}

export type DetectionFailureKind = 'unrecognized-format' | 'malformed-header' | 'truncated';

export interface DetectionFailure {
  kind: DetectionFailureKind;
  message: string;
  /** Bytes consumed from the source when detection gave up. */
  offset?: number;
}

/**
 * Outcome of a detection call: a complete record or a failure, never both
 */
export type DetectionResult =
  | { ok: true; metadata: ImageMetadata }
  | { ok: false; failure: DetectionFailure };

/**
 * Input accepted by the in-memory entry points
 */
export type ProbeInput = Uint8Array | ArrayBuffer | string;
