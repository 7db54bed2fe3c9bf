/**
 * Base error class for imgprobe errors
 */
export class ImgProbeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImgProbeError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the two magic bytes match no supported format
 */
export class UnrecognizedFormatError extends ImgProbeError {
  public readonly magic: readonly number[];

  constructor(magic: readonly number[]) {
    const hex = magic.map(b => b.toString(16).padStart(2, '0')).join(' ');
    super(`Unrecognized image format (magic bytes: ${hex})`);
    this.name = 'UnrecognizedFormatError';
    this.magic = magic;
  }
}

/**
 * Thrown when a header field violates the format's grammar
 */
export class MalformedHeaderError extends ImgProbeError {
  public readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset !== undefined ? `${message} at offset ${offset}` : message);
    this.name = 'MalformedHeaderError';
    this.offset = offset;
  }
}

/**
 * Thrown when the input ends before a required field could be read
 */
export class TruncatedInputError extends ImgProbeError {
  public readonly requested: number;
  public readonly available: number | undefined;

  constructor(requested: number, available?: number, options?: { cause?: unknown }) {
    super(
      available !== undefined
        ? `Premature end of input: requested ${requested} bytes but only ${available} available`
        : 'Premature end of input'
    );
    this.name = 'TruncatedInputError';
    this.requested = requested;
    this.available = available;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Thrown when attempting to read beyond the bounds of a header block
 */
export class BufferOverflowError extends ImgProbeError {
  public readonly requested: number;
  public readonly available: number;

  constructor(requested: number, available: number) {
    super(`Buffer overflow: requested ${requested} bytes but only ${available} available`);
    this.name = 'BufferOverflowError';
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Thrown when an entry point is handed something it cannot read bytes from
 */
export class InvalidInputError extends ImgProbeError {
  constructor(message = 'Input must be Uint8Array, ArrayBuffer, or data URL string') {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Thrown when a URL cannot be fetched
 */
export class HttpStatusError extends ImgProbeError {
  public readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}
