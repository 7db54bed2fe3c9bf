import { TruncatedInputError } from '../errors.js';

const LINE_FEED = 0x0a;

/**
 * Forward-only origin of bytes. There is no seek or rewind: every format
 * checker is a single pass over the source.
 */
export interface ByteSource {
  /** Number of bytes consumed so far. */
  readonly position: number;
  /** Next byte, or `null` at end of input. */
  readByte(): number | null;
  /** Exactly `length` bytes; throws `TruncatedInputError` on a short read. */
  read(length: number): Uint8Array;
  /** Advance exactly `count` bytes. A count of zero or less does nothing. */
  skip(count: number): void;
  /**
   * Characters up to the next line feed (not included) or end of input.
   * `null` when the input ended before any byte could be read.
   */
  readLine(): string | null;
}

/**
 * Shared `ByteSource` logic on top of two primitives a medium provides:
 * a read that may return fewer bytes than asked, and a bulk skip that may
 * skip fewer bytes than asked.
 */
export abstract class SequentialByteSource implements ByteSource {
  private consumed = 0;
  private readonly single = new Uint8Array(1);

  get position(): number {
    return this.consumed;
  }

  /** Copy up to `length` bytes into `target`; 0 means end of input. */
  protected abstract readInto(target: Uint8Array, offset: number, length: number): number;

  /** Skip up to `count` bytes without reading them; may return 0. */
  protected abstract skipBytes(count: number): number;

  readByte(): number | null {
    if (this.readInto(this.single, 0, 1) <= 0) {
      return null;
    }
    this.consumed += 1;
    return this.single[0]!;
  }

  read(length: number): Uint8Array {
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const n = this.readInto(out, filled, length - filled);
      if (n <= 0) {
        throw new TruncatedInputError(length, filled);
      }
      filled += n;
      this.consumed += n;
    }
    return out;
  }

  skip(count: number): void {
    let remaining = count;
    while (remaining > 0) {
      const skipped = this.skipBytes(remaining);
      if (skipped > 0) {
        remaining -= skipped;
        this.consumed += skipped;
        continue;
      }
      // Medium would not skip; consume a byte the slow way
      if (this.readByte() === null) {
        throw new TruncatedInputError(count, count - remaining);
      }
      remaining -= 1;
    }
  }

  readLine(): string | null {
    let line = '';
    let sawByte = false;
    for (;;) {
      const value = this.readByte();
      if (value === null) {
        return sawByte ? line : null;
      }
      sawByte = true;
      if (value === LINE_FEED) {
        return line;
      }
      line += String.fromCharCode(value);
    }
  }
}

/**
 * Byte source over an in-memory buffer (random-access medium)
 */
export class BufferByteSource extends SequentialByteSource {
  private readonly data: Uint8Array;
  private offset = 0;

  constructor(data: Uint8Array) {
    super();
    this.data = data;
  }

  /** Bytes not yet consumed. */
  get remaining(): number {
    return this.data.length - this.offset;
  }

  protected readInto(target: Uint8Array, offset: number, length: number): number {
    const n = Math.min(length, this.remaining);
    target.set(this.data.subarray(this.offset, this.offset + n), offset);
    this.offset += n;
    return n;
  }

  protected skipBytes(count: number): number {
    const n = Math.min(count, this.remaining);
    this.offset += n;
    return n;
  }
}
