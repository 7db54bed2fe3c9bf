import { readSync } from 'node:fs';
import { TruncatedInputError } from '../errors.js';
import { SequentialByteSource } from './byte-source.js';

const DEFAULT_CHUNK_SIZE = 4096;

/**
 * Byte source over a file descriptor read sequentially (files, pipes, stdin).
 *
 * Reads ahead in chunks, so the descriptor may be advanced past the last
 * header byte. Bulk skips only discard what is already buffered; the rest
 * goes through the byte-at-a-time fallback, which refills the buffer.
 * The descriptor is never closed here.
 */
export class FileByteSource extends SequentialByteSource {
  private readonly fd: number;
  private readonly buffer: Uint8Array;
  private start = 0;
  private end = 0;

  constructor(fd: number, chunkSize = DEFAULT_CHUNK_SIZE) {
    super();
    this.fd = fd;
    this.buffer = new Uint8Array(Math.max(1, chunkSize));
  }

  private fill(): boolean {
    if (this.start < this.end) {
      return true;
    }
    let n: number;
    try {
      n = readSync(this.fd, this.buffer, 0, this.buffer.length, null);
    } catch (err) {
      throw new TruncatedInputError(this.buffer.length, undefined, { cause: err });
    }
    this.start = 0;
    this.end = n;
    return n > 0;
  }

  protected readInto(target: Uint8Array, offset: number, length: number): number {
    if (!this.fill()) {
      return 0;
    }
    const n = Math.min(length, this.end - this.start);
    target.set(this.buffer.subarray(this.start, this.start + n), offset);
    this.start += n;
    return n;
  }

  protected skipBytes(count: number): number {
    const n = Math.min(count, this.end - this.start);
    this.start += n;
    return n;
  }
}
