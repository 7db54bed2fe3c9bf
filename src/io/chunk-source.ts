import { TruncatedInputError } from '../errors.js';
import { SequentialByteSource } from './byte-source.js';

/**
 * Byte source over the chunks of a stream received so far.
 *
 * While the stream is still open (`ended` is false) running out of chunks
 * is not end of input: any read past the received bytes throws
 * `TruncatedInputError`, even where a checker would accept end of input
 * (the last line of a PNM header). Only an ended source reports end of
 * input normally.
 */
export class ChunkListByteSource extends SequentialByteSource {
  private readonly chunks: readonly Uint8Array[];
  private readonly ended: boolean;
  private index = 0;
  private offset = 0;

  constructor(chunks: readonly Uint8Array[], ended: boolean) {
    super();
    this.chunks = chunks;
    this.ended = ended;
  }

  private current(): Uint8Array | undefined {
    let chunk = this.chunks[this.index];
    while (chunk !== undefined && this.offset >= chunk.length) {
      this.index++;
      this.offset = 0;
      chunk = this.chunks[this.index];
    }
    return chunk;
  }

  protected readInto(target: Uint8Array, offset: number, length: number): number {
    const chunk = this.current();
    if (chunk === undefined) {
      if (!this.ended) {
        throw new TruncatedInputError(length, 0);
      }
      return 0;
    }
    const n = Math.min(length, chunk.length - this.offset);
    target.set(chunk.subarray(this.offset, this.offset + n), offset);
    this.offset += n;
    return n;
  }

  protected skipBytes(count: number): number {
    const chunk = this.current();
    if (chunk === undefined) {
      return 0;
    }
    const n = Math.min(count, chunk.length - this.offset);
    this.offset += n;
    return n;
  }
}
