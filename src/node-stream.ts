/**
 * Node.js stream helpers for imgprobe.
 *
 * Import from `imgprobe/stream`:
 * ```ts
 * import { createProbeStream } from 'imgprobe/stream';
 * import { createReadStream, createWriteStream } from 'node:fs';
 *
 * createReadStream('photo.jpg')
 *   .pipe(createProbeStream({ collectComments: true }))
 *   .on('probe', result => console.log(result))
 *   .pipe(createWriteStream('copy.jpg'));
 * ```
 */

import { Transform, type TransformOptions } from 'node:stream';
import { detect } from './detect.js';
import { ChunkListByteSource } from './io/chunk-source.js';
import type { DetectOptions, DetectionResult } from './types.js';

function toBuffer(chunk: Buffer | Uint8Array | string): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  return typeof chunk === 'string' ? Buffer.from(chunk) : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

/**
 * Holds the start of a stream until its header can be decided.
 *
 * Detection is retried whenever the buffered size has doubled since the
 * last attempt, so a header spread over many small chunks is re-read a
 * logarithmic number of times. The first result that is not `truncated`
 * is final; the buffer is released and later chunks are ignored.
 */
class HeaderCollector {
  private readonly options: DetectOptions;
  private chunks: Uint8Array[] = [];
  private size = 0;
  private nextAttempt = 0;
  private settled: DetectionResult | undefined;

  constructor(options: DetectOptions) {
    this.options = options;
  }

  get bufferedLength(): number {
    return this.size;
  }

  /** `true` once the result no longer depends on further input. */
  get done(): boolean {
    return this.settled !== undefined;
  }

  push(chunk: Uint8Array): void {
    if (this.settled || chunk.length === 0) return;
    this.chunks.push(chunk);
    this.size += chunk.length;
    if (this.size < this.nextAttempt) return;

    this.nextAttempt = this.size * 2;
    const result = detect(new ChunkListByteSource(this.chunks, false), this.options);
    if (result.ok || result.failure.kind !== 'truncated') {
      this.settled = result;
      this.chunks = [];
      this.size = 0;
    }
  }

  /** Result at end of input. */
  finish(): DetectionResult {
    const result = this.settled ?? detect(new ChunkListByteSource(this.chunks, true), this.options);
    this.settled = result;
    this.chunks = [];
    this.size = 0;
    return result;
  }
}

/**
 * Pass-through stream that forwards every chunk unchanged and emits
 * `'probe'` with the `DetectionResult` once the input has ended.
 *
 * Only the bytes needed to decide the header are held back.
 * Instantiated via `createProbeStream(options)` rather than directly.
 */
export class ProbeTransform extends Transform {
  private readonly _collector: HeaderCollector;

  constructor(probeOptions: DetectOptions = {}, streamOptions?: TransformOptions) {
    super(streamOptions);
    this._collector = new HeaderCollector(probeOptions);
  }

  /** Bytes currently held for header detection */
  get bufferedLength(): number {
    return this._collector.bufferedLength;
  }

  override _transform(
    chunk: Buffer | Uint8Array | string,
    _encoding: BufferEncoding,
    callback: (err?: Error | null, data?: unknown) => void
  ): void {
    const data = toBuffer(chunk);
    try {
      this._collector.push(data);
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    callback(null, data);
  }

  override _flush(callback: (err?: Error | null) => void): void {
    try {
      this.emit('probe', this._collector.finish());
      callback();
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
    }
  }
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * Create a Node.js Transform stream that reports the header of a piped
 * image while passing its bytes through.
 */
export function createProbeStream(options: DetectOptions = {}): ProbeTransform {
  return new ProbeTransform(options);
}

/**
 * Probe a readable stream (or any async iterable of chunks). Iteration
 * stops as soon as the header is decided, which ends the iterable early.
 */
export async function probeStream(
  input: AsyncIterable<Buffer | Uint8Array | string>,
  options: DetectOptions = {},
): Promise<DetectionResult> {
  const collector = new HeaderCollector(options);
  for await (const chunk of input) {
    collector.push(toBuffer(chunk));
    if (collector.done) break;
  }
  return collector.finish();
}
