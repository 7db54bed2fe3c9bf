import { openSync, closeSync } from 'node:fs';
import { open } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ReadableStream } from 'node:stream/web';
import { detect } from './detect.js';
import { FileByteSource } from './io/file-source.js';
import { probeStream } from './node-stream.js';
import { HttpStatusError } from './errors.js';
import type { DetectOptions, DetectionResult } from './types.js';

export type ProbeFileResult = DetectionResult & {
  /** Absolute path of the inspected file */
  path: string;
};

/**
 * Inspect the header of a file on disk. Only the bytes the format's
 * grammar needs are read (rounded up to one read-ahead chunk).
 *
 * Throws when the file cannot be opened; a file that is not a readable
 * image is reported through the result.
 */
export function probeFileSync(inputPath: string, options: DetectOptions = {}): ProbeFileResult {
  const absPath = resolve(inputPath);
  const fd = openSync(absPath, 'r');
  try {
    return { ...detect(new FileByteSource(fd), options), path: absPath };
  } finally {
    closeSync(fd);
  }
}

/**
 * Promise form of `probeFileSync`. The file is opened and closed
 * asynchronously; the header reads themselves are synchronous.
 */
export async function probeFile(
  inputPath: string,
  options: DetectOptions = {},
): Promise<ProbeFileResult> {
  const absPath = resolve(inputPath);
  const handle = await open(absPath, 'r');
  try {
    return { ...detect(new FileByteSource(handle.fd), options), path: absPath };
  } finally {
    await handle.close();
  }
}

// ─── URLs ─────────────────────────────────────────────────────────────────────

export type ProbeUrlResult = DetectionResult & {
  /** The requested URL */
  url: string;
};

/**
 * `true` for `http://` and `https://` addresses
 */
export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

async function* bodyChunks(body: ReadableStream<Uint8Array> | null): AsyncGenerator<Uint8Array> {
  if (!body) return;
  const reader = body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    // Stops the download when detection finished early
    await reader.cancel();
  }
}

/**
 * Inspect the header of an image served over HTTP(S). The response body
 * is read only until the header is decided.
 *
 * Throws `HttpStatusError` for a non-2xx response and rejects with the
 * fetch error when the server cannot be reached.
 */
export async function probeUrl(url: string, options: DetectOptions = {}): Promise<ProbeUrlResult> {
  const response = await fetch(url);
  if (!response.ok) {
    await response.body?.cancel();
    throw new HttpStatusError(response.status, response.statusText);
  }
  const result = await probeStream(bodyChunks(response.body), options);
  return { ...result, url };
}
