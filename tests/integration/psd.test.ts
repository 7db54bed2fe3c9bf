import { describe, it, expect } from 'vitest';
import { probeSync } from '../../src/index.js';
import { createPsdHeader } from '../helpers/create-test-headers.js';
import { failureOf, metadataOf } from '../helpers/results.js';

describe('PSD Integration Tests', () => {
  it('should read the file header', () => {
    expect(probeSync(createPsdHeader())).toEqual({
      ok: true,
      metadata: {
        format: 'psd',
        width: 300,
        height: 200,
        bitsPerPixel: 24,
        progressive: false,
        numberOfImages: 1,
        comments: [],
      },
    });
  });

  it('should multiply channels by channel depth', () => {
    expect(metadataOf(probeSync(createPsdHeader(1, 1, 4, 16))).bitsPerPixel).toBe(64);
    expect(metadataOf(probeSync(createPsdHeader(1, 1, 1, 1))).bitsPerPixel).toBe(1);
  });

  it('should reject more than 64 bits per pixel', () => {
    const failure = failureOf(probeSync(createPsdHeader(1, 1, 5, 16)));

    expect(failure.kind).toBe('malformed-header');
    expect(failure.message).toBe('Invalid PSD depth: 5 channel(s) of 16 bits at offset 26');
  });

  it('should reject zero channels', () => {
    expect(failureOf(probeSync(createPsdHeader(1, 1, 0, 8))).kind).toBe('malformed-header');
  });

  it('should reject zero dimensions', () => {
    expect(failureOf(probeSync(createPsdHeader(0, 10))).kind).toBe('malformed-header');
  });

  it('should reject a damaged signature', () => {
    const data = createPsdHeader();
    data[3] = 0x00;
    const failure = failureOf(probeSync(data));

    expect(failure.kind).toBe('malformed-header');
    expect(failure.offset).toBe(2);
  });
});
