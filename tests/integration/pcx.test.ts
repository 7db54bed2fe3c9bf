import { describe, it, expect } from 'vitest';
import { probeSync, physicalWidthInch } from '../../src/index.js';
import { createPcxHeader } from '../helpers/create-test-headers.js';
import { failureOf, metadataOf } from '../helpers/results.js';

describe('PCX Integration Tests', () => {
  it('should read size from the window and resolution from the horizontal field', () => {
    expect(probeSync(createPcxHeader())).toEqual({
      ok: true,
      metadata: {
        format: 'pcx',
        width: 10,
        height: 5,
        bitsPerPixel: 8,
        progressive: false,
        numberOfImages: 1,
        physicalWidthDpi: 300,
        physicalHeightDpi: 300,
        comments: [],
      },
    });
  });

  it('should measure the window from its origin', () => {
    const metadata = metadataOf(probeSync(createPcxHeader({ window: [10, 20, 10, 29] })));

    expect(metadata.width).toBe(1);
    expect(metadata.height).toBe(10);
  });

  it.each([1, 2, 4, 8])('should accept one plane of %i bits', bits => {
    expect(metadataOf(probeSync(createPcxHeader({ bits }))).bitsPerPixel).toBe(bits);
  });

  it('should report three 8-bit planes as 24 bits', () => {
    expect(metadataOf(probeSync(createPcxHeader({ planes: 3 }))).bitsPerPixel).toBe(24);
  });

  it('should reject other plane layouts', () => {
    expect(failureOf(probeSync(createPcxHeader({ planes: 3, bits: 4 }))).kind).toBe('malformed-header');
    expect(failureOf(probeSync(createPcxHeader({ planes: 2 }))).kind).toBe('malformed-header');
    expect(failureOf(probeSync(createPcxHeader({ bits: 3 }))).kind).toBe('malformed-header');
  });

  it('should reject anything but run-length encoding', () => {
    const failure = failureOf(probeSync(createPcxHeader({ encoding: 0 })));

    expect(failure.kind).toBe('malformed-header');
    expect(failure.message).toBe('Invalid PCX encoding 0 at offset 2');
  });

  it('should reject an inverted window', () => {
    expect(failureOf(probeSync(createPcxHeader({ window: [5, 0, 2, 0] }))).kind).toBe(
      'malformed-header'
    );
  });

  it('should report a zero resolution as present but without physical size', () => {
    const metadata = metadataOf(probeSync(createPcxHeader({ hDpi: 0 })));

    expect(metadata.physicalWidthDpi).toBe(0);
    expect(metadata.physicalHeightDpi).toBe(0);
    expect(physicalWidthInch(metadata)).toBeUndefined();
  });
});
