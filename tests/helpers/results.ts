import type { DetectionFailure, DetectionResult, ImageMetadata } from '../../src/types.js';

/**
 * Metadata of a successful detection; fails the test otherwise
 */
export function metadataOf(result: DetectionResult): ImageMetadata {
  if (!result.ok) {
    throw new Error(`Expected detection to succeed: ${result.failure.message}`);
  }
  return result.metadata;
}

/**
 * Failure of an unsuccessful detection; fails the test otherwise
 */
export function failureOf(result: DetectionResult): DetectionFailure {
  if (result.ok) {
    throw new Error(`Expected detection to fail, got ${result.metadata.format}`);
  }
  return result.failure;
}
