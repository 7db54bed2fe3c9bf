import { BufferOverflowError } from '../errors.js';

/**
 * Read an unsigned 16-bit integer (big-endian)
 */
export function readUint16BE(data: Uint8Array, offset: number): number {
  if (offset + 2 > data.length) {
    throw new BufferOverflowError(offset + 2, data.length);
  }
  return (data[offset]! << 8) | data[offset + 1]!;
}

/**
 * Read an unsigned 16-bit integer (little-endian)
 */
export function readUint16LE(data: Uint8Array, offset: number): number {
  if (offset + 2 > data.length) {
    throw new BufferOverflowError(offset + 2, data.length);
  }
  return data[offset]! | (data[offset + 1]! << 8);
}

/**
 * Read an unsigned 32-bit integer (big-endian)
 */
export function readUint32BE(data: Uint8Array, offset: number): number {
  return readInt32BE(data, offset) >>> 0;
}

/**
 * Read a signed 32-bit integer (big-endian)
 */
export function readInt32BE(data: Uint8Array, offset: number): number {
  if (offset + 4 > data.length) {
    throw new BufferOverflowError(offset + 4, data.length);
  }
  return (
    (data[offset]! << 24) |
    (data[offset + 1]! << 16) |
    (data[offset + 2]! << 8) |
    data[offset + 3]!
  );
}

/**
 * Read a signed 32-bit integer (little-endian)
 */
export function readInt32LE(data: Uint8Array, offset: number): number {
  if (offset + 4 > data.length) {
    throw new BufferOverflowError(offset + 4, data.length);
  }
  return (
    data[offset]! |
    (data[offset + 1]! << 8) |
    (data[offset + 2]! << 16) |
    (data[offset + 3]! << 24)
  );
}
