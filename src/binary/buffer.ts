/**
 * Check if pattern exists at a specific offset
 */
export function matchesAt(
  data: Uint8Array,
  offset: number,
  pattern: Uint8Array | readonly number[]
): boolean {
  if (offset + pattern.length > data.length) {
    return false;
  }
  for (let i = 0; i < pattern.length; i++) {
    if (data[offset + i] !== pattern[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Check if data starts with a specific pattern
 */
export function startsWith(data: Uint8Array, pattern: Uint8Array | readonly number[]): boolean {
  return matchesAt(data, 0, pattern);
}

/**
 * Decode bytes one character per byte (ISO-8859-1)
 */
export function toLatin1(data: Uint8Array, offset = 0, length?: number): string {
  const end = length !== undefined ? Math.min(offset + length, data.length) : data.length;
  let result = '';
  for (let i = offset; i < end; i++) {
    result += String.fromCharCode(data[i]!);
  }
  return result;
}

/**
 * Encode a string one byte per character, keeping the low 8 bits
 */
export function fromLatin1(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Drop code units up to and including space (0x20) from both ends. Unlike
 * `String.prototype.trim` this removes NUL and other C0 controls and keeps
 * U+00A0.
 */
export function trimLatin1(text: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && text.charCodeAt(start) <= 0x20) start++;
  while (end > start && text.charCodeAt(end - 1) <= 0x20) end--;
  return text.substring(start, end);
}
