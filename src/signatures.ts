/**
 * Magic bytes and signature continuations checked while probing headers.
 *
 * The two-byte magic numbers select a checker; the tails are verified by
 * that checker against the bytes that follow.
 */
export const MAGIC = {
  GIF: [0x47, 0x49], // "GI"
  PNG: [0x89, 0x50], // \x89 "P"
  JPEG: [0xff, 0xd8], // SOI marker
  BMP: [0x42, 0x4d], // "BM"
  PCX: 0x0a, // manufacturer byte, followed by a version below 6
  IFF: [0x46, 0x4f], // "FO"
  RAS: [0x59, 0xa6],
  PNM: 0x50, // "P", followed by "1".."6"
  PSD: [0x38, 0x42], // "8B"
} as const;

export const SIGNATURE_TAILS = {
  GIF87a: new Uint8Array([0x46, 0x38, 0x37, 0x61]), // "F87a"
  GIF89a: new Uint8Array([0x46, 0x38, 0x39, 0x61]), // "F89a"
  PNG: new Uint8Array([0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]), // "NG\r\n\x1a\n"
  IFF: new Uint8Array([0x52, 0x4d]), // "RM" of "FORM"
  RAS: new Uint8Array([0x6a, 0x95]),
  PSD: new Uint8Array([0x50, 0x53]), // "PS" of "8BPS"
} as const;

/** "JFIF\0" identifier at the start of an APP0 segment */
export const JFIF_ID = new Uint8Array([0x4a, 0x46, 0x49, 0x46, 0x00]);

/** IFF form types and chunk ids, as big-endian 32-bit values */
export const IFF_IDS = {
  ILBM: 0x494c424d, // "ILBM"
  PBM: 0x50424d20, // "PBM "
  BMHD: 0x424d4844, // "BMHD"
} as const;
