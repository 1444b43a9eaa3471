/**
 * Byte-array helpers shared by the JPEG codec and the EXIF reader/writer.
 */

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8');

/**
 * Concatenate multiple Uint8Arrays
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Check if pattern exists at a specific offset
 */
export function matchesAt(data: Uint8Array, offset: number, pattern: Uint8Array): boolean {
  if (offset < 0 || offset + pattern.length > data.length) {
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
 * Find a pattern in a Uint8Array, or -1
 */
export function indexOf(data: Uint8Array, pattern: Uint8Array, startOffset = 0): number {
  const last = data.length - pattern.length;
  for (let i = startOffset; i <= last; i++) {
    if (matchesAt(data, i, pattern)) {
      return i;
    }
  }
  return -1;
}

/**
 * Latin-1 encode (one byte per char code)
 */
export function fromAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

export function toAscii(data: Uint8Array, offset = 0, length?: number): string {
  const end = Math.min(length !== undefined ? offset + length : data.length, data.length);
  let result = '';
  for (let i = offset; i < end; i++) {
    result += String.fromCharCode(data[i] ?? 0);
  }
  return result;
}

export function fromUtf8(str: string): Uint8Array {
  return utf8Encoder.encode(str);
}

/**
 * Decode UTF-8, stopping at the first NUL.
 */
export function toUtf8(data: Uint8Array): string {
  const nul = data.indexOf(0);
  return utf8Decoder.decode(nul === -1 ? data : data.subarray(0, nul));
}

/**
 * Truncate a string so its UTF-8 encoding fits in `maxBytes`, never
 * splitting a code point.
 */
export function truncateUtf8(value: string, maxBytes: number): string {
  const encoded = utf8Encoder.encode(value);
  if (encoded.length <= maxBytes) {
    return value;
  }
  let end = maxBytes;
  // back off continuation bytes (10xxxxxx)
  while (end > 0 && ((encoded[end] ?? 0) & 0xc0) === 0x80) {
    end--;
  }
  return utf8Decoder.decode(encoded.subarray(0, end));
}
