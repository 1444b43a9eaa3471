import { BufferOverflowError } from '../errors.js';

function ensure(data: Uint8Array, offset: number, size: number): void {
  if (offset < 0 || offset + size > data.length) {
    throw new BufferOverflowError(offset + size, data.length);
  }
}

/**
 * Read an unsigned 16-bit integer
 */
export function readUint16(data: Uint8Array, offset: number, littleEndian = false): number {
  ensure(data, offset, 2);
  const a = data[offset]!;
  const b = data[offset + 1]!;
  return littleEndian ? a | (b << 8) : (a << 8) | b;
}

/**
 * Read an unsigned 32-bit integer
 */
export function readUint32(data: Uint8Array, offset: number, littleEndian = false): number {
  ensure(data, offset, 4);
  const b0 = data[offset]!;
  const b1 = data[offset + 1]!;
  const b2 = data[offset + 2]!;
  const b3 = data[offset + 3]!;
  return littleEndian
    ? (b0 | (b1 << 8) | (b2 << 16) | (b3 << 24)) >>> 0
    : ((b0 << 24) | (b1 << 16) | (b2 << 8) | b3) >>> 0;
}

/**
 * Write an unsigned 16-bit integer
 */
export function writeUint16(data: Uint8Array, offset: number, value: number, littleEndian = false): void {
  ensure(data, offset, 2);
  const hi = (value >> 8) & 0xff;
  const lo = value & 0xff;
  data[offset] = littleEndian ? lo : hi;
  data[offset + 1] = littleEndian ? hi : lo;
}

/**
 * Write an unsigned 32-bit integer
 */
export function writeUint32(data: Uint8Array, offset: number, value: number, littleEndian = false): void {
  ensure(data, offset, 4);
  for (let i = 0; i < 4; i++) {
    const shift = littleEndian ? i * 8 : (3 - i) * 8;
    data[offset + i] = (value >>> shift) & 0xff;
  }
}

/**
 * Reverse the byte order of every `unitSize`-byte unit in a copy of `data`.
 * Used to move TIFF values between II and MM byte orders.
 */
export function swapUnits(data: Uint8Array, unitSize: number): Uint8Array {
  const out = data.slice();
  if (unitSize <= 1) return out;
  for (let base = 0; base + unitSize <= out.length; base += unitSize) {
    out.subarray(base, base + unitSize).reverse();
  }
  return out;
}
