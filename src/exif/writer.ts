/**
 * Minimal EXIF builder.
 *
 * Constructs a well-formed big-endian TIFF/EXIF block holding only the
 * entries the scrub re-seeds (allow-listed camera tags copied from the
 * original, plus stamped copyright/comment) and wraps it in a JPEG APP1
 * segment.
 *
 * Layout:
 *   offset 0 : byte-order 'MM', TIFF magic 0x002A, IFD0 offset = 8
 *   offset 8 : IFD0 entries, next-IFD = 0, IFD0 out-of-line values
 *   then     : Exif sub-IFD (pointed to by tag 0x8769) and its values
 */

import { concat, fromAscii, fromUtf8 } from '../binary/bytes.js';
import { writeUint16, writeUint32, swapUnits } from '../binary/endian.js';
import { TAG, TYPE, TYPE_SIZES, TYPE_UNIT_SIZES } from './tags.js';
import { entryValueBytes } from './reader.js';
import type { IfdEntry } from './reader.js';

/**
 * One entry to write. `value` is already in big-endian byte order.
 */
export interface TiffEntry {
  tag: number;
  type: number;
  count: number;
  value: Uint8Array;
}

const EXIF_HEADER = fromAscii('Exif\x00\x00');

function padded(length: number): number {
  return length + (length % 2);
}

function ifdSize(entries: TiffEntry[]): number {
  const outOfLine = entries.reduce((sum, e) => sum + (e.value.length > 4 ? padded(e.value.length) : 0), 0);
  return 2 + entries.length * 12 + 4 + outOfLine;
}

function writeIfd(out: Uint8Array, start: number, entries: TiffEntry[]): void {
  writeUint16(out, start, entries.length);
  let valuePos = start + 2 + entries.length * 12 + 4;

  for (const [i, e] of entries.entries()) {
    const pos = start + 2 + i * 12;
    writeUint16(out, pos, e.tag);
    writeUint16(out, pos + 2, e.type);
    writeUint32(out, pos + 4, e.count);
    if (e.value.length <= 4) {
      out.set(e.value, pos + 8);
    } else {
      writeUint32(out, pos + 8, valuePos);
      out.set(e.value, valuePos);
      valuePos += padded(e.value.length);
    }
  }

  writeUint32(out, start + 2 + entries.length * 12, 0); // next IFD = none
}

const byTag = (a: TiffEntry, b: TiffEntry) => a.tag - b.tag;

/**
 * Build a TIFF block from IFD0 and Exif sub-IFD entries. Returns an empty
 * array when there is nothing to write.
 */
export function buildTiffBlock(ifd0: TiffEntry[], exifIfd: TiffEntry[] = []): Uint8Array {
  if (ifd0.length === 0 && exifIfd.length === 0) {
    return new Uint8Array(0);
  }

  const primary = ifd0.filter(e => e.tag !== TAG.EXIF_POINTER);
  const headerSize = 8;
  const pointer: TiffEntry = { tag: TAG.EXIF_POINTER, type: TYPE.LONG, count: 1, value: new Uint8Array(4) };
  if (exifIfd.length > 0) primary.push(pointer);
  primary.sort(byTag);
  const secondary = [...exifIfd].sort(byTag);

  const exifOffset = headerSize + ifdSize(primary);
  writeUint32(pointer.value, 0, exifOffset);

  const out = new Uint8Array(exifOffset + (secondary.length > 0 ? ifdSize(secondary) : 0));
  out.set([0x4d, 0x4d, 0x00, 0x2a]); // 'MM' + TIFF magic
  writeUint32(out, 4, headerSize);

  writeIfd(out, headerSize, primary);
  if (secondary.length > 0) writeIfd(out, exifOffset, secondary);

  return out;
}

// ─── Entry builders ──────────────────────────────────────────────────────────

/**
 * NUL-terminated UTF-8 ASCII entry.
 */
export function asciiEntry(tag: number, value: string): TiffEntry {
  const bytes = concat(fromUtf8(value), new Uint8Array(1));
  return { tag, type: TYPE.ASCII, count: bytes.length, value: bytes };
}

/**
 * UserComment entry: ASCII character code when possible, UTF-16BE otherwise.
 */
export function userCommentEntry(text: string): TiffEntry {
  const isAscii = [...text].every(ch => ch.charCodeAt(0) < 0x80);
  let payload: Uint8Array;
  if (isAscii) {
    payload = concat(fromAscii('ASCII\x00\x00\x00'), fromAscii(text));
  } else {
    payload = new Uint8Array(8 + text.length * 2);
    payload.set(fromAscii('UNICODE\x00'));
    for (let i = 0; i < text.length; i++) {
      writeUint16(payload, 8 + i * 2, text.charCodeAt(i));
    }
  }
  return { tag: TAG.USER_COMMENT, type: TYPE.UNDEFINED, count: payload.length, value: payload };
}

/**
 * Re-encode an entry read from a source block as a big-endian TiffEntry,
 * or null when its value cannot be read.
 */
export function copyEntry(source: Uint8Array, entry: IfdEntry, littleEndian: boolean): TiffEntry | null {
  if (TYPE_SIZES[entry.type] === undefined) return null;
  const bytes = entryValueBytes(source, entry);
  if (!bytes) return null;
  const unit = TYPE_UNIT_SIZES[entry.type] ?? 1;
  return {
    tag: entry.tag,
    type: entry.type,
    count: entry.count,
    value: littleEndian ? swapUnits(bytes, unit) : bytes,
  };
}

// ─── JPEG APP1 segment ────────────────────────────────────────────────────────

/**
 * Wrap a raw TIFF/EXIF block in a JPEG APP1 segment.
 */
export function wrapInJpegApp1(tiff: Uint8Array): Uint8Array {
  if (tiff.length === 0) {
    return new Uint8Array(0);
  }
  const content = concat(EXIF_HEADER, tiff);
  const seg = new Uint8Array(4 + content.length);
  seg[0] = 0xff;
  seg[1] = 0xe1;
  writeUint16(seg, 2, content.length + 2);
  seg.set(content, 4);
  return seg;
}
