/**
 * Low-level EXIF / TIFF IFD reader.
 *
 * Walks a raw TIFF-formatted block (starting with the II/MM byte-order mark)
 * through IFD0, the Exif, GPS and Interop sub-IFDs and IFD1. Used by the
 * built-in engine to copy allow-listed entries and by the inspector to list
 * what a file still carries.
 */

import { toUtf8, toAscii } from '../binary/bytes.js';
import { readUint16, readUint32 } from '../binary/endian.js';
import { TAG, TYPE, TYPE_SIZES, tagName } from './tags.js';
import type { DirectoryName } from './tags.js';
import type { TagMap } from '../types.js';

// ─── Raw IFD entry ────────────────────────────────────────────────────────────

export interface IfdEntry {
  tag: number;
  type: number;
  count: number;
  /** Byte offset where the value lives (only meaningful when > 4 bytes). */
  valueOffset: number;
  /** Original 4 raw bytes from the entry (used for inline values). */
  rawValueBytes: Uint8Array;
}

export interface ExifDirectory {
  name: DirectoryName;
  entries: IfdEntry[];
}

export interface ParsedExif {
  littleEndian: boolean;
  data: Uint8Array;
  directories: ExifDirectory[];
}

const MAX_ENTRIES = 512;

// ─── IFD parser ──────────────────────────────────────────────────────────────

/**
 * Parse all entries of one IFD, returning { entries, nextIfdOffset }.
 * Truncated directories yield the entries that fit.
 */
export function parseIfd(
  data: Uint8Array,
  offset: number,
  le: boolean
): { entries: IfdEntry[]; nextIfdOffset: number } {
  const entries: IfdEntry[] = [];
  if (offset + 2 > data.length) return { entries, nextIfdOffset: 0 };

  const numEntries = readUint16(data, offset, le);
  if (numEntries > MAX_ENTRIES) return { entries, nextIfdOffset: 0 };

  for (let i = 0; i < numEntries; i++) {
    const pos = offset + 2 + i * 12;
    if (pos + 12 > data.length) break;
    entries.push({
      tag: readUint16(data, pos, le),
      type: readUint16(data, pos + 2, le),
      count: readUint32(data, pos + 4, le),
      valueOffset: readUint32(data, pos + 8, le),
      rawValueBytes: data.slice(pos + 8, pos + 12),
    });
  }

  const nextPtr = offset + 2 + numEntries * 12;
  const nextIfdOffset = nextPtr + 4 <= data.length ? readUint32(data, nextPtr, le) : 0;
  return { entries, nextIfdOffset };
}

/**
 * Raw value bytes of an entry in the block's own byte order, or null when
 * the value points outside the block.
 */
export function entryValueBytes(data: Uint8Array, entry: IfdEntry): Uint8Array | null {
  const size = (TYPE_SIZES[entry.type] ?? 1) * entry.count;
  if (size <= 4) return entry.rawValueBytes.slice(0, size);
  if (entry.valueOffset + size > data.length) return null;
  return data.slice(entry.valueOffset, entry.valueOffset + size);
}

/**
 * Walk every directory reachable from IFD0. Returns no directories for
 * blocks without a valid TIFF header.
 */
export function parseExifBlock(data: Uint8Array): ParsedExif {
  const byteOrder = toAscii(data, 0, 2);
  const littleEndian = byteOrder === 'II';
  const parsed: ParsedExif = { littleEndian, data, directories: [] };
  if (data.length < 8 || (byteOrder !== 'II' && byteOrder !== 'MM')) return parsed;
  if (readUint16(data, 2, littleEndian) !== 42) return parsed;

  const visited = new Set<number>();
  const visit = (name: DirectoryName, offset: number): ExifDirectory | null => {
    if (offset === 0 || visited.has(offset)) return null;
    visited.add(offset);
    const { entries, nextIfdOffset } = parseIfd(data, offset, littleEndian);
    const directory: ExifDirectory = { name, entries };
    parsed.directories.push(directory);
    if (name === 'IFD0' && nextIfdOffset !== 0) visit('IFD1', nextIfdOffset);
    return directory;
  };

  const ifd0 = visit('IFD0', readUint32(data, 4, littleEndian));
  if (!ifd0) return parsed;

  const pointer = (dir: ExifDirectory, tag: number) =>
    dir.entries.find(e => e.tag === tag && (e.type === TYPE.LONG || e.type === 13))?.valueOffset ?? 0;

  const exif = visit('ExifIFD', pointer(ifd0, TAG.EXIF_POINTER));
  visit('GPS', pointer(ifd0, TAG.GPS_POINTER));
  if (exif) visit('InteropIFD', pointer(exif, TAG.INTEROP_POINTER));

  return parsed;
}

/**
 * Find an entry by directory and tag.
 */
export function findEntry(parsed: ParsedExif, directory: DirectoryName, tag: number): IfdEntry | undefined {
  return parsed.directories.find(d => d.name === directory)?.entries.find(e => e.tag === tag);
}

// ─── Value formatting ────────────────────────────────────────────────────────

function readNumbers(bytes: Uint8Array, type: number, count: number, le: boolean): number[] {
  const out: number[] = [];
  const unit = TYPE_SIZES[type] ?? 1;
  for (let i = 0; i < count && (i + 1) * unit <= bytes.length; i++) {
    const off = i * unit;
    switch (type) {
      case TYPE.BYTE:
        out.push(bytes[off] ?? 0);
        break;
      case TYPE.SHORT:
        out.push(readUint16(bytes, off, le));
        break;
      case TYPE.SSHORT: {
        const v = readUint16(bytes, off, le);
        out.push(v > 0x7fff ? v - 0x10000 : v);
        break;
      }
      case TYPE.LONG:
        out.push(readUint32(bytes, off, le));
        break;
      case TYPE.SLONG:
        out.push(readUint32(bytes, off, le) | 0);
        break;
    }
  }
  return out;
}

function formatRationals(bytes: Uint8Array, count: number, le: boolean, signed: boolean): string {
  const parts: string[] = [];
  for (let i = 0; i < count && i * 8 + 8 <= bytes.length; i++) {
    let num = readUint32(bytes, i * 8, le);
    let den = readUint32(bytes, i * 8 + 4, le);
    if (signed) {
      num |= 0;
      den |= 0;
    }
    parts.push(`${num}/${den}`);
  }
  return parts.join(' ');
}

/**
 * Decode an EXIF UserComment (8-byte character code + payload).
 */
export function decodeUserComment(bytes: Uint8Array, le: boolean): string {
  const code = toAscii(bytes, 0, 8).replace(/\0+$/, '');
  const payload = bytes.subarray(8);
  if (code === 'UNICODE') {
    let s = '';
    for (let i = 0; i + 1 < payload.length; i += 2) {
      const unit = readUint16(payload, i, le);
      if (unit === 0) break;
      s += String.fromCharCode(unit);
    }
    return s;
  }
  return toUtf8(payload).trim();
}

/**
 * Render an entry's value as display text.
 */
export function formatEntryValue(data: Uint8Array, entry: IfdEntry, le: boolean): string {
  const bytes = entryValueBytes(data, entry);
  if (!bytes) return '(invalid offset)';

  switch (entry.type) {
    case TYPE.ASCII:
      return toUtf8(bytes).trim();
    case TYPE.RATIONAL:
      return formatRationals(bytes, entry.count, le, false);
    case TYPE.SRATIONAL:
      return formatRationals(bytes, entry.count, le, true);
    case TYPE.UNDEFINED:
      if (entry.tag === TAG.USER_COMMENT) return decodeUserComment(bytes, le);
      return `(Binary data ${bytes.length} bytes)`;
    default: {
      const nums = readNumbers(bytes, entry.type, entry.count, le);
      return nums.length > 0 ? nums.join(' ') : `(Binary data ${bytes.length} bytes)`;
    }
  }
}

// ─── Main entry point ────────────────────────────────────────────────────────

/**
 * Flatten a TIFF-format EXIF block into `Directory:TagName → value`.
 * Harmless to call on malformed data.
 */
export function readExifTags(exifData: Uint8Array): TagMap {
  const tags: TagMap = {};
  const parsed = parseExifBlock(exifData);
  for (const directory of parsed.directories) {
    for (const entry of directory.entries) {
      tags[`${directory.name}:${tagName(directory.name, entry.tag)}`] = formatEntryValue(
        exifData,
        entry,
        parsed.littleEndian
      );
    }
  }
  return tags;
}
