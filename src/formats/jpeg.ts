import { CorruptedFileError } from '../errors.js';
import { concat, fromAscii, matchesAt } from '../binary/bytes.js';
import { readUint16, writeUint16 } from '../binary/endian.js';

/**
 * JPEG marker constants
 */
export const MARKERS = {
  SOI: 0xffd8, // Start of Image
  EOI: 0xffd9, // End of Image
  SOS: 0xffda, // Start of Scan (image data follows)
  APP0: 0xffe0, // JFIF
  APP1: 0xffe1, // EXIF, XMP
  APP2: 0xffe2, // ICC Profile
  APP13: 0xffed, // IPTC/Photoshop
  APP14: 0xffee, // Adobe
  APP15: 0xffef,
  COM: 0xfffe, // Comment
} as const;

/**
 * Metadata signatures within APP segments
 */
export const SIGNATURES = {
  JFIF: fromAscii('JFIF\x00'),
  EXIF: fromAscii('Exif\x00\x00'),
  XMP: fromAscii('http://ns.adobe.com/xap/1.0/\x00'),
  XMP_EXT: fromAscii('http://ns.adobe.com/xmp/extension/\x00'),
  ICC: fromAscii('ICC_PROFILE\x00'),
  PHOTOSHOP: fromAscii('Photoshop 3.0\x00'),
  ADOBE: fromAscii('Adobe'),
} as const;

const SOI_SIGNATURE = new Uint8Array([0xff, 0xd8, 0xff]);
const SOI = new Uint8Array([0xff, 0xd8]);
const EOI = new Uint8Array([0xff, 0xd9]);

/**
 * JPEG segment structure. `data` holds the complete segment including its
 * marker and length bytes (or the whole entropy-coded scan for SOS).
 */
export interface JpegSegment {
  marker: number;
  data: Uint8Array;
  offset: number;
}

export type SegmentKind =
  | 'jfif'
  | 'exif'
  | 'xmp'
  | 'icc'
  | 'iptc'
  | 'adobe'
  | 'comment'
  | 'app'
  | 'scan'
  | 'eoi'
  | 'other';

/**
 * Parse JPEG into segments
 */
export function parseSegments(data: Uint8Array): JpegSegment[] {
  if (!matchesAt(data, 0, SOI_SIGNATURE)) {
    throw new CorruptedFileError('Invalid JPEG: missing SOI marker');
  }

  const segments: JpegSegment[] = [];
  let offset = 2; // Skip SOI

  while (offset < data.length - 1) {
    if (data[offset] !== 0xff) {
      throw new CorruptedFileError('Invalid JPEG: expected marker', offset);
    }

    // Skip padding 0xFF bytes
    while (offset < data.length && data[offset] === 0xff) {
      offset++;
    }

    if (offset >= data.length) {
      break;
    }

    const markerType = data[offset]!;
    offset++;

    // EOI has no length
    if (markerType === 0xd9) {
      segments.push({ marker: MARKERS.EOI, data: new Uint8Array(0), offset: offset - 2 });
      break;
    }

    // SOS: rest of file is image data (with possible EOI at end)
    if (markerType === 0xda) {
      const sosStart = offset - 2;
      let sosEnd = data.length;
      for (let i = data.length - 2; i > offset; i--) {
        if (data[i] === 0xff && data[i + 1] === 0xd9) {
          sosEnd = i;
          break;
        }
      }
      segments.push({ marker: MARKERS.SOS, data: data.slice(sosStart, sosEnd), offset: sosStart });
      if (sosEnd < data.length) {
        segments.push({ marker: MARKERS.EOI, data: new Uint8Array(0), offset: sosEnd });
      }
      break;
    }

    // RST markers (0xD0-0xD7) have no length
    if (markerType >= 0xd0 && markerType <= 0xd7) {
      segments.push({ marker: 0xff00 | markerType, data: new Uint8Array(0), offset: offset - 2 });
      continue;
    }

    if (offset + 2 > data.length) {
      throw new CorruptedFileError('Invalid JPEG: truncated segment', offset);
    }

    const length = readUint16(data, offset);
    if (length < 2) {
      throw new CorruptedFileError('Invalid JPEG: segment length too small', offset);
    }

    const segmentEnd = offset + length;
    if (segmentEnd > data.length) {
      throw new CorruptedFileError('Invalid JPEG: segment extends beyond file', offset);
    }

    segments.push({
      marker: 0xff00 | markerType,
      data: data.slice(offset - 2, segmentEnd),
      offset: offset - 2,
    });

    offset = segmentEnd;
  }

  if (!segments.some(s => s.marker === MARKERS.SOS)) {
    throw new CorruptedFileError('Invalid JPEG: no image data');
  }

  return segments;
}

/**
 * Bytes after the marker and length field
 */
export function segmentPayload(segment: JpegSegment): Uint8Array {
  return segment.data.subarray(4);
}

/**
 * Classify a segment by marker and payload signature
 */
export function classifySegment(segment: JpegSegment): SegmentKind {
  const { marker, data } = segment;
  switch (marker) {
    case MARKERS.SOS:
      return 'scan';
    case MARKERS.EOI:
      return 'eoi';
    case MARKERS.COM:
      return 'comment';
    case MARKERS.APP0:
      return matchesAt(data, 4, SIGNATURES.JFIF) ? 'jfif' : 'app';
    case MARKERS.APP1:
      if (matchesAt(data, 4, SIGNATURES.EXIF)) return 'exif';
      if (matchesAt(data, 4, SIGNATURES.XMP) || matchesAt(data, 4, SIGNATURES.XMP_EXT)) return 'xmp';
      return 'app';
    case MARKERS.APP2:
      return matchesAt(data, 4, SIGNATURES.ICC) ? 'icc' : 'app';
    case MARKERS.APP13:
      return matchesAt(data, 4, fromAscii('Photoshop')) ? 'iptc' : 'app';
    case MARKERS.APP14:
      return matchesAt(data, 4, SIGNATURES.ADOBE) ? 'adobe' : 'app';
  }
  if (marker >= MARKERS.APP0 && marker <= MARKERS.APP15) {
    return 'app';
  }
  return 'other';
}

/**
 * Build a length-prefixed segment from a marker and payload
 */
export function buildSegment(marker: number, payload: Uint8Array): Uint8Array {
  if (payload.length + 2 > 0xffff) {
    throw new CorruptedFileError(`Segment payload too large (${payload.length} bytes)`);
  }
  const segment = new Uint8Array(4 + payload.length);
  writeUint16(segment, 0, marker);
  writeUint16(segment, 2, payload.length + 2);
  segment.set(payload, 4);
  return segment;
}

/**
 * Reassemble a JPEG from SOI, the given raw segments and a trailing EOI.
 * Segments with empty data (EOI, RST) are skipped.
 */
export function assemble(parts: Uint8Array[]): Uint8Array {
  return concat(SOI, ...parts.filter(p => p.length > 0), EOI);
}

/**
 * Get list of metadata types present in the image
 */
export function getMetadataTypes(data: Uint8Array): string[] {
  const labels: Partial<Record<SegmentKind, string>> = {
    exif: 'EXIF',
    xmp: 'XMP',
    icc: 'ICC Profile',
    iptc: 'IPTC',
    adobe: 'Adobe',
    comment: 'Comment',
    app: 'APP',
  };
  const types = parseSegments(data)
    .map(s => labels[classifySegment(s)])
    .filter((t): t is string => t !== undefined);
  return [...new Set(types)];
}

export const jpeg = {
  parseSegments,
  classifySegment,
  segmentPayload,
  buildSegment,
  assemble,
  getMetadataTypes,
};

export default jpeg;
