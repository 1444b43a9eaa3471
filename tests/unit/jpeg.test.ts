import { describe, it, expect } from 'vitest';
import {
  MARKERS,
  parseSegments,
  classifySegment,
  segmentPayload,
  buildSegment,
  assemble,
  getMetadataTypes,
} from '../../src/formats/jpeg';
import { CorruptedFileError } from '../../src/errors';
import { toAscii } from '../../src/binary/bytes';
import { createTestJpeg, scanData } from '../helpers/create-test-jpeg';

describe('parseSegments', () => {
  it('should split a JPEG into classified segments', () => {
    const segments = parseSegments(createTestJpeg());

    expect(segments.map(s => s.marker)).toEqual([
      MARKERS.APP0,
      MARKERS.APP1,
      MARKERS.APP1,
      MARKERS.APP2,
      MARKERS.APP13,
      MARKERS.COM,
      0xffdb,
      0xffc0,
      MARKERS.SOS,
      MARKERS.EOI,
    ]);
    expect(segments.map(classifySegment)).toEqual([
      'jfif',
      'exif',
      'xmp',
      'icc',
      'iptc',
      'comment',
      'other',
      'other',
      'scan',
      'eoi',
    ]);
  });

  it('should keep the whole scan in the SOS segment', () => {
    const data = createTestJpeg();
    const sos = parseSegments(data).find(s => s.marker === MARKERS.SOS);
    const tail = scanData(data);

    expect(sos?.data).toEqual(tail.subarray(0, tail.length - 2));
  });

  it('should expose the payload after marker and length', () => {
    const [, exif] = parseSegments(createTestJpeg());
    expect(exif && toAscii(segmentPayload(exif), 0, 6)).toBe('Exif\0\0');
  });

  it('should reject data without SOI', () => {
    expect(() => parseSegments(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toThrow(CorruptedFileError);
    expect(() => parseSegments(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toThrow('Invalid JPEG: missing SOI marker');
  });

  it('should reject a JPEG with no image data', () => {
    expect(() => parseSegments(new Uint8Array([0xff, 0xd8, 0xff, 0xd9]))).toThrow('Invalid JPEG: no image data');
  });

  it('should reject a segment running past the end', () => {
    const data = new Uint8Array([0xff, 0xd8, 0xff, 0xe1, 0x00, 0x40, 0x00]);
    expect(() => parseSegments(data)).toThrow('Invalid JPEG: segment extends beyond file at offset 4');
  });
});

describe('segment building', () => {
  it('should prefix marker and length', () => {
    expect([...buildSegment(MARKERS.COM, new Uint8Array([1, 2]))]).toEqual([0xff, 0xfe, 0x00, 0x04, 1, 2]);
  });

  it('should refuse payloads over the segment limit', () => {
    expect(() => buildSegment(MARKERS.APP1, new Uint8Array(0xfffe))).toThrow(CorruptedFileError);
  });

  it('should wrap parts in SOI and EOI, skipping empty parts', () => {
    expect([...assemble([new Uint8Array(0), new Uint8Array([7])])]).toEqual([0xff, 0xd8, 7, 0xff, 0xd9]);
  });
});

describe('getMetadataTypes', () => {
  it('should list each metadata block once', () => {
    expect(getMetadataTypes(createTestJpeg())).toEqual(['EXIF', 'XMP', 'ICC Profile', 'IPTC', 'Comment']);
  });

  it('should report nothing for a bare JPEG', () => {
    const bare = createTestJpeg({ exif: false, xmp: false, icc: false, iptc: false, comment: false });
    expect(getMetadataTypes(bare)).toEqual([]);
  });
});
