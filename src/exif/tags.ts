/**
 * EXIF tag identifiers, directory names and the allow-list of tags that
 * survive a scrub.
 */

import tagNames from './tag-names.json';

export type DirectoryName = 'IFD0' | 'ExifIFD' | 'GPS' | 'IFD1' | 'InteropIFD';

export const TAG = {
  ORIENTATION: 0x0112,
  COPYRIGHT: 0x8298,
  EXIF_POINTER: 0x8769,
  GPS_POINTER: 0x8825,
  INTEROP_POINTER: 0xa005,
  USER_COMMENT: 0x9286,
  COLOR_SPACE: 0xa001,
  GAMMA: 0xa500,
  EXPOSURE_TIME: 0x829a,
  F_NUMBER: 0x829d,
  ISO: 0x8827,
  FOCAL_LENGTH: 0x920a,
  PIXEL_X_DIMENSION: 0xa002,
  PIXEL_Y_DIMENSION: 0xa003,
} as const;

/** TIFF field types */
export const TYPE = {
  BYTE: 1,
  ASCII: 2,
  SHORT: 3,
  LONG: 4,
  RATIONAL: 5,
  SBYTE: 6,
  UNDEFINED: 7,
  SSHORT: 8,
  SLONG: 9,
  SRATIONAL: 10,
  FLOAT: 11,
  DOUBLE: 12,
} as const;

/** Bytes per value for each TIFF type */
export const TYPE_SIZES: Record<number, number> = {
  1: 1,
  2: 1,
  3: 2,
  4: 4,
  5: 8,
  6: 1,
  7: 1,
  8: 2,
  9: 4,
  10: 8,
  11: 4,
  12: 8,
};

/** Width of the byte-order-sensitive unit inside each value */
export const TYPE_UNIT_SIZES: Record<number, number> = {
  3: 2,
  4: 4,
  5: 4,
  8: 2,
  9: 4,
  10: 4,
  11: 4,
  12: 8,
};

const NAMES: Record<string, Record<string, string>> = tagNames;

/**
 * Human name of a tag within a directory (`Tag0x829a` when unknown).
 */
export function tagName(directory: DirectoryName, tag: number): string {
  const table = NAMES[directory === 'IFD1' ? 'IFD0' : directory];
  return table?.[String(tag)] ?? `Tag0x${tag.toString(16).padStart(4, '0')}`;
}

/**
 * Where a copyable tag lives once rewritten
 */
export interface TagLocation {
  directory: 'IFD0' | 'ExifIFD';
  tag: number;
}

/**
 * Tags re-seeded from the original file after every scrub.
 */
export const PRESERVED_TAGS = [
  'ExposureTime',
  'FNumber',
  'ImageSize',
  'FocalLength',
  'ISO',
  'Orientation',
] as const;

/** Colour-space bundle, copied unless running in paranoia mode */
export const COLOR_SPACE_TAGS = 'ColorSpaceTags';

const COPYABLE: Record<string, TagLocation[]> = {
  exposuretime: [{ directory: 'ExifIFD', tag: TAG.EXPOSURE_TIME }],
  fnumber: [{ directory: 'ExifIFD', tag: TAG.F_NUMBER }],
  focallength: [{ directory: 'ExifIFD', tag: TAG.FOCAL_LENGTH }],
  iso: [{ directory: 'ExifIFD', tag: TAG.ISO }],
  orientation: [{ directory: 'IFD0', tag: TAG.ORIENTATION }],
  imagesize: [
    { directory: 'ExifIFD', tag: TAG.PIXEL_X_DIMENSION },
    { directory: 'ExifIFD', tag: TAG.PIXEL_Y_DIMENSION },
  ],
  colorspacetags: [
    { directory: 'ExifIFD', tag: TAG.COLOR_SPACE },
    { directory: 'ExifIFD', tag: TAG.GAMMA },
  ],
};

/**
 * Resolve a tag name (case-insensitive, group prefix already removed) to the
 * EXIF locations it copies. Unknown names resolve to an empty list.
 */
export function copyableLocations(name: string): TagLocation[] {
  return COPYABLE[name.toLowerCase()] ?? [];
}
