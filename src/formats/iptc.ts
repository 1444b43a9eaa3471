import { matchesAt, toAscii, toUtf8, fromAscii } from '../binary/bytes.js';
import { readUint16, readUint32 } from '../binary/endian.js';
import { SIGNATURES } from './jpeg.js';
import type { TagMap } from '../types.js';

const RESOURCE_SIGNATURE = fromAscii('8BIM');
const IPTC_RESOURCE_ID = 0x0404;

const DATASET_NAMES: Record<string, string> = {
  '1:90': 'CodedCharacterSet',
  '2:0': 'ApplicationRecordVersion',
  '2:5': 'ObjectName',
  '2:25': 'Keywords',
  '2:55': 'DateCreated',
  '2:60': 'TimeCreated',
  '2:80': 'By-line',
  '2:90': 'City',
  '2:92': 'Sub-location',
  '2:95': 'Province-State',
  '2:101': 'Country-PrimaryLocationName',
  '2:105': 'Headline',
  '2:110': 'Credit',
  '2:115': 'Source',
  '2:116': 'CopyrightNotice',
  '2:120': 'Caption-Abstract',
};

/**
 * Locate the IIM block (Photoshop resource 0x0404) in an APP13 payload.
 */
export function findIptcBlock(payload: Uint8Array): Uint8Array | null {
  if (!matchesAt(payload, 0, SIGNATURES.PHOTOSHOP)) return null;
  let offset = SIGNATURES.PHOTOSHOP.length;

  while (offset + 12 <= payload.length && matchesAt(payload, offset, RESOURCE_SIGNATURE)) {
    const id = readUint16(payload, offset + 4);
    // Pascal name, padded so length byte + name is even
    const nameLength = payload[offset + 6] ?? 0;
    let pos = offset + 6 + nameLength + 1;
    if ((nameLength + 1) % 2 !== 0) pos++;
    if (pos + 4 > payload.length) return null;

    const size = readUint32(payload, pos);
    const start = pos + 4;
    if (start + size > payload.length) return null;
    if (id === IPTC_RESOURCE_ID) return payload.subarray(start, start + size);

    offset = start + size + (size % 2);
  }
  return null;
}

/**
 * Decode IIM datasets into `IPTC:Name → value`. Repeated datasets
 * (Keywords) are joined with ", ".
 */
export function readIptcDatasets(block: Uint8Array): TagMap {
  const tags: TagMap = {};
  let offset = 0;

  while (offset + 5 <= block.length && block[offset] === 0x1c) {
    const record = block[offset + 1] ?? 0;
    const dataset = block[offset + 2] ?? 0;
    const size = readUint16(block, offset + 3);
    // extended-length datasets are not used for text fields
    if (size & 0x8000) break;
    const start = offset + 5;
    if (start + size > block.length) break;

    const id = `${record}:${dataset}`;
    const name = DATASET_NAMES[id] ?? `Dataset${record}_${dataset}`;
    const bytes = block.subarray(start, start + size);
    const value = record === 1 && dataset === 90 ? toAscii(bytes) : toUtf8(bytes);
    const key = `IPTC:${name}`;
    tags[key] = tags[key] !== undefined ? `${tags[key]}, ${value}` : value;

    offset = start + size;
  }
  return tags;
}
