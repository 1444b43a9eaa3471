import { readFile } from 'node:fs/promises';

import { toAscii, toUtf8 } from '../binary/bytes.js';
import { readUint16, readUint32 } from '../binary/endian.js';
import { readExifTags } from '../exif/reader.js';
import { classifySegment, parseSegments, segmentPayload, SIGNATURES } from '../formats/jpeg.js';
import { readXmpProperties, xmpPacketFromPayload } from '../formats/xmp.js';
import { findIptcBlock, readIptcDatasets } from '../formats/iptc.js';
import type { TagMap } from '../types.js';

function iccHeaderTags(payload: Uint8Array): TagMap {
  // 'ICC_PROFILE\0', sequence number, chunk count, then the profile
  const sequence = payload[SIGNATURES.ICC.length] ?? 0;
  const profile = payload.subarray(SIGNATURES.ICC.length + 2);
  if (sequence !== 1 || profile.length < 20) return {};
  return {
    'ICC_Profile:ProfileSize': String(readUint32(profile, 0)),
    'ICC_Profile:ProfileClass': toAscii(profile, 12, 4).trim(),
    'ICC_Profile:ColorSpaceData': toAscii(profile, 16, 4).trim(),
  };
}

/**
 * Flatten every metadata block of a JPEG into `Group:Tag → value`.
 */
export function inspectJpeg(data: Uint8Array): TagMap {
  let tags: TagMap = {};

  for (const segment of parseSegments(data)) {
    const payload = segmentPayload(segment);
    switch (classifySegment(segment)) {
      case 'jfif':
        tags['JFIF:JFIFVersion'] = `${payload[5] ?? 0}.${String(payload[6] ?? 0).padStart(2, '0')}`;
        break;
      case 'exif':
        tags = { ...tags, ...readExifTags(payload.subarray(SIGNATURES.EXIF.length)) };
        break;
      case 'xmp':
        tags = { ...tags, ...readXmpProperties(xmpPacketFromPayload(payload)) };
        break;
      case 'icc':
        tags = { ...tags, ...iccHeaderTags(payload) };
        break;
      case 'iptc': {
        const block = findIptcBlock(payload);
        if (block) tags = { ...tags, ...readIptcDatasets(block) };
        break;
      }
      case 'adobe':
        if (payload.length >= 7) tags['Adobe:DCTEncodeVersion'] = String(readUint16(payload, 5));
        break;
      case 'comment':
        tags['File:Comment'] = toUtf8(payload);
        break;
      case 'app':
        tags[`APP${segment.marker - 0xffe0}:Unknown`] = `(Binary data ${payload.length} bytes)`;
        break;
      default:
        break;
    }
  }
  return tags;
}

export async function inspectFile(path: string): Promise<TagMap> {
  return inspectJpeg(new Uint8Array(await readFile(path)));
}

/**
 * Render tags one per line as `[Group]  Tag : value`, in insertion order.
 */
export function formatTags(tags: TagMap): string[] {
  return Object.entries(tags).map(([key, value]) => {
    const colon = key.indexOf(':');
    const group = key.slice(0, colon);
    const tag = key.slice(colon + 1);
    return `${`[${group}]`.padEnd(16)}${tag.padEnd(32)}: ${value}`;
  });
}
