/**
 * XMP packet reading and the small packet the scrub stamps back in.
 */

import { concat, fromUtf8, toAscii, toUtf8 } from '../binary/bytes.js';
import { SIGNATURES } from './jpeg.js';
import type { TagMap } from '../types.js';

export interface XmpStamp {
  rights?: string;
  description?: string;
}

const IGNORED_PREFIXES = new Set(['xmlns', 'rdf', 'x', 'xml']);

const PREFIX_GROUPS: Record<string, string> = {
  dc: 'XMP-dc',
  exif: 'XMP-exif',
  tiff: 'XMP-tiff',
  xmp: 'XMP-xmp',
  photoshop: 'XMP-photoshop',
  Iptc4xmpCore: 'XMP-iptcCore',
  xmpRights: 'XMP-xmpRights',
  crs: 'XMP-crs',
};

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function unescapeXml(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

function langAlt(tag: string, value: string): string {
  return (
    `   <${tag}>\n` +
    `    <rdf:Alt>\n` +
    `     <rdf:li xml:lang="x-default">${escapeXml(value)}</rdf:li>\n` +
    `    </rdf:Alt>\n` +
    `   </${tag}>\n`
  );
}

/**
 * Serialize a minimal XMP packet. Returns null when there is nothing to stamp.
 */
export function buildXmpPacket(stamp: XmpStamp): string | null {
  if (stamp.rights === undefined && stamp.description === undefined) {
    return null;
  }
  let body = '';
  if (stamp.rights !== undefined) body += langAlt('dc:rights', stamp.rights);
  if (stamp.description !== undefined) body += langAlt('dc:description', stamp.description);

  return (
    '<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>\n' +
    '<x:xmpmeta xmlns:x="adobe:ns:meta/">\n' +
    ' <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">\n' +
    '  <rdf:Description rdf:about=""\n' +
    '    xmlns:dc="http://purl.org/dc/elements/1.1/">\n' +
    body +
    '  </rdf:Description>\n' +
    ' </rdf:RDF>\n' +
    '</x:xmpmeta>\n' +
    '<?xpacket end="w"?>'
  );
}

/**
 * APP1 payload (signature + packet) for the stamp, or null.
 */
export function buildXmpPayload(stamp: XmpStamp): Uint8Array | null {
  const packet = buildXmpPacket(stamp);
  return packet === null ? null : concat(SIGNATURES.XMP, fromUtf8(packet));
}

/**
 * Extract the packet text from an APP1 payload (after the marker/length).
 */
export function xmpPacketFromPayload(payload: Uint8Array): string {
  const signature = toAscii(payload, 0, SIGNATURES.XMP.length);
  if (signature === toAscii(SIGNATURES.XMP)) {
    return toUtf8(payload.subarray(SIGNATURES.XMP.length));
  }
  // extended XMP: signature, 32-byte GUID, two 4-byte lengths
  return toUtf8(payload.subarray(SIGNATURES.XMP_EXT.length + 40));
}

function groupFor(prefix: string): string {
  return PREFIX_GROUPS[prefix] ?? `XMP-${prefix}`;
}

/**
 * Flatten an XMP packet into `XMP-group:property → value`. Handles
 * attribute-form properties, simple elements and the first item of
 * rdf:Alt / rdf:Seq / rdf:Bag containers.
 */
export function readXmpProperties(packet: string): TagMap {
  const tags: TagMap = {};
  const set = (prefix: string, name: string, value: string) => {
    if (IGNORED_PREFIXES.has(prefix)) return;
    const key = `${groupFor(prefix)}:${name}`;
    if (!(key in tags)) tags[key] = unescapeXml(value.trim());
  };

  for (const description of packet.matchAll(/<rdf:Description\b([^>]*?)\/?>/g)) {
    for (const attr of (description[1] ?? '').matchAll(/([\w-]+):([\w-]+)\s*=\s*"([^"]*)"/g)) {
      set(attr[1] ?? '', attr[2] ?? '', attr[3] ?? '');
    }
  }

  for (const open of packet.matchAll(/<([\w-]+):([\w-]+)(?:\s[^>]*)?>/g)) {
    const [tag, prefix = '', name = ''] = open;
    if (IGNORED_PREFIXES.has(prefix) || tag.endsWith('/>')) continue;
    const start = (open.index ?? 0) + tag.length;
    const end = packet.indexOf(`</${prefix}:${name}>`, start);
    if (end === -1) continue;
    const inner = packet.slice(start, end);
    if (inner.includes('<rdf:li')) {
      const first = /<rdf:li\b[^>]*>([\s\S]*?)<\/rdf:li>/.exec(inner);
      if (first) set(prefix, name, first[1] ?? '');
    } else if (!inner.includes('<')) {
      set(prefix, name, inner);
    }
  }

  return tags;
}
