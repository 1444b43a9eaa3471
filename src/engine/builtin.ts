/**
 * In-process metadata engine.
 *
 * Executes the same argument list the scrub hands to exiftool, directly on
 * the JPEG segment stream: every APPn/COM segment except JFIF is dropped,
 * allow-listed EXIF entries are copied back from the source, stamped values
 * are written to EXIF and XMP, and the ICC profile is restored unless it was
 * explicitly cleared. Entropy-coded image data is never touched.
 */

import { copyFile, readFile, rename, rm, stat, utimes, writeFile } from 'node:fs/promises';
import type { Stats } from 'node:fs';

import { ToolArgumentError, errorMessage } from '../errors.js';
import { classifySegment, parseSegments, assemble, segmentPayload, MARKERS, buildSegment } from '../formats/jpeg.js';
import { buildXmpPayload } from '../formats/xmp.js';
import type { XmpStamp } from '../formats/xmp.js';
import { findEntry, parseExifBlock } from '../exif/reader.js';
import type { ParsedExif } from '../exif/reader.js';
import { asciiEntry, buildTiffBlock, copyEntry, userCommentEntry, wrapInJpegApp1 } from '../exif/writer.js';
import type { TiffEntry } from '../exif/writer.js';
import { COLOR_SPACE_TAGS, TAG, copyableLocations } from '../exif/tags.js';
import { parseToolArguments } from './arguments.js';
import type { ScrubInstruction, TagAssignment } from './arguments.js';
import type { MetadataTool, ToolResult } from '../types.js';

const COPY_GROUPS = new Set(['', 'exif']);
const EXIF_HEADER_LENGTH = 6;

function failure(message: string, file?: string): ToolResult {
  const suffix = file !== undefined ? ` - ${file}` : '';
  return { exitCode: 1, stdout: '', stderr: `Error: ${message}${suffix}\n` };
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

interface RebuiltMetadata {
  ifd0: TiffEntry[];
  exifIfd: TiffEntry[];
  xmp: XmpStamp;
}

function copyFromSource(source: ParsedExif | null, instruction: ScrubInstruction, into: RebuiltMetadata): void {
  if (!source || !instruction.copyFromSource) return;
  const seen = new Set<string>();

  for (const ref of instruction.copiedTags) {
    if (!COPY_GROUPS.has(ref.group)) continue;
    for (const location of copyableLocations(ref.tag)) {
      const key = `${location.directory}:${location.tag}`;
      if (seen.has(key)) continue;
      seen.add(key);

      const entry = findEntry(source, location.directory, location.tag);
      if (!entry) continue;
      const copied = copyEntry(source.data, entry, source.littleEndian);
      if (!copied) continue;
      (location.directory === 'IFD0' ? into.ifd0 : into.exifIfd).push(copied);
    }
  }
}

function applyAssignment(assignment: TagAssignment, into: RebuiltMetadata): void {
  const { group, tag, value } = assignment;
  // an empty value deletes, and everything was already deleted
  if (value === '') return;

  switch (`${group}:${tag.toLowerCase()}`) {
    case 'exif:copyright':
    case ':copyright':
      into.ifd0 = into.ifd0.filter(e => e.tag !== TAG.COPYRIGHT);
      into.ifd0.push(asciiEntry(TAG.COPYRIGHT, value));
      return;
    case 'exif:usercomment':
    case ':usercomment':
      into.exifIfd = into.exifIfd.filter(e => e.tag !== TAG.USER_COMMENT);
      into.exifIfd.push(userCommentEntry(value));
      return;
    case 'xmp-dc:rights':
    case 'xmp:rights':
      into.xmp.rights = value;
      return;
    case 'xmp-dc:description':
    case 'xmp:description':
      into.xmp.description = value;
      return;
    default:
      throw new ToolArgumentError('Unsupported tag assignment', `-${group ? `${group}:` : ''}${tag}=`);
  }
}

/**
 * Rewrite a JPEG according to a parsed instruction, returning the new bytes.
 */
export function rewriteJpeg(data: Uint8Array, instruction: ScrubInstruction): Uint8Array {
  if (!instruction.deletedGroups.has('all')) {
    throw new ToolArgumentError('Built-in engine only rewrites files with', '-all=');
  }

  const segments = parseSegments(data);
  const exifSegment = segments.find(s => classifySegment(s) === 'exif');
  const source = exifSegment ? parseExifBlock(segmentPayload(exifSegment).slice(EXIF_HEADER_LENGTH)) : null;

  const rebuilt: RebuiltMetadata = { ifd0: [], exifIfd: [], xmp: {} };
  copyFromSource(source, instruction, rebuilt);
  for (const assignment of instruction.assignments) {
    applyAssignment(assignment, rebuilt);
  }

  const restoreIcc =
    instruction.copyFromSource &&
    !instruction.deletedGroups.has('icc_profile') &&
    instruction.copiedTags.some(t => t.group === '' && t.tag.toLowerCase() === COLOR_SPACE_TAGS.toLowerCase());

  const head: Uint8Array[] = [];
  const icc: Uint8Array[] = [];
  const body: Uint8Array[] = [];
  for (const segment of segments) {
    switch (classifySegment(segment)) {
      case 'jfif':
        head.push(segment.data);
        break;
      case 'icc':
        if (restoreIcc) icc.push(segment.data);
        break;
      case 'other':
      case 'scan':
        body.push(segment.data);
        break;
      default:
        // exif, xmp, iptc, adobe, comment, other APPn, eoi
        break;
    }
  }

  const exif = wrapInJpegApp1(buildTiffBlock(rebuilt.ifd0, rebuilt.exifIfd));
  const xmpPayload = buildXmpPayload(rebuilt.xmp);
  const xmp = xmpPayload ? buildSegment(MARKERS.APP1, xmpPayload) : new Uint8Array(0);

  return assemble([...head, exif, xmp, ...icc, ...body]);
}

export class BuiltinTool implements MetadataTool {
  readonly name = 'builtin' as const;

  async run(args: readonly string[]): Promise<ToolResult> {
    let instruction: ScrubInstruction;
    try {
      instruction = parseToolArguments(args);
    } catch (err) {
      return failure(errorMessage(err));
    }

    try {
      return await this.apply(instruction);
    } catch (err) {
      return failure(errorMessage(err), instruction.input);
    }
  }

  private async apply(instruction: ScrubInstruction): Promise<ToolResult> {
    const { input, output } = instruction;
    const sourceStat = await statOrNull(input);
    if (!sourceStat) return failure('File not found', input);

    const target = output ?? input;
    if (output !== undefined && (await statOrNull(output))) {
      return failure(`'${output}' already exists`, input);
    }

    const rewritten = rewriteJpeg(new Uint8Array(await readFile(input)), instruction);

    const temp = `${target}_exifsweep_tmp`;
    try {
      await writeFile(temp, rewritten, { flag: 'wx' });
      if (output === undefined && !instruction.overwriteOriginal && !(await statOrNull(`${input}_original`))) {
        await copyFile(input, `${input}_original`);
      }
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }

    if (instruction.preserveTime) {
      await utimes(target, sourceStat.atime, sourceStat.mtime);
    }

    const verb = output === undefined ? 'updated' : 'created';
    return { exitCode: 0, stdout: `    1 image files ${verb}\n`, stderr: '' };
  }
}
