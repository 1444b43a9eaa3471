import { resolve } from 'node:path';

import { COLOR_SPACE_TAGS, PRESERVED_TAGS } from '../exif/tags.js';

/** Groups each preserved tag is copied from */
export const TAG_GROUPS = ['', 'XMP', 'XMP-dc', 'EXIF', 'IPTC', 'Makernotes', 'Comment', 'PhotoShop'] as const;

/**
 * `-Group:Tag` copy arguments for every preserved tag, tag-major, without
 * repeats. Paranoia drops the colour-space bundle.
 */
export function buildPreserveArgs(paranoia = false): string[] {
  const tags: string[] = [...PRESERVED_TAGS];
  if (!paranoia) tags.push(COLOR_SPACE_TAGS);

  const args: string[] = [];
  const seen = new Set<string>();
  for (const tag of tags) {
    for (const group of TAG_GROUPS) {
      const key = group ? `${group}:${tag}` : tag;
      if (!seen.has(key)) {
        seen.add(key);
        args.push(`-${key}`);
      }
    }
  }
  return args;
}

export interface ScrubArgsOptions {
  /** Write a new file here instead of editing in place */
  output?: string;
  /** Replace the input without keeping a `_original` backup */
  overwrite?: boolean;
  paranoia?: boolean;
  /** Assignment arguments appended after the preserve list */
  stampArgs?: readonly string[];
}

/**
 * Full metadata-tool argument list for one file. The input is always the
 * last element and always absolute.
 */
export function buildScrubArgs(input: string, options: ScrubArgsOptions = {}): string[] {
  const args: string[] = [];
  if (options.overwrite) args.push('-overwrite_original');
  args.push('-P', '-all=', '-gps:all=', '-tagsFromFile', '@');
  if (options.paranoia) args.push('-ICC_Profile:all=');
  args.push(...buildPreserveArgs(options.paranoia));
  args.push(...(options.stampArgs ?? []));
  if (options.output !== undefined) args.push('-o', options.output);
  args.push(resolve(input));
  return args;
}
