import { copyFile, mkdir, rename, unlink } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import { errorMessage } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { errorCode, lstatOrNull, sameFile } from './files.js';
import type { DuplicatePolicy, ScrubOutcome } from '../types.js';

export interface DuplicateOptions {
  policy: DuplicatePolicy;
  /** Where `move` puts duplicates */
  quarantineDir: string;
  dryRun?: boolean;
  logger?: Logger;
}


/**
 * Rename, falling back to copy + unlink when source and destination live on
 * different filesystems.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (err) {
    if (errorCode(err) !== 'EXDEV') throw err;
    await copyFile(source, destination);
    await unlink(source);
  }
}

/**
 * First free `name.ext`, `name_1.ext`, `name_2.ext`, ... in a directory.
 */
export async function uniqueDestination(directory: string, fileName: string): Promise<string> {
  const ext = extname(fileName);
  const stem = basename(fileName, ext);
  let candidate = join(directory, fileName);
  for (let n = 1; (await lstatOrNull(candidate)) !== null; n++) {
    candidate = join(directory, `${stem}_${n}${ext}`);
  }
  return candidate;
}

/**
 * Check whether an input already has a scrubbed counterpart at
 * `destination` and apply the duplicate policy. Resolves to null when there
 * is no duplicate and processing should continue.
 */
export async function resolveDuplicate(
  input: string,
  destination: string,
  options: DuplicateOptions
): Promise<ScrubOutcome | null> {
  const log = options.logger ?? defaultLogger;

  const info = await lstatOrNull(destination);
  if (!info) return null;

  if (info.isSymbolicLink()) {
    log.error({ destination }, 'Refusing to handle duplicate: output is a symlink');
    return { kind: 'error', message: `Refusing to write to symlinked output: ${destination}` };
  }
  if (await sameFile(input, destination)) {
    return null;
  }

  if (options.dryRun) {
    log.info({ destination }, '[dry-run] Would detect duplicate');
    return { kind: 'duplicate' };
  }

  if (options.policy === 'delete') {
    try {
      await unlink(input);
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        return { kind: 'error', message: `Failed to delete duplicate ${input}: ${errorMessage(err)}` };
      }
    }
    log.info({ input }, 'Duplicate detected, deleted input');
    return { kind: 'duplicate' };
  }

  try {
    await mkdir(options.quarantineDir, { recursive: true });
    const target = await uniqueDestination(options.quarantineDir, basename(input));
    await moveFile(input, target);
    log.info({ input, target }, 'Moved duplicate to quarantine');
    return { kind: 'duplicate', quarantinePath: target };
  } catch (err) {
    return { kind: 'error', message: `Failed to move duplicate ${input}: ${errorMessage(err)}` };
  }
}
