import { lstat, mkdir, readdir, realpath, rm, stat, writeFile } from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import { basename, extname, join, relative, isAbsolute } from 'node:path';

import { SafetyCheckError } from '../errors.js';
import type { FileCandidate } from '../types.js';

export const JPEG_EXTENSIONS: ReadonlySet<string> = new Set(['.jpg', '.jpeg']);

export const WRITE_PROBE_NAME = '.exifsweep_write_test';

export function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

/**
 * lstat that resolves to null for a path that does not exist.
 */
export async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await lstat(path);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Whether two existing paths resolve to the same file.
 */
export async function sameFile(a: string, b: string): Promise<boolean> {
  const [left, right] = await Promise.all([realpath(a), realpath(b)]);
  return left === right;
}

export function isJpegName(name: string): boolean {
  return JPEG_EXTENSIONS.has(extname(name).toLowerCase());
}

/**
 * Whether `path` is `directory` or lies beneath it.
 */
export function isWithin(path: string, directory: string): boolean {
  const rel = relative(directory, path);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Verify a pipeline directory exists, is a real directory and accepts
 * writes. Throws SafetyCheckError otherwise.
 */
export async function assertSafeDirectory(path: string, label: string): Promise<void> {
  const info = await lstatOrNull(path);
  if (!info) {
    throw new SafetyCheckError(label, path, 'directory does not exist');
  }
  if (info.isSymbolicLink()) {
    throw new SafetyCheckError(label, path, 'is a symbolic link (not allowed)');
  }
  if (!info.isDirectory()) {
    throw new SafetyCheckError(label, path, 'path is not a directory');
  }

  const probe = join(path, WRITE_PROBE_NAME);
  try {
    await writeFile(probe, 'test');
    await rm(probe);
  } catch {
    throw new SafetyCheckError(label, path, 'directory is not writable');
  }
}

/**
 * Create a directory if missing, then run the safety check on it.
 */
export async function ensureSafeDirectory(path: string, label: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch {
    throw new SafetyCheckError(label, path, 'directory could not be created');
  }
  await assertSafeDirectory(path, label);
}

const byName = (a: Dirent, b: Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

export interface FindOptions {
  recursive?: boolean;
  /** Directories never descended into or collected from */
  exclude?: readonly string[];
}

/**
 * Regular JPEG files in a directory, sorted by name, symlinks skipped.
 * Recursion visits subdirectories after the files of their parent.
 */
export async function findJpegs(directory: string, options: FindOptions = {}): Promise<string[]> {
  const excluded = options.exclude ?? [];
  const entries = (await readdir(directory, { withFileTypes: true })).sort(byName);
  const files: string[] = [];
  const subdirectories: string[] = [];

  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (entry.isSymbolicLink()) continue;
    if (entry.isFile() && isJpegName(entry.name)) {
      files.push(path);
    } else if (entry.isDirectory() && options.recursive && !excluded.some(dir => isWithin(path, dir))) {
      subdirectories.push(path);
    }
  }

  for (const sub of subdirectories) {
    files.push(...(await findJpegs(sub, options)));
  }
  return files;
}

/**
 * Stat each path into a FileCandidate, dropping those that vanished.
 */
export async function toCandidates(paths: readonly string[]): Promise<FileCandidate[]> {
  const candidates: FileCandidate[] = [];
  for (const path of paths) {
    let info: Stats;
    try {
      info = await stat(path);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') continue;
      throw err;
    }
    const name = basename(path);
    candidates.push({
      path,
      name,
      extension: extname(name).toLowerCase(),
      size: info.size,
      mtime: info.mtimeMs / 1000,
    });
  }
  return candidates;
}
