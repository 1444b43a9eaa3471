/**
 * The two interactive modes: safe copy (default) and inline cleaning, plus
 * the single-file preview.
 */

import { copyFile, mkdir, mkdtemp, realpath, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, isAbsolute, join, resolve } from 'node:path';

import { SafetyCheckError, errorMessage } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { buildScrubArgs } from './command.js';
import { buildStampArgs } from './stamp.js';
import { assertSafeDirectory, errorCode, findJpegs, isJpegName, isWithin, lstatOrNull } from './files.js';
import { scrubFile } from './scrub.js';
import { showAfter, showBefore } from './display.js';
import { RunSummary } from './summary.js';
import type { MetadataTool, ScrubOutcome, StampOptions, SweepDirectories, TagDisplay } from '../types.js';

export interface ModeOptions {
  tool: MetadataTool;
  recursive?: boolean;
  dryRun?: boolean;
  paranoia?: boolean;
  maxFiles?: number;
  stamp?: StampOptions;
  showTags?: TagDisplay;
  logger?: Logger;
  summary?: RunSummary;
}

export interface SafeCopyOptions extends ModeOptions {
  root: string;
  /** Pipeline directories under the root, never scanned */
  directories: SweepDirectories;
}

export interface InlineOptions extends ModeOptions {
  root: string;
  /** Files or directories; empty means the root itself */
  paths?: readonly string[];
  /** Preview the first target through this printer instead of scrubbing */
  preview?: TagDisplay['print'];
}

function cap<T>(items: T[], maxFiles: number | undefined): T[] {
  return maxFiles === undefined ? items : items.slice(0, maxFiles);
}

/**
 * Default mode: write scrubbed copies of the root's JPEGs to the output
 * directory, leaving originals untouched. Refuses to run when the output
 * directory already exists.
 */
export async function runSafeCopy(options: SafeCopyOptions): Promise<RunSummary> {
  const log = options.logger ?? defaultLogger;
  const summary = options.summary ?? new RunSummary();
  const { root, directories: dirs } = options;

  log.info({ root, output: dirs.output }, 'Default safe mode: scrubbing JPEGs');
  await assertSafeDirectory(root, 'Photos root');

  if (await lstatOrNull(dirs.output)) {
    throw new SafetyCheckError(
      'Output',
      dirs.output,
      'directory already exists; remove it or use --clean-inline/--from-input'
    );
  }
  if (!options.dryRun) {
    await mkdir(dirs.output);
    await assertSafeDirectory(dirs.output, 'Output');
  }

  const pipeline = [dirs.input, dirs.output, dirs.processed, dirs.errors];
  const found = await findJpegs(root, { recursive: options.recursive, exclude: pipeline });
  const files = cap(
    found.filter(file => !pipeline.some(dir => isWithin(file, dir))),
    options.maxFiles
  );

  if (files.length === 0) {
    log.warn('No eligible JPEGs found in default safe mode.');
    return summary;
  }

  for (const file of files) {
    const destination = join(dirs.output, basename(file));
    if (options.dryRun) {
      await showBefore(options.showTags, file);
      await showAfter(options.showTags, null, log);
      log.info(`[default] Would scrub: ${file} -> ${destination}`);
      summary.update({ kind: 'skipped', reason: 'dry-run' });
      continue;
    }

    let outcome: ScrubOutcome;
    if (await lstatOrNull(destination)) {
      // two originals with the same name in different subdirectories
      outcome = { kind: 'error', message: `Output already exists: ${destination}` };
      log.error({ file, destination }, 'Name collision in output directory; original left in place');
    } else {
      await showBefore(options.showTags, file);
      outcome = await scrubFile(file, {
        tool: options.tool,
        outputDir: dirs.output,
        paranoia: options.paranoia,
        stamp: options.stamp,
        logger: log,
      });
      if (outcome.kind === 'scrubbed') await showAfter(options.showTags, outcome.outputPath, log);
    }
    summary.update(outcome);
  }

  return summary;
}

/**
 * Resolve a user-supplied path against the root, refusing symlinks,
 * missing paths and anything outside the root.
 */
export async function resolveUnderRoot(root: string, raw: string): Promise<string> {
  const candidate = isAbsolute(raw) ? raw : join(root, raw);
  const info = await lstatOrNull(candidate);
  if (!info) {
    throw new SafetyCheckError('Path', candidate, 'does not exist');
  }
  if (info.isSymbolicLink()) {
    throw new SafetyCheckError('Path', candidate, 'is a symbolic link (not allowed)');
  }

  const [resolved, realRoot] = await Promise.all([realpath(candidate), realpath(root)]);
  if (!isWithin(resolved, realRoot)) {
    throw new SafetyCheckError('Path', raw, `escapes allowed root ${root}`);
  }
  return resolved;
}

async function collectInlineTargets(options: InlineOptions, log: Logger): Promise<string[]> {
  const raw = options.paths && options.paths.length > 0 ? options.paths : [options.root];
  const targets: string[] = [];

  for (const entry of raw) {
    const path = await resolveUnderRoot(options.root, entry);
    const info = await lstatOrNull(path);
    if (!info || info.isSymbolicLink()) {
      log.warn({ path }, 'Skipping symlink input');
    } else if (info.isFile() && isJpegName(path)) {
      targets.push(path);
    } else if (info.isDirectory()) {
      targets.push(...(await findJpegs(path, { recursive: options.recursive })));
    }
  }
  return targets;
}

/**
 * Scrub the given files (or the root) in place.
 */
export async function runInline(options: InlineOptions): Promise<RunSummary> {
  const log = options.logger ?? defaultLogger;
  const summary = options.summary ?? new RunSummary();

  const targets = cap(await collectInlineTargets(options, log), options.maxFiles);
  log.debug({ count: targets.length }, 'Inline mode targets gathered');
  if (targets.length === 0) {
    log.warn('No JPEGs matched.');
    return summary;
  }

  const [first] = targets;
  if (options.preview && first !== undefined) {
    await previewFile(first, {
      tool: options.tool,
      paranoia: options.paranoia,
      stamp: options.stamp,
      print: options.preview,
      logger: log,
    });
    return summary;
  }

  for (const file of targets) {
    if ((await lstatOrNull(file))?.isSymbolicLink()) {
      log.warn({ file }, 'Skipping symlink target');
      continue;
    }
    if (options.dryRun) {
      await showBefore(options.showTags, file);
      await showAfter(options.showTags, null, log);
      log.info(`Would scrub: ${file}`);
      summary.update({ kind: 'skipped', reason: 'dry-run' });
      continue;
    }

    await showBefore(options.showTags, file);
    const outcome = await scrubFile(file, {
      tool: options.tool,
      paranoia: options.paranoia,
      stamp: options.stamp,
      logger: log,
    });
    if (outcome.kind === 'scrubbed') await showAfter(options.showTags, outcome.outputPath, log);
    summary.update(outcome);
  }

  return summary;
}

export interface PreviewOptions {
  tool: MetadataTool;
  paranoia?: boolean;
  stamp?: StampOptions;
  print: TagDisplay['print'];
  logger?: Logger;
}

/**
 * Scrub a temporary copy of one file and show its tags before and after.
 * The original is never modified. Resolves to false when the scrub failed.
 */
export async function previewFile(path: string, options: PreviewOptions): Promise<boolean> {
  const log = options.logger ?? defaultLogger;
  const workDir = await mkdtemp(join(tmpdir(), 'exifsweep-preview-'));
  try {
    const copy = join(workDir, basename(path));
    const output = join(workDir, `scrubbed-${basename(path)}`);
    await copyFile(resolve(path), copy);

    const args = buildScrubArgs(copy, {
      output,
      paranoia: options.paranoia,
      stampArgs: buildStampArgs(options.stamp, log),
    });
    const result = await options.tool.run(args);
    if (result.exitCode !== 0) {
      log.error({ path, err: result.stderr.trim() }, 'Preview scrub failed');
      return false;
    }

    await options.print('before', path);
    await options.print('after', output);
    log.info('Preview complete, original file was not modified.');
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      log.error({ path, err: errorMessage(err) }, 'Preview input vanished');
      return false;
    }
    throw err;
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
