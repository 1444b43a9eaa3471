/**
 * Auto mode: one sweep over the input directory.
 *
 *   SafetyCheck -> LoadLedger -> Enumerate -> Filter -> Process
 *     -> Reconcile -> PersistLedger -> Report
 *
 * A failed safety check throws before any file or ledger is touched. Every
 * other failure is confined to the file it happened on.
 */

import { unlink } from 'node:fs/promises';
import { join } from 'node:path';

import { errorMessage } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { resolveDuplicate, moveFile } from './duplicate.js';
import {
  assertSafeDirectory,
  ensureSafeDirectory,
  errorCode,
  findJpegs,
  lstatOrNull,
  sameFile,
  toCandidates,
} from './files.js';
import { isProbablyTemp, isStable } from './stability.js';
import { scrubFile } from './scrub.js';
import { showAfter, showBefore } from './display.js';
import { RunSummary } from './summary.js';
import type { StabilityLedger } from './ledger.js';
import type {
  DuplicatePolicy,
  FileCandidate,
  MetadataTool,
  ScrubOutcome,
  StampOptions,
  SweepDirectories,
  TagDisplay,
} from '../types.js';

export const DEFAULT_STABLE_SECONDS = 120;

export interface SweepOptions {
  directories: SweepDirectories;
  tool: MetadataTool;
  ledger: StabilityLedger;
  stableSeconds?: number;
  onDuplicate?: DuplicatePolicy;
  /** Delete originals after a successful scrub instead of moving them */
  deleteOriginal?: boolean;
  dryRun?: boolean;
  paranoia?: boolean;
  maxFiles?: number;
  stamp?: StampOptions;
  showTags?: TagDisplay;
  /** Seconds since the epoch */
  now?: () => number;
  logger?: Logger;
  summary?: RunSummary;
}

/**
 * Immediate JPEG children of the input directory, by name, symlinks
 * excluded.
 */
export async function enumerateCandidates(inputDir: string): Promise<FileCandidate[]> {
  return toCandidates(await findJpegs(inputDir));
}

async function reconcileScrubbed(file: FileCandidate, processedDir: string, deleteOriginal: boolean, log: Logger) {
  if (deleteOriginal) {
    try {
      await unlink(file.path);
      log.info({ file: file.name }, `Deleted original: ${file.path}`);
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') throw err;
      log.warn({ file: file.name }, `Original already gone: ${file.path}`);
    }
    return;
  }

  const destination = join(processedDir, file.name);
  if (!(await lstatOrNull(file.path))) {
    log.warn({ file: file.name }, `Skipping move: source file no longer exists (${file.path})`);
  } else if ((await lstatOrNull(destination))?.isSymbolicLink()) {
    log.warn({ file: file.name }, `Skipping move: destination is a symlink (${destination})`);
  } else if ((await lstatOrNull(destination)) && (await sameFile(file.path, destination))) {
    log.warn({ file: file.name }, 'Skipping move: source and destination are the same');
  } else {
    await moveFile(file.path, destination);
    log.info({ file: file.name }, `Moved original to ${destination}`);
  }
}

async function reconcileError(file: FileCandidate, processedDir: string, log: Logger) {
  const destination = join(processedDir, file.name);
  if (!(await lstatOrNull(file.path))) {
    log.warn({ file: file.name }, `Scrub failed and source already missing: ${file.path}`);
    return;
  }
  if ((await lstatOrNull(destination))?.isSymbolicLink()) {
    log.warn(
      { file: file.name },
      `Scrub failed; destination is a symlink (${destination}), leaving original in place: ${file.path}`
    );
    return;
  }
  try {
    await moveFile(file.path, destination);
    log.warn({ file: file.name }, `Scrub failed for ${file.path}; moved original to ${destination} for inspection`);
  } catch (err) {
    log.error({ file: file.name, err: errorMessage(err) }, `Scrub failed for ${file.path}; unable to move original`);
  }
}

/**
 * Run one auto-mode sweep and return its summary.
 */
export async function runSweep(options: SweepOptions): Promise<RunSummary> {
  const log = options.logger ?? defaultLogger;
  const summary = options.summary ?? new RunSummary();
  const { directories: dirs, ledger, tool } = options;
  const threshold = options.stableSeconds ?? DEFAULT_STABLE_SECONDS;
  const policy = options.onDuplicate ?? 'delete';
  const dryRun = options.dryRun ?? false;
  const now = options.now ?? (() => Date.now() / 1000);

  log.info(
    { input: dirs.input, output: dirs.output, processed: dirs.processed, threshold, ledger: ledger.path ?? 'disabled' },
    'Auto mode: scrubbing JPEGs'
  );

  // SafetyCheck
  await assertSafeDirectory(dirs.input, 'Input');
  await assertSafeDirectory(dirs.output, 'Output');
  await assertSafeDirectory(dirs.processed, 'Processed');
  if (policy === 'move') {
    await ensureSafeDirectory(dirs.errors, 'Errors');
  }

  // LoadLedger
  const state = await ledger.load();
  await ledger.prune(state);

  // Enumerate + Filter
  const candidates = await enumerateCandidates(dirs.input);
  log.debug({ count: candidates.length }, 'Input scan complete');

  let eligible: FileCandidate[] = [];
  let skippedTemp = 0;
  let skippedUnstable = 0;
  for (const file of candidates) {
    try {
      if (isProbablyTemp(file.path)) {
        skippedTemp++;
        summary.update({ kind: 'skipped', reason: 'temp' });
        await ledger.markSeen(file.path, state, now());
        continue;
      }
      if (!(await isStable(file.path, ledger, state, threshold, now(), log))) {
        skippedUnstable++;
        summary.update({ kind: 'skipped', reason: 'unstable' });
        continue;
      }
      eligible.push(file);
    } catch (err) {
      // left in place for the next sweep
      const message = errorMessage(err);
      log.error({ file: file.name, err: message }, `Stability check failed for ${file.path}`);
      summary.update({ kind: 'error', message });
    }
  }

  if (options.maxFiles !== undefined) {
    eligible = eligible.slice(0, options.maxFiles);
  }
  log.debug({ eligible: eligible.length, skippedTemp, skippedUnstable }, 'Filtered candidates');

  if (eligible.length === 0) {
    if (skippedTemp > 0 || skippedUnstable > 0) {
      log.info(`Nothing eligible yet. Skipped: temp=${skippedTemp}, unstable=${skippedUnstable}.`);
    } else if (candidates.length === 0) {
      log.warn('No JPEGs found, nothing to do.');
    }
    await ledger.save(state);
    return summary;
  }

  // Process + Reconcile
  for (const file of eligible) {
    const destination = join(dirs.output, file.name);
    let outcome: ScrubOutcome;

    try {
      const duplicate = await resolveDuplicate(file.path, destination, {
        policy,
        quarantineDir: dirs.errors,
        dryRun,
        logger: log,
      });

      if (dryRun) {
        if (duplicate?.kind === 'error') {
          outcome = duplicate;
        } else {
          if (!duplicate) {
            await showBefore(options.showTags, file.path);
            await showAfter(options.showTags, null, log);
            log.info({ file: file.name }, `Would scrub: ${file.path}`);
          }
          outcome = { kind: 'skipped', reason: 'dry-run' };
        }
      } else if (duplicate) {
        outcome = duplicate;
      } else {
        await showBefore(options.showTags, file.path);
        outcome = await scrubFile(file.path, {
          tool,
          outputDir: dirs.output,
          paranoia: options.paranoia,
          stamp: options.stamp,
          logger: log,
        });
        if (outcome.kind === 'scrubbed') await showAfter(options.showTags, outcome.outputPath, log);
      }
    } catch (err) {
      outcome = { kind: 'error', message: errorMessage(err) };
      log.error({ file: file.name, err: outcome.message }, `Failed to process ${file.path}`);
    }

    summary.update(outcome);

    if (!dryRun) {
      try {
        if (outcome.kind === 'scrubbed') {
          await reconcileScrubbed(file, dirs.processed, options.deleteOriginal ?? false, log);
        } else if (outcome.kind === 'error') {
          await reconcileError(file, dirs.processed, log);
        }
      } catch (err) {
        log.error({ file: file.name, err: errorMessage(err) }, `Could not reconcile ${file.path}`);
      }
    }

    await ledger.markSeen(file.path, state, now()).catch((err: unknown) => {
      log.warn({ file: file.name, err: errorMessage(err) }, 'Could not record file in state');
    });
  }

  // PersistLedger
  await ledger.save(state);
  return summary;
}
