/**
 * Persistent stability ledger.
 *
 * Remembers the size and mtime of every JPEG observed in the input
 * directory so the next sweep can tell whether a file is still being
 * written. Persistence is best effort: any write failure degrades the run
 * to mtime-only stability instead of aborting it.
 */

import { mkdir, readFile, realpath, rename, rm, stat, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { z } from 'zod';

import { errorMessage } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { LedgerState, StabilityRecord } from '../types.js';
import { errorCode } from './files.js';

export const STATE_FILE_NAME = '.exifsweep_state.json';

const DISABLED_CHOICES = new Set(['disabled', 'none', '-']);

const recordSchema = z.object({
  size: z.number(),
  mtime: z.number(),
  seen: z.number(),
});

export interface StateLocationOptions {
  /** Explicit `--state-file` value */
  override?: string;
  /** `EXIFSWEEP_STATE` value */
  envPath?: string;
  root: string;
  logger?: Logger;
}

/**
 * A location is usable when its directory can be created and a probe file
 * can be written and removed there.
 */
export async function isWritableLocation(path: string): Promise<boolean> {
  const directory = dirname(path);
  const probe = join(directory, `.exifsweep_probe_${randomUUID()}`);
  try {
    await mkdir(directory, { recursive: true });
    await writeFile(probe, '', { flag: 'wx' });
    await rm(probe);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pick the ledger file for this run, or null for mtime-only stability.
 * An explicit override or EXIFSWEEP_STATE that does not validate disables
 * persistence; the automatic candidates fall through to the next one.
 */
export async function resolveStateLocation(options: StateLocationOptions): Promise<string | null> {
  const log = options.logger ?? defaultLogger;
  const { override, envPath, root } = options;

  if (override !== undefined) {
    if (DISABLED_CHOICES.has(override.trim().toLowerCase())) return null;
    const candidate = resolve(override);
    if (await isWritableLocation(candidate)) return candidate;
    log.warn({ path: candidate }, 'Requested state file is not writable; disabling state (mtime-only).');
    return null;
  }

  if (envPath !== undefined) {
    const candidate = resolve(envPath);
    if (await isWritableLocation(candidate)) return candidate;
    log.warn({ path: candidate }, 'EXIFSWEEP_STATE is not writable; disabling state (mtime-only).');
    return null;
  }

  for (const candidate of [join(resolve(root), STATE_FILE_NAME), join(tmpdir(), STATE_FILE_NAME)]) {
    if (await isWritableLocation(candidate)) {
      log.info({ path: candidate }, 'State path auto-selected');
      return candidate;
    }
  }

  log.warn('No writable state path found; disabling state (mtime-only).');
  return null;
}

export class StabilityLedger {
  private location: string | null;
  private warned = false;
  private readonly log: Logger;

  constructor(location: string | null, log: Logger = defaultLogger) {
    this.location = location;
    this.log = log;
  }

  /** Current ledger file, null once persistence is off */
  get path(): string | null {
    return this.location;
  }

  get enabled(): boolean {
    return this.location !== null;
  }

  /**
   * Read the ledger. Never throws: a missing file is an empty ledger, and
   * unreadable content is an empty ledger plus a warning.
   */
  async load(): Promise<LedgerState> {
    if (this.location === null) return {};

    let raw: string;
    try {
      raw = await readFile(this.location, 'utf8');
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        this.log.warn({ path: this.location, err: errorMessage(err) }, 'State load failed');
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.log.warn({ path: this.location, err: errorMessage(err) }, 'State load failed');
      return {};
    }

    const outer = z.record(z.unknown()).safeParse(parsed);
    if (!outer.success || Array.isArray(parsed)) {
      this.log.warn({ path: this.location }, 'State load failed: not a JSON object');
      return {};
    }

    const state: LedgerState = {};
    for (const [key, value] of Object.entries(outer.data)) {
      const record = recordSchema.safeParse(value);
      if (record.success) state[key] = record.data;
    }
    return state;
  }

  /**
   * Drop entries whose file no longer exists.
   */
  async prune(state: LedgerState): Promise<void> {
    for (const key of Object.keys(state)) {
      try {
        await stat(key);
      } catch {
        delete state[key];
      }
    }
  }

  /**
   * Record the current size and mtime of a file. A file that has vanished
   * is left as it was.
   */
  async markSeen(path: string, state: LedgerState, now: number = Date.now() / 1000): Promise<void> {
    const record = await observe(path, now);
    if (record) state[record.key] = record.value;
  }

  /**
   * Persist atomically via a sibling temp file. The first failure disables
   * persistence for the rest of the process.
   */
  async save(state: LedgerState): Promise<void> {
    if (this.location === null) {
      if (!this.warned) {
        this.log.info('State disabled: using mtime-only stability.');
        this.warned = true;
      }
      return;
    }

    const temp = `${this.location}.tmp`;
    try {
      await writeFile(temp, JSON.stringify(state), 'utf8');
      await rename(temp, this.location);
    } catch (err) {
      if (!this.warned) {
        this.log.warn(
          { path: this.location, err: errorMessage(err) },
          'State save failed. Falling back to mtime-only.'
        );
        this.warned = true;
      }
      await rm(temp, { force: true }).catch((cleanupErr: unknown) => {
        this.log.debug({ path: temp, err: errorMessage(cleanupErr) }, 'Could not remove state temp file');
      });
      this.location = null;
    }
  }
}

/**
 * Stat a path and key it by its real path. Null when it no longer exists.
 */
export async function observe(
  path: string,
  now: number = Date.now() / 1000
): Promise<{ key: string; value: StabilityRecord } | null> {
  try {
    const info = await stat(path);
    const key = await realpath(path);
    return { key, value: { size: info.size, mtime: info.mtimeMs / 1000, seen: now } };
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw err;
  }
}
