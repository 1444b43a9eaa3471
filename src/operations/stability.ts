import { basename, extname } from 'node:path';

import { observe } from './ledger.js';
import type { StabilityLedger } from './ledger.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { LedgerState } from '../types.js';

export const TEMP_PREFIXES = ['.', '~', '._'] as const;

export const TEMP_SUFFIXES = [
  '.tmp',
  '.part',
  '.partial',
  '.crdownload',
  '.download',
  '.upload',
  '.cache',
  '.swp',
  '.swx',
  '.lck',
] as const;

const TEMP_SUFFIX_SET: ReadonlySet<string> = new Set(TEMP_SUFFIXES);

/**
 * Whether a file name looks like an in-flight upload, editor swap file or
 * other partial artifact. Only the final path component is inspected.
 */
export function isProbablyTemp(path: string): boolean {
  const name = basename(path);
  if (TEMP_PREFIXES.some(prefix => name.startsWith(prefix))) {
    return true;
  }
  const lower = name.toLowerCase();
  if (TEMP_SUFFIX_SET.has(extname(lower))) {
    return true;
  }
  return TEMP_SUFFIXES.some(suffix => lower.endsWith(suffix));
}

/**
 * Decide whether a file is safe to scrub this run: old enough, and
 * unchanged since the previous sweep saw it. The observation is recorded
 * in `state` whatever the verdict.
 *
 * @param now - current time in seconds since the epoch
 */
export async function isStable(
  path: string,
  ledger: StabilityLedger,
  state: LedgerState,
  thresholdSeconds: number,
  now: number = Date.now() / 1000,
  log: Logger = defaultLogger
): Promise<boolean> {
  const current = await observe(path, now);
  if (!current) {
    log.debug({ path, reason: 'missing' }, 'Stability check: unstable');
    return false;
  }

  const { size, mtime } = current.value;
  const previous = ledger.enabled ? state[current.key] : undefined;
  const age = now - mtime;

  let reason = 'ok';
  if (thresholdSeconds > 0 && age < thresholdSeconds) {
    reason = `age<${thresholdSeconds}`;
  } else if (previous && (previous.size !== size || previous.mtime !== mtime)) {
    reason = 'changed';
  }
  const stable = reason === 'ok';

  log.debug(
    {
      path,
      size,
      age: Number(age.toFixed(2)),
      threshold: thresholdSeconds,
      previous: previous ? { size: previous.size, mtime: previous.mtime, seenAge: now - previous.seen } : null,
      stable,
      reason,
    },
    'Stability check'
  );

  state[current.key] = current.value;
  return stable;
}
