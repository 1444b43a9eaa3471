import type { Logger } from '../logger.js';
import type { TagDisplay } from '../types.js';

export async function showBefore(display: TagDisplay | undefined, path: string): Promise<void> {
  if (display && (display.mode === 'before' || display.mode === 'both')) {
    await display.print('before', path);
  }
}

export async function showAfter(
  display: TagDisplay | undefined,
  path: string | null,
  log: Logger
): Promise<void> {
  if (!display || (display.mode !== 'after' && display.mode !== 'both')) return;
  if (path === null) {
    log.warn('Cannot show tags after scrub in dry-run mode (no scrub performed).');
    return;
  }
  await display.print('after', path);
}
