import { truncateUtf8 } from '../binary/bytes.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { StampOptions } from '../types.js';

export const MAX_COPYRIGHT_BYTES = 256;
export const MAX_COMMENT_BYTES = 1024;

function fit(label: string, value: string, maxBytes: number, log: Logger): string {
  const truncated = truncateUtf8(value, maxBytes);
  if (truncated !== value) {
    log.warn({ maxBytes }, `${label} exceeds ${maxBytes} bytes; truncating`);
  }
  return truncated;
}

/**
 * Assignment arguments that stamp copyright and comment into both EXIF and
 * XMP. Unset values produce no arguments.
 */
export function buildStampArgs(stamp: StampOptions = {}, log: Logger = defaultLogger): string[] {
  const args: string[] = [];
  if (stamp.copyright !== undefined) {
    const copyright = fit('Copyright', stamp.copyright, MAX_COPYRIGHT_BYTES, log);
    args.push(`-EXIF:Copyright=${copyright}`, `-XMP-dc:Rights=${copyright}`);
  }
  if (stamp.comment !== undefined) {
    const comment = fit('Comment', stamp.comment, MAX_COMMENT_BYTES, log);
    args.push(`-EXIF:UserComment=${comment}`, `-XMP-dc:Description=${comment}`);
  }
  return args;
}
