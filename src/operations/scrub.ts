import { realpath, rm } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

import { errorMessage } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { buildScrubArgs } from './command.js';
import { buildStampArgs } from './stamp.js';
import { lstatOrNull } from './files.js';
import type { MetadataTool, ScrubOutcome, StampOptions } from '../types.js';

export interface ScrubOptions {
  tool: MetadataTool;
  /** Directory for the scrubbed copy; omitted means in place */
  outputDir?: string;
  paranoia?: boolean;
  stamp?: StampOptions;
  logger?: Logger;
}

async function isInPlace(input: string, outputDir: string | undefined): Promise<boolean> {
  if (outputDir === undefined) return true;
  const [inputDir, target] = await Promise.all([realpath(dirname(input)), realpath(outputDir)]);
  return inputDir === target;
}

function firstLine(text: string): string | undefined {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .find(line => line.length > 0);
}

/**
 * Strip one JPEG through the metadata tool. A file at the returned output
 * path is always a complete scrub: failed copies are removed.
 */
export async function scrubFile(input: string, options: ScrubOptions): Promise<ScrubOutcome> {
  const log = options.logger ?? defaultLogger;
  const source = resolve(input);

  let inPlace: boolean;
  try {
    inPlace = await isInPlace(source, options.outputDir);
  } catch (err) {
    return { kind: 'error', message: errorMessage(err) };
  }

  const destination =
    inPlace || options.outputDir === undefined ? source : join(resolve(options.outputDir), basename(source));

  const existing = inPlace ? null : await lstatOrNull(destination);
  if (existing?.isSymbolicLink()) {
    const message = `Destination is a symlink; refusing to scrub into ${destination}`;
    log.error({ destination }, message);
    return { kind: 'error', message };
  }

  const args = buildScrubArgs(source, {
    output: inPlace ? undefined : destination,
    overwrite: inPlace,
    paranoia: options.paranoia,
    stampArgs: buildStampArgs(options.stamp, log),
  });
  log.debug({ engine: options.tool.name, args }, 'Running metadata tool');

  let outcome: ScrubOutcome;
  try {
    const result = await options.tool.run(args);
    outcome =
      result.exitCode === 0
        ? { kind: 'scrubbed', outputPath: destination }
        : { kind: 'error', message: firstLine(result.stderr) ?? 'Unknown error' };
  } catch (err) {
    outcome = { kind: 'error', message: errorMessage(err) };
  }

  if (outcome.kind === 'error') {
    log.error({ input: source, err: outcome.message }, 'Failed to scrub');
    // only remove what this attempt may have written
    if (!inPlace && existing === null) {
      await rm(destination, { force: true });
    }
  } else {
    log.info({ input: source, output: destination }, 'Saved scrubbed file');
  }
  return outcome;
}
