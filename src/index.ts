/**
 * exifsweep - JPEG metadata scrubbing pipeline
 *
 * Strips identifying EXIF, GPS, XMP and IPTC metadata from JPEGs while
 * keeping exposure and orientation tags. Runs as a one-shot sweep over an
 * upload directory, as a safe copy into an output directory, or in place.
 *
 * @packageDocumentation
 */

// Modes
export { runSweep, enumerateCandidates, DEFAULT_STABLE_SECONDS } from './operations/sweep.js';
export type { SweepOptions } from './operations/sweep.js';
export { runSafeCopy, runInline, previewFile, resolveUnderRoot } from './operations/modes.js';
export type { ModeOptions, SafeCopyOptions, InlineOptions, PreviewOptions } from './operations/modes.js';

// Pipeline stages
export { StabilityLedger, resolveStateLocation, observe, STATE_FILE_NAME } from './operations/ledger.js';
export { isStable, isProbablyTemp, TEMP_PREFIXES, TEMP_SUFFIXES } from './operations/stability.js';
export { resolveDuplicate, uniqueDestination, moveFile } from './operations/duplicate.js';
export { scrubFile } from './operations/scrub.js';
export type { ScrubOptions } from './operations/scrub.js';
export { buildScrubArgs, buildPreserveArgs } from './operations/command.js';
export { buildStampArgs, MAX_COPYRIGHT_BYTES, MAX_COMMENT_BYTES } from './operations/stamp.js';
export { RunSummary, MACHINE_PREFIX } from './operations/summary.js';
export { inspectJpeg, inspectFile, formatTags } from './operations/inspect.js';
export { assertSafeDirectory, ensureSafeDirectory, findJpegs } from './operations/files.js';

// Engines
export { createTool, BuiltinTool, ExiftoolTool, parseToolArguments, rewriteJpeg } from './engine/index.js';
export type { ToolOptions, ScrubInstruction } from './engine/index.js';

// Config and logging
export { loadConfig } from './config.js';
export type { AppConfig, LogLevel, LogFormat } from './config.js';
export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';

// CLI
export { main, parseArgs } from './cli.js';

// Types
export type {
  DuplicatePolicy,
  EngineName,
  ShowTagsMode,
  StabilityRecord,
  LedgerState,
  FileCandidate,
  ScrubOutcome,
  SkipReason,
  StampOptions,
  ToolResult,
  MetadataTool,
  SweepDirectories,
  TagMap,
  TagDisplay,
} from './types.js';

// Error classes
export {
  ExifSweepError,
  SafetyCheckError,
  ConfigError,
  CliUsageError,
  CorruptedFileError,
  BufferOverflowError,
  ToolArgumentError,
} from './errors.js';

// Format-level access
export { jpeg } from './formats/jpeg.js';
export { readExifTags } from './exif/reader.js';
