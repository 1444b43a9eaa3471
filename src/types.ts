/**
 * What to do when a scrubbed output for an input already exists
 */
export type DuplicatePolicy = 'delete' | 'move';

/**
 * Which metadata engine executes the scrub argument list
 */
export type EngineName = 'exiftool' | 'builtin';

export type ShowTagsMode = 'before' | 'after' | 'both';

/**
 * One ledger entry. `mtime` and `seen` are float seconds since the epoch.
 */
export interface StabilityRecord {
  size: number;
  mtime: number;
  seen: number;
}

/**
 * Persisted ledger contents, keyed by resolved absolute path
 */
export type LedgerState = Record<string, StabilityRecord>;

/**
 * A JPEG observed in the input directory during one sweep.
 * Recomputed every run, never persisted.
 */
export interface FileCandidate {
  path: string;
  name: string;
  extension: string;
  size: number;
  /** Float seconds since the epoch */
  mtime: number;
}

/**
 * Result of attempting to process one file.
 */
export type ScrubOutcome =
  | { kind: 'scrubbed'; outputPath: string }
  | { kind: 'skipped'; reason: SkipReason }
  | { kind: 'duplicate'; quarantinePath?: string }
  | { kind: 'error'; message: string };

export type SkipReason = 'temp' | 'unstable' | 'dry-run';

/**
 * Copyright / comment values to stamp into every scrubbed output
 */
export interface StampOptions {
  copyright?: string;
  comment?: string;
}

/**
 * Exit status and captured output of one metadata-tool invocation
 */
export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * The metadata-editing boundary: a pure function over an argument list
 * whose last element is the absolute input path.
 */
export interface MetadataTool {
  readonly name: EngineName;
  run(args: readonly string[]): Promise<ToolResult>;
}

/**
 * Pipeline directories used by the sweep
 */
export interface SweepDirectories {
  input: string;
  output: string;
  processed: string;
  /** Quarantine for duplicates under the `move` policy */
  errors: string;
}

/**
 * Flat `Group:Tag → value` view of a file's metadata
 */
export type TagMap = Record<string, string>;

/**
 * Prints a file's tags before or after its scrub (`--show-tags`)
 */
export interface TagDisplay {
  mode: ShowTagsMode;
  print(label: 'before' | 'after', path: string): Promise<void>;
}
