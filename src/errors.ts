/**
 * Base error class for exifsweep errors
 */
export class ExifSweepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExifSweepError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a pipeline directory fails its pre-run safety check.
 * Aborts the whole run before any file is touched.
 */
export class SafetyCheckError extends ExifSweepError {
  public readonly label: string;
  public readonly path: string;

  constructor(label: string, path: string, reason: string) {
    super(`${label} ${reason}: ${path}`);
    this.name = 'SafetyCheckError';
    this.label = label;
    this.path = path;
  }
}

/**
 * Thrown when environment configuration does not validate
 */
export class ConfigError extends ExifSweepError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown for malformed command-line arguments
 */
export class CliUsageError extends ExifSweepError {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Thrown when the image file is corrupted or malformed
 */
export class CorruptedFileError extends ExifSweepError {
  public readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset !== undefined ? `${message} at offset ${offset}` : message);
    this.name = 'CorruptedFileError';
    this.offset = offset;
  }
}

/**
 * Thrown when attempting to read beyond buffer bounds
 */
export class BufferOverflowError extends ExifSweepError {
  public readonly requested: number;
  public readonly available: number;

  constructor(requested: number, available: number) {
    super(`Buffer overflow: requested ${requested} bytes but only ${available} available`);
    this.name = 'BufferOverflowError';
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Thrown by the built-in engine for argument lists it cannot interpret
 */
export class ToolArgumentError extends ExifSweepError {
  public readonly argument: string | undefined;

  constructor(message: string, argument?: string) {
    super(argument !== undefined ? `${message}: ${argument}` : message);
    this.name = 'ToolArgumentError';
    this.argument = argument;
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
