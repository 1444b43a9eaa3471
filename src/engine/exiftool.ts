import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import type { MetadataTool, ToolResult } from '../types.js';

const execFileAsync = promisify(execFile);

/** Exit code reported when the binary could not be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

function stringField(err: Error, field: 'stdout' | 'stderr'): string {
  if (!(field in err)) return '';
  const value: unknown = Reflect.get(err, field);
  return typeof value === 'string' ? value : '';
}

/**
 * Map a rejected execFile call to a ToolResult. Numeric codes are exit
 * statuses; string codes (ENOENT, EACCES) mean the spawn itself failed.
 */
export function toolFailure(err: unknown): ToolResult {
  if (!(err instanceof Error)) {
    return { exitCode: SPAWN_FAILURE_EXIT_CODE, stdout: '', stderr: String(err) };
  }
  const stdout = stringField(err, 'stdout');
  const stderr = stringField(err, 'stderr');
  const code: unknown = 'code' in err ? err.code : undefined;
  if (typeof code === 'number') {
    return { exitCode: code, stdout, stderr };
  }
  return { exitCode: SPAWN_FAILURE_EXIT_CODE, stdout, stderr: stderr || err.message };
}

/**
 * Runs the external exiftool binary without a shell.
 */
export class ExiftoolTool implements MetadataTool {
  readonly name = 'exiftool' as const;

  constructor(private readonly command = 'exiftool') {}

  async run(args: readonly string[]): Promise<ToolResult> {
    try {
      const { stdout, stderr } = await execFileAsync(this.command, [...args], {
        encoding: 'utf8',
        maxBuffer: 64 * 1024 * 1024,
      });
      return { exitCode: 0, stdout, stderr };
    } catch (err) {
      return toolFailure(err);
    }
  }
}
