import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { scrubFile } from '../../src/operations/scrub';
import { BuiltinTool } from '../../src/engine/builtin';
import { inspectFile } from '../../src/operations/inspect';
import type { MetadataTool, ToolResult } from '../../src/types';
import { writeTestJpeg } from '../helpers/create-test-jpeg';
import { captureLogger } from '../helpers/capture-logger';

/** Writes a partial output, then reports failure */
class PartialWriteTool implements MetadataTool {
  readonly name = 'exiftool' as const;
  calls: string[][] = [];

  async run(args: readonly string[]): Promise<ToolResult> {
    this.calls.push([...args]);
    const out = args[args.indexOf('-o') + 1];
    if (out !== undefined) await writeFile(out, 'partial');
    return { exitCode: 1, stdout: '', stderr: '' };
  }
}

class ThrowingTool implements MetadataTool {
  readonly name = 'exiftool' as const;

  async run(): Promise<ToolResult> {
    throw new Error('tool exploded');
  }
}

describe('scrubFile', () => {
  let root: string;
  let input: string;
  let outputDir: string;
  const tool = new BuiltinTool();
  const { logger } = captureLogger();

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'exifsweep-scrub-'));
    input = join(root, 'input', 'a.jpg');
    outputDir = join(root, 'output');
    writeTestJpeg(input);
    mkdirSync(outputDir);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should write a scrubbed copy into the output directory', async () => {
    const outcome = await scrubFile(input, { tool, outputDir, logger });
    const outputPath = join(resolve(outputDir), 'a.jpg');

    expect(outcome).toEqual({ kind: 'scrubbed', outputPath });
    const tags = await inspectFile(outputPath);
    expect(tags['IFD0:Make']).toBeUndefined();
    expect(tags['GPS:GPSLatitude']).toBeUndefined();
    expect(tags['ExifIFD:ExposureTime']).toBe('1/125');
    expect(existsSync(input)).toBe(true);
  });

  it('should edit in place when the output directory is the input directory', async () => {
    const outcome = await scrubFile(input, { tool, outputDir: join(root, 'input'), logger });

    expect(outcome).toEqual({ kind: 'scrubbed', outputPath: resolve(input) });
    expect(readdirSync(join(root, 'input'))).toEqual(['a.jpg']);
    expect((await inspectFile(input))['IFD0:Make']).toBeUndefined();
  });

  it('should edit in place without an output directory', async () => {
    const outcome = await scrubFile(input, { tool, logger });
    expect(outcome).toEqual({ kind: 'scrubbed', outputPath: resolve(input) });
  });

  it('should report the first line of the tool error', async () => {
    const bad = join(root, 'input', 'bad.jpg');
    writeFileSync(bad, 'not a jpeg');

    const outcome = await scrubFile(bad, { tool, outputDir, logger });

    expect(outcome).toEqual({ kind: 'error', message: `Error: Invalid JPEG: missing SOI marker - ${resolve(bad)}` });
    expect(readdirSync(outputDir)).toEqual([]);
  });

  it('should remove a partial output after a failure', async () => {
    const partial = new PartialWriteTool();

    const outcome = await scrubFile(input, { tool: partial, outputDir, logger });

    expect(outcome).toEqual({ kind: 'error', message: 'Unknown error' });
    expect(partial.calls).toHaveLength(1);
    expect(readdirSync(outputDir)).toEqual([]);
  });

  it('should turn a thrown tool error into an error outcome', async () => {
    const outcome = await scrubFile(input, { tool: new ThrowingTool(), outputDir, logger });
    expect(outcome).toEqual({ kind: 'error', message: 'tool exploded' });
  });

  it('should leave an existing output alone when the scrub fails', async () => {
    writeFileSync(join(outputDir, 'a.jpg'), 'previous');

    const outcome = await scrubFile(input, { tool, outputDir, logger });

    expect(outcome.kind).toBe('error');
    expect(readFileSync(join(outputDir, 'a.jpg'), 'utf8')).toBe('previous');
  });

  it('should refuse a symlinked destination', async () => {
    const target = join(root, 'elsewhere.jpg');
    writeFileSync(target, 'x');
    symlinkSync(target, join(outputDir, 'a.jpg'));

    const outcome = await scrubFile(input, { tool, outputDir, logger });

    expect(outcome).toEqual({
      kind: 'error',
      message: `Destination is a symlink; refusing to scrub into ${join(resolve(outputDir), 'a.jpg')}`,
    });
    expect(readFileSync(target, 'utf8')).toBe('x');
  });

  it('should stamp requested values', async () => {
    await scrubFile(input, { tool, outputDir, stamp: { copyright: 'Test Owner' }, logger });

    const tags = await inspectFile(join(outputDir, 'a.jpg'));
    expect(tags['IFD0:Copyright']).toBe('Test Owner');
    expect(tags['XMP-dc:rights']).toBe('Test Owner');
  });
});
