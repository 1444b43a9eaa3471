import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, realpathSync, rmSync, symlinkSync } from 'fs';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import { runInline, runSafeCopy } from '../../src/operations/modes';
import type { InlineOptions, SafeCopyOptions } from '../../src/operations/modes';
import { BuiltinTool } from '../../src/engine/builtin';
import { inspectFile } from '../../src/operations/inspect';
import { pipelineDirectories } from '../../src/cli';
import { SafetyCheckError } from '../../src/errors';
import type { TagMap } from '../../src/types';
import { writeTestJpeg } from '../helpers/create-test-jpeg';
import { captureLogger } from '../helpers/capture-logger';

const tool = new BuiltinTool();
let base: string;
let root: string;

beforeEach(() => {
  base = realpathSync(mkdtempSync(join(tmpdir(), 'exifsweep-modes-')));
  root = join(base, 'photos');
  mkdirSync(root);
});

afterEach(() => {
  rmSync(base, { recursive: true, force: true });
});

describe('runSafeCopy', () => {
  function safeCopy(options: Partial<SafeCopyOptions> = {}) {
    const { logger } = captureLogger();
    return runSafeCopy({ tool, root, directories: pipelineDirectories(root), logger, ...options });
  }

  beforeEach(() => {
    writeTestJpeg(join(root, 'a.jpg'));
    writeTestJpeg(join(root, 'b.jpeg'));
    writeTestJpeg(join(root, 'album', 'c.jpg'));
    writeTestJpeg(join(root, 'input', 'queued.jpg'));
  });

  it('should copy top-level JPEGs into output and leave originals alone', async () => {
    const before = readFileSync(join(root, 'a.jpg'));

    const summary = await safeCopy();

    expect(summary).toMatchObject({ total: 2, scrubbed: 2, errors: 0 });
    expect(readdirSync(join(root, 'output')).sort()).toEqual(['a.jpg', 'b.jpeg']);
    expect(readFileSync(join(root, 'a.jpg'))).toEqual(before);
    expect((await inspectFile(join(root, 'output', 'a.jpg')))['IFD0:Make']).toBeUndefined();
  });

  it('should descend into subdirectories but not the pipeline directories', async () => {
    const summary = await safeCopy({ recursive: true });

    expect(summary).toMatchObject({ total: 3, scrubbed: 3 });
    expect(readdirSync(join(root, 'output')).sort()).toEqual(['a.jpg', 'b.jpeg', 'c.jpg']);
    expect(readdirSync(join(root, 'input'))).toEqual(['queued.jpg']);
  });

  it('should refuse to run when output already exists', async () => {
    mkdirSync(join(root, 'output'));

    await expect(safeCopy()).rejects.toThrow(SafetyCheckError);
    await expect(safeCopy()).rejects.toThrow(
      `Output directory already exists; remove it or use --clean-inline/--from-input: ${join(root, 'output')}`
    );
    expect(readdirSync(join(root, 'output'))).toEqual([]);
  });

  it('should not create output in dry-run', async () => {
    const summary = await safeCopy({ dryRun: true });

    expect(summary).toMatchObject({ total: 2, scrubbed: 0, skipped: 0 });
    expect(existsSync(join(root, 'output'))).toBe(false);
  });

  it('should report a name collision as an error', async () => {
    writeTestJpeg(join(root, 'album', 'a.jpg'));

    const summary = await safeCopy({ recursive: true });

    expect(summary).toMatchObject({ total: 4, scrubbed: 3, errors: 1 });
    expect(existsSync(join(root, 'album', 'a.jpg'))).toBe(true);
  });

  it('should respect max files', async () => {
    const summary = await safeCopy({ maxFiles: 1 });

    expect(summary.total).toBe(1);
    expect(readdirSync(join(root, 'output'))).toEqual(['a.jpg']);
  });
});

describe('runInline', () => {
  function inline(options: Partial<InlineOptions> = {}) {
    const { logger } = captureLogger();
    return runInline({ tool, root, logger, ...options });
  }

  beforeEach(() => {
    writeTestJpeg(join(root, 'a.jpg'));
    writeTestJpeg(join(root, 'b.jpg'));
    writeTestJpeg(join(root, 'album', 'c.jpg'));
  });

  it('should scrub a relative path in place', async () => {
    const summary = await inline({ paths: ['a.jpg'] });

    expect(summary).toMatchObject({ total: 1, scrubbed: 1 });
    expect((await inspectFile(join(root, 'a.jpg')))['IFD0:Make']).toBeUndefined();
    expect((await inspectFile(join(root, 'b.jpg')))['IFD0:Make']).toBe('TestCam');
    expect(readdirSync(root).sort()).toEqual(['a.jpg', 'album', 'b.jpg']);
  });

  it('should scrub the whole root when no paths are given', async () => {
    expect(await inline()).toMatchObject({ total: 2, scrubbed: 2 });
    expect(await inline({ recursive: true })).toMatchObject({ total: 3, scrubbed: 3 });
  });

  it('should accept a directory argument', async () => {
    const summary = await inline({ paths: ['album'] });

    expect(summary).toMatchObject({ total: 1, scrubbed: 1 });
    expect((await inspectFile(join(root, 'album', 'c.jpg')))['IFD0:Make']).toBeUndefined();
  });

  it('should leave files untouched in dry-run', async () => {
    const before = readFileSync(join(root, 'a.jpg'));

    const summary = await inline({ paths: ['a.jpg'], dryRun: true });

    expect(summary).toMatchObject({ total: 1, scrubbed: 0, skipped: 0 });
    expect(readFileSync(join(root, 'a.jpg'))).toEqual(before);
  });

  it('should refuse paths outside the root', async () => {
    writeTestJpeg(join(base, 'outside.jpg'));

    await expect(inline({ paths: ['../outside.jpg'] })).rejects.toThrow(
      `Path escapes allowed root ${root}: ../outside.jpg`
    );
  });

  it('should refuse missing paths', async () => {
    await expect(inline({ paths: ['missing.jpg'] })).rejects.toThrow(
      `Path does not exist: ${join(root, 'missing.jpg')}`
    );
  });

  it('should refuse symbolic links', async () => {
    symlinkSync(join(root, 'a.jpg'), join(root, 'link.jpg'));

    await expect(inline({ paths: ['link.jpg'] })).rejects.toThrow(
      `Path is a symbolic link (not allowed): ${join(root, 'link.jpg')}`
    );
  });

  it('should preview one file without modifying it', async () => {
    const before = readFileSync(join(root, 'a.jpg'));
    const printed: Array<[string, string]> = [];
    const tags: Record<string, TagMap> = {};
    let workDir = '';

    const summary = await inline({
      paths: ['a.jpg', 'b.jpg'],
      preview: async (label, path) => {
        printed.push([label, basename(path)]);
        tags[label] = await inspectFile(path);
        if (label === 'after') workDir = dirname(path);
      },
    });

    expect(printed).toEqual([
      ['before', 'a.jpg'],
      ['after', 'scrubbed-a.jpg'],
    ]);
    expect(tags['before']?.['IFD0:Make']).toBe('TestCam');
    expect(tags['after']?.['IFD0:Make']).toBeUndefined();
    expect(tags['after']?.['ExifIFD:ExposureTime']).toBe('1/125');
    expect(readFileSync(join(root, 'a.jpg'))).toEqual(before);
    expect(existsSync(workDir)).toBe(false);
    expect(summary.total).toBe(0);
  });
});
