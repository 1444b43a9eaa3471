import { describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { HELP, main, parseArgs, pipelineDirectories } from '../../src/cli';
import type { CliIo } from '../../src/cli';
import { CliUsageError } from '../../src/errors';

function captureIo(): CliIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return { stdout, stderr, out: line => void stdout.push(line), err: line => void stderr.push(line) };
}

describe('parseArgs', () => {
  it('should default to safe copy mode', () => {
    expect(parseArgs([])).toEqual({
      files: [],
      fromInput: false,
      cleanInline: false,
      recursive: false,
      dryRun: false,
      preview: false,
      paranoia: false,
      deleteOriginal: false,
      quiet: false,
      debug: false,
      help: false,
      version: false,
    });
  });

  it('should parse flags and values', () => {
    const args = parseArgs([
      '--from-input',
      '--dry-run',
      '--max-files',
      '5',
      '--on-duplicate',
      'move',
      '--stable-seconds',
      '0',
      '--state-file',
      'disabled',
      '--engine',
      'builtin',
      '--show-tags',
      'both',
      '--copyright',
      'Test Owner',
      '--log-level',
      'crit',
    ]);

    expect(args).toMatchObject({
      fromInput: true,
      dryRun: true,
      maxFiles: 5,
      onDuplicate: 'move',
      stableSeconds: 0,
      stateFile: 'disabled',
      engine: 'builtin',
      showTags: 'both',
      copyright: 'Test Owner',
      logLevel: 'fatal',
    });
  });

  it('should take positional paths in inline mode', () => {
    expect(parseArgs(['--clean-inline', '-r', 'a.jpg', 'albums']).files).toEqual(['a.jpg', 'albums']);
  });

  it.each([
    [['--bogus'], 'Unknown option: --bogus'],
    [['--root'], '--root requires a value'],
    [['--max-files', 'abc'], '--max-files must be a non-negative integer'],
    [['--stable-seconds', '-1'], '--stable-seconds must be a non-negative integer'],
    [['--on-duplicate', 'keep'], '--on-duplicate must be one of: delete, move'],
    [['--log-level', 'loud'], '--log-level must be one of: fatal, error, warn, info, debug, trace, silent'],
    [['--clean-inline', '--from-input'], '--clean-inline and --from-input cannot be used together.'],
    [['a.jpg'], 'Positional file or directory arguments require --clean-inline.'],
  ])('should reject %j', (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(CliUsageError);
    expect(() => parseArgs(argv)).toThrow(message);
  });
});

describe('pipelineDirectories', () => {
  it('should place the pipeline under the root', () => {
    expect(pipelineDirectories('/photos')).toEqual({
      input: '/photos/input',
      output: '/photos/output',
      processed: '/photos/processed',
      errors: '/photos/errors',
    });
  });
});

describe('main', () => {
  it('should print help', async () => {
    const io = captureIo();
    expect(await main(['--help'], {}, io)).toBe(0);
    expect(io.stdout).toEqual([HELP]);
  });

  it('should print the package version', async () => {
    const io = captureIo();
    expect(await main(['-v'], {}, io)).toBe(0);
    expect(io.stdout).toEqual(['exifsweep 0.4.0']);
  });

  it('should exit 1 on a usage error', async () => {
    const io = captureIo();
    expect(await main(['--bogus'], {}, io)).toBe(1);
    expect(io.stderr).toEqual(['Error: Unknown option: --bogus']);
    expect(io.stdout).toEqual([]);
  });

  it('should exit 1 on invalid configuration', async () => {
    const io = captureIo();
    expect(await main([], { EXIFSWEEP_ON_DUPLICATE: 'keep' }, io)).toBe(1);
    expect(io.stderr[0]).toMatch(/^Error: Environment validation failed:\nEXIFSWEEP_ON_DUPLICATE: /);
  });

  it('should refuse to run as root unless allowed', async () => {
    const io = captureIo();

    expect(await main([], {}, io, 0)).toBe(1);
    expect(io.stderr).toEqual(['Running as root is not allowed unless ALLOW_ROOT=1 is set.']);
    expect(io.stdout).toEqual([]);
  });

  it('should let root run with ALLOW_ROOT=1', async () => {
    const root = mkdtempSync(join(tmpdir(), 'exifsweep-cli-root-'));
    const io = captureIo();
    const env = { ALLOW_ROOT: '1', LOG_LEVEL: 'silent', LOG_FORMAT: 'json', EXIFSWEEP_ROOT: root };

    try {
      expect(await main(['--state-file', 'disabled'], env, io, 0)).toBe(0);
      expect(io.stderr).toEqual([]);
      expect(io.stdout.at(-1)).toMatch(/^EXIFSWEEP_SUMMARY total=0 /);
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  });
});
