import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { resolveDuplicate, uniqueDestination } from '../../src/operations/duplicate';
import { captureLogger } from '../helpers/capture-logger';

describe('uniqueDestination', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'exifsweep-unique-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should number colliding names', async () => {
    expect(await uniqueDestination(dir, 'a.jpg')).toBe(join(dir, 'a.jpg'));
    writeFileSync(join(dir, 'a.jpg'), '');
    expect(await uniqueDestination(dir, 'a.jpg')).toBe(join(dir, 'a_1.jpg'));
    writeFileSync(join(dir, 'a_1.jpg'), '');
    expect(await uniqueDestination(dir, 'a.jpg')).toBe(join(dir, 'a_2.jpg'));
  });
});

describe('resolveDuplicate', () => {
  let root: string;
  let input: string;
  let destination: string;
  let quarantineDir: string;
  const { logger } = captureLogger();

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'exifsweep-dup-'));
    mkdirSync(join(root, 'input'));
    mkdirSync(join(root, 'output'));
    input = join(root, 'input', 'a.jpg');
    destination = join(root, 'output', 'a.jpg');
    quarantineDir = join(root, 'errors');
    writeFileSync(input, 'original');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should continue when there is no scrubbed output', async () => {
    expect(await resolveDuplicate(input, destination, { policy: 'delete', quarantineDir, logger })).toBeNull();
    expect(existsSync(input)).toBe(true);
  });

  it('should delete the input under the delete policy', async () => {
    writeFileSync(destination, 'scrubbed');

    const outcome = await resolveDuplicate(input, destination, { policy: 'delete', quarantineDir, logger });

    expect(outcome).toEqual({ kind: 'duplicate' });
    expect(existsSync(input)).toBe(false);
    expect(readFileSync(destination, 'utf8')).toBe('scrubbed');
  });

  it('should quarantine the input under the move policy', async () => {
    writeFileSync(destination, 'scrubbed');

    const first = await resolveDuplicate(input, destination, { policy: 'move', quarantineDir, logger });
    writeFileSync(input, 'again');
    const second = await resolveDuplicate(input, destination, { policy: 'move', quarantineDir, logger });

    expect(first).toEqual({ kind: 'duplicate', quarantinePath: join(quarantineDir, 'a.jpg') });
    expect(second).toEqual({ kind: 'duplicate', quarantinePath: join(quarantineDir, 'a_1.jpg') });
    expect(readFileSync(join(quarantineDir, 'a_1.jpg'), 'utf8')).toBe('again');
  });

  it('should change nothing in dry-run mode', async () => {
    writeFileSync(destination, 'scrubbed');

    const outcome = await resolveDuplicate(input, destination, { policy: 'move', quarantineDir, dryRun: true, logger });

    expect(outcome).toEqual({ kind: 'duplicate' });
    expect(existsSync(input)).toBe(true);
    expect(existsSync(quarantineDir)).toBe(false);
  });

  it('should refuse a symlinked output', async () => {
    const elsewhere = join(root, 'elsewhere.jpg');
    writeFileSync(elsewhere, 'x');
    symlinkSync(elsewhere, destination);

    const outcome = await resolveDuplicate(input, destination, { policy: 'delete', quarantineDir, logger });

    expect(outcome).toEqual({ kind: 'error', message: `Refusing to write to symlinked output: ${destination}` });
    expect(existsSync(input)).toBe(true);
  });

  it('should not treat a file as its own duplicate', async () => {
    expect(await resolveDuplicate(input, input, { policy: 'delete', quarantineDir, logger })).toBeNull();
    expect(existsSync(input)).toBe(true);
  });
});
