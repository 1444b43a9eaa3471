import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { buildPreserveArgs, buildScrubArgs } from '../../src/operations/command';
import { buildStampArgs, MAX_COPYRIGHT_BYTES } from '../../src/operations/stamp';
import { captureLogger } from '../helpers/capture-logger';

describe('buildPreserveArgs', () => {
  it('should copy every preserved tag from every group', () => {
    const args = buildPreserveArgs();

    expect(args.slice(0, 8)).toEqual([
      '-ExposureTime',
      '-XMP:ExposureTime',
      '-XMP-dc:ExposureTime',
      '-EXIF:ExposureTime',
      '-IPTC:ExposureTime',
      '-Makernotes:ExposureTime',
      '-Comment:ExposureTime',
      '-PhotoShop:ExposureTime',
    ]);
    expect(args).toHaveLength(56);
    expect(args).toContain('-ColorSpaceTags');
  });

  it('should leave out the colour-space bundle in paranoia mode', () => {
    const args = buildPreserveArgs(true);

    expect(args).toHaveLength(48);
    expect(args.some(a => a.endsWith('ColorSpaceTags'))).toBe(false);
  });
});

describe('buildScrubArgs', () => {
  it('should end with the absolute input path', () => {
    const args = buildScrubArgs('photo.jpg');

    expect(args.slice(0, 5)).toEqual(['-P', '-all=', '-gps:all=', '-tagsFromFile', '@']);
    expect(args.at(-1)).toBe(resolve('photo.jpg'));
    expect(args).not.toContain('-o');
  });

  it('should clear the ICC profile before copying tags back in paranoia mode', () => {
    const args = buildScrubArgs('/a.jpg', { paranoia: true });
    expect(args[5]).toBe('-ICC_Profile:all=');
  });

  it('should place overwrite first and the output before the input', () => {
    const inPlace = buildScrubArgs('/a.jpg', { overwrite: true });
    expect(inPlace[0]).toBe('-overwrite_original');

    const copy = buildScrubArgs('/a.jpg', { output: '/out/a.jpg', stampArgs: ['-EXIF:Copyright=C'] });
    expect(copy.slice(-4)).toEqual(['-EXIF:Copyright=C', '-o', '/out/a.jpg', '/a.jpg']);
  });
});

describe('buildStampArgs', () => {
  it('should produce nothing without values', () => {
    expect(buildStampArgs({})).toEqual([]);
  });

  it('should stamp EXIF and XMP together', () => {
    expect(buildStampArgs({ copyright: 'Test Owner', comment: 'hi' })).toEqual([
      '-EXIF:Copyright=Test Owner',
      '-XMP-dc:Rights=Test Owner',
      '-EXIF:UserComment=hi',
      '-XMP-dc:Description=hi',
    ]);
  });

  it('should truncate long values and warn', () => {
    const { logger, messages } = captureLogger();
    const [copyright] = buildStampArgs({ copyright: 'a'.repeat(300) }, logger);

    expect(copyright).toBe(`-EXIF:Copyright=${'a'.repeat(MAX_COPYRIGHT_BYTES)}`);
    expect(messages()).toEqual(['Copyright exceeds 256 bytes; truncating']);
  });

  it('should truncate on a character boundary', () => {
    const { logger } = captureLogger();
    const [comment] = buildStampArgs({ comment: 'é'.repeat(600) }, logger);

    expect(comment).toBe(`-EXIF:UserComment=${'é'.repeat(512)}`);
  });
});
