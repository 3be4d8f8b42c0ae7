import { after, before, describe, test } from 'node:test';
import assert from 'node:assert';
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import {
  collectInfo,
  collectInputFiles,
  decodeBatch,
  decodeFile,
  formatInfo,
  outputPathFor
} from '../../src/cli/batch.js';
import { buildGif } from '../../src/test-utils/gif-builder.js';
import { createTestBmp, createTestPng } from '../../src/test-utils/image-fixtures.js';
import { buildJpeg, flatGreyJpeg, sof, unitDqt } from '../../src/test-utils/jpeg-builder.js';
import { JpegMarker } from '../../src/jpeg-markers.js';
import { PNG_SIGNATURE } from '../../src/utils.js';

const logger = pino({ level: 'silent' });

describe('batch decoding', () => {
  let dir: string;
  let inputs: string;
  let output: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vexel-batch-'));
    inputs = join(dir, 'in');
    output = join(dir, 'out');
    await mkdir(inputs);
    await mkdir(output);
    await mkdir(join(inputs, 'nested'));

    await writeFile(join(inputs, 'a.png'), createTestPng(2, 3, [1, 2, 3, 255]));
    await writeFile(join(inputs, 'b.bmp'), createTestBmp(1, 1, new Uint8Array([4, 5, 6])));
    await writeFile(
      join(inputs, 'c.gif'),
      buildGif({ width: 1, height: 1, globalPalette: [[7, 8, 9], [0, 0, 0]], frames: [{ width: 1, height: 1, indices: [0] }] })
    );
    await writeFile(join(inputs, 'd.png'), new Uint8Array([...PNG_SIGNATURE, 0, 0, 0]));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('collectInputFiles expands directories to their sorted files', async () => {
    const missing = join(dir, 'missing.jpg');
    const files = await collectInputFiles([inputs, missing]);
    assert.deepStrictEqual(files, [
      join(inputs, 'a.png'),
      join(inputs, 'b.bmp'),
      join(inputs, 'c.gif'),
      join(inputs, 'd.png'),
      missing
    ]);
  });

  test('outputPathFor swaps the extension', () => {
    assert.strictEqual(outputPathFor(join('photos', 'cat.jpeg'), 'out', 'bmp'), join('out', 'cat.bmp'));
  });

  test('each file succeeds or fails on its own', async () => {
    const files = await collectInputFiles([inputs]);
    const results = await decodeBatch(files, { outputDir: output, outputFormat: 'ppm', logger });

    assert.deepStrictEqual(
      results.map((result) => result.ok),
      [true, true, true, false]
    );

    const [png, bmp, gif, broken] = results;
    assert.deepStrictEqual(png, {
      ok: true,
      path: join(inputs, 'a.png'),
      format: 'png',
      width: 2,
      height: 3,
      frames: 0,
      output: join(output, 'a.ppm')
    });
    assert.strictEqual(bmp.ok && bmp.format, 'bmp');
    assert.strictEqual(gif.ok && gif.frames, 1);
    assert.strictEqual(broken.path, join(inputs, 'd.png'));

    const ppm = new Uint8Array(await readFile(join(output, 'b.ppm')));
    assert.deepStrictEqual(Array.from(ppm.subarray(ppm.length - 3)), [4, 5, 6]);
    await assert.rejects(access(join(output, 'd.ppm')));
  });

  test('a missing file is reported, not thrown', async () => {
    const result = await decodeFile(join(dir, 'nope.png'), { logger });
    assert.strictEqual(result.ok, false);
  });

  test('decodeFile writes nothing without an output directory', async () => {
    const result = await decodeFile(join(inputs, 'b.bmp'), { logger });
    assert.ok(result.ok);
    assert.strictEqual(result.output, undefined);
  });

  test('collectInfo keeps header info when decoding fails', async () => {
    const noScan = join(dir, 'no-scan.jpg');
    await writeFile(noScan, buildJpeg([unitDqt(), sof(JpegMarker.SOF0, 8, 8, [{ id: 1 }])]));

    const [header, broken] = await collectInfo([noScan, join(inputs, 'd.png')], { logger });
    assert.strictEqual(header.info?.format, 'jpeg');
    assert.strictEqual(header.error, 'No scan data found');
    assert.strictEqual(broken.info, undefined);
    assert.ok(broken.error);
  });

  test('formatInfo summarises byte arrays', async () => {
    const path = join(dir, 'grey.jpg');
    await writeFile(path, flatGreyJpeg());
    const [result] = await collectInfo([path], { logger });
    assert.ok(result.info);

    const parsed: unknown = JSON.parse(formatInfo(result.info));
    assert.ok(typeof parsed === 'object' && parsed !== null && 'jfifHeader' in parsed);
    assert.deepStrictEqual(parsed.jfifHeader, {
      identifier: 'JFIF',
      versionMajor: 1,
      versionMinor: 2,
      densityUnits: 1,
      xDensity: 72,
      yDensity: 72,
      thumbnailWidth: 0,
      thumbnailHeight: 0,
      thumbnail: '<0 bytes>'
    });
  });
});
