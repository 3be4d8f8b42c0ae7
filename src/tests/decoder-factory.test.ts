/**
 * Decoder Factory Tests
 *
 * Input normalisation, plugin lookup and the default registry.
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemorySource } from '../byte-source.js';
import type { ByteSource } from '../byte-source.js';
import { IoError, UnsupportedFormatError } from '../errors.js';
import { Image } from '../image.js';
import {
  BmpDecoder,
  GifDecoder,
  JpegDecoder,
  PngDecoder,
  createDecoder,
  findPlugin,
  pngDecoder,
  toByteSource
} from '../decoders/index.js';
import { clearDefaultDecoderPlugins, getDefaultDecoderPlugins, setDefaultDecoderPlugins } from '../decoders/plugin-registry.js';
import type { DecoderPlugin, ImageDecoder } from '../decoders/types.js';
import type { BmpInfo } from '../decoders/bmp-decoder.js';
import { buildGif } from '../test-utils/gif-builder.js';
import { flatGreyJpeg } from '../test-utils/jpeg-builder.js';
import { createMagicBytesTest, createTestBmp, createTestPng } from '../test-utils/image-fixtures.js';

const RED = [255, 0, 0, 255];

describe('Decoder Factory - createDecoder', () => {
  test('creates a PNG decoder with its header read', async () => {
    const decoder = await createDecoder(createTestPng(10, 6, RED));
    assert.ok(decoder instanceof PngDecoder, 'Should be PNG decoder');
    assert.strictEqual(decoder.format, 'png');

    const info = decoder.getImageInfo();
    if (info.format !== 'png') {
      assert.fail(`expected png info, got ${info.format}`);
    }
    assert.strictEqual(info.width, 10);
    assert.strictEqual(info.height, 6);
  });

  test('creates decoders for JPEG, GIF and BMP bytes', async () => {
    assert.ok((await createDecoder(flatGreyJpeg())) instanceof JpegDecoder);
    const gif = buildGif({ width: 1, height: 1, globalPalette: [[0, 0, 0]], frames: [{ width: 1, height: 1, indices: [0] }] });
    assert.ok((await createDecoder(gif)) instanceof GifDecoder);
    assert.ok((await createDecoder(createTestBmp(1, 1, new Uint8Array(3)))) instanceof BmpDecoder);
  });

  test('accepts an ArrayBuffer', async () => {
    const png = createTestPng(3, 3, RED);
    const buffer = new ArrayBuffer(png.length);
    new Uint8Array(buffer).set(png);

    const decoder = await createDecoder(buffer);
    assert.strictEqual(decoder.format, 'png');
  });

  test('accepts a file path', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'vexel-factory-'));
    try {
      const path = join(dir, 'red.png');
      await writeFile(path, createTestPng(2, 2, RED));
      const image = await (await createDecoder(path)).decode();
      assert.deepStrictEqual(Array.from(image.asRgba8()), [...RED, ...RED, ...RED, ...RED]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test('accepts a positioned byte source', async () => {
    const source = new MemorySource(createTestPng(2, 2, RED));
    source.seek(20);
    const decoder = await createDecoder(source);
    assert.strictEqual(decoder.format, 'png');
  });

  test('rejects unrecognised data', async () => {
    await assert.rejects(createDecoder(new Uint8Array(64)), UnsupportedFormatError);
  });

  test('reports a missing file as an I/O error', async () => {
    await assert.rejects(createDecoder(join(tmpdir(), 'vexel-no-such-file.png')), IoError);
  });

  test('honours explicit decoder plugins', async () => {
    await assert.rejects(
      createDecoder(flatGreyJpeg(), { decoders: [pngDecoder] }),
      /No decoder registered for format "jpeg"/
    );
  });

  test('calls readHeader on the plugin decoder', async () => {
    let headerReads = 0;
    class CountingDecoder implements ImageDecoder<BmpInfo> {
      readonly format = 'bmp' as const;
      private readonly inner: BmpDecoder;

      constructor(source: ByteSource) {
        this.inner = new BmpDecoder(source);
      }

      readHeader(): BmpInfo {
        headerReads++;
        return this.inner.readHeader();
      }

      decode(): Promise<Image> {
        return this.inner.decode();
      }

      getImageInfo(): BmpInfo {
        return this.inner.getImageInfo();
      }
    }
    const plugin: DecoderPlugin = { format: 'bmp', create: (source) => new CountingDecoder(source) };

    const decoder = await createDecoder(createTestBmp(1, 1, new Uint8Array([1, 2, 3])), { decoders: [plugin] });
    assert.strictEqual(headerReads, 1);
    const image = await decoder.decode();
    assert.ok(image instanceof Image);
    assert.deepStrictEqual(Array.from(image.asRgb8()), [1, 2, 3]);
  });
});

describe('Decoder Factory - helpers', () => {
  test('toByteSource passes sources through', async () => {
    const source = new MemorySource(new Uint8Array([1]));
    assert.strictEqual(await toByteSource(source), source);
  });

  test('toByteSource wraps bytes', async () => {
    const source = await toByteSource(new Uint8Array([1, 2, 3]));
    assert.strictEqual(source.length, 3);
    assert.strictEqual(source.readByte(), 1);
  });

  test('findPlugin selects by format', () => {
    assert.strictEqual(findPlugin('png', getDefaultDecoderPlugins()), pngDecoder);
    assert.throws(() => findPlugin('gif', [pngDecoder]), UnsupportedFormatError);
  });
});

describe('Decoder Factory - default registry', () => {
  test('registers every built-in format', () => {
    clearDefaultDecoderPlugins();
    assert.deepStrictEqual(
      getDefaultDecoderPlugins().map((plugin) => plugin.format),
      ['jpeg', 'png', 'gif', 'bmp', 'netpbm', 'tga', 'hdr', 'webp', 'avif']
    );
  });

  test('replaced defaults apply until cleared', async () => {
    setDefaultDecoderPlugins([pngDecoder]);
    try {
      await assert.rejects(createDecoder(createMagicBytesTest('netpbm')), /No decoder registered for format "netpbm"/);
    } finally {
      clearDefaultDecoderPlugins();
    }
    const decoder = await createDecoder(createMagicBytesTest('netpbm'));
    assert.strictEqual(decoder.format, 'netpbm');
  });
});
