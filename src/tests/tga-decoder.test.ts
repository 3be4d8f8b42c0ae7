/**
 * TGA Decoder Tests
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';
import { MemorySource } from '../byte-source.js';
import { DecodeError, IoError, OutOfBoundsError, UnsupportedFormatError } from '../errors.js';
import type { Image } from '../image.js';
import { createDecoder } from '../decoders/decoder-factory.js';
import { TgaDecoder, TgaImageType } from '../decoders/tga-decoder.js';
import type { DecoderOptions } from '../decoders/types.js';
import { createTga } from '../test-utils/image-fixtures.js';
import type { TgaFixture } from '../test-utils/image-fixtures.js';
import { captureLogger } from '../test-utils/logging.js';

function open(fixture: TgaFixture, options?: DecoderOptions): TgaDecoder {
  return new TgaDecoder(new MemorySource(createTga(fixture)), options);
}

function decodeTga(fixture: TgaFixture): Promise<Image> {
  return open(fixture).decode();
}

describe('TGA Decoder - True colour', () => {
  test('flips bottom-up rows and swaps BGR', async () => {
    const image = await decodeTga({
      imageType: TgaImageType.TrueColor,
      width: 2,
      height: 2,
      pixelDepth: 24,
      data: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]
    });
    assert.strictEqual(image.pixelFormat, 'rgb8');
    assert.deepStrictEqual(Array.from(image.pixels.data), [9, 8, 7, 12, 11, 10, 3, 2, 1, 6, 5, 4]);
  });

  test('mirrors right-to-left rows and keeps 32-bit alpha', async () => {
    const decoder = open({
      imageType: TgaImageType.TrueColor,
      width: 2,
      height: 1,
      pixelDepth: 32,
      descriptor: 0x38,
      data: [1, 2, 3, 4, 5, 6, 7, 8]
    });
    const image = await decoder.decode();
    assert.strictEqual(image.pixelFormat, 'rgba8');
    assert.deepStrictEqual(Array.from(image.pixels.data), [7, 6, 5, 8, 3, 2, 1, 4]);

    const info = decoder.getImageInfo();
    assert.strictEqual(info.topToBottom, true);
    assert.strictEqual(info.rightToLeft, true);
    assert.strictEqual(info.alphaBits, 8);
  });

  test('16-bit pixels use the attribute bit as alpha when alpha bits are declared', async () => {
    const image = await decodeTga({
      imageType: TgaImageType.TrueColor,
      width: 2,
      height: 1,
      pixelDepth: 16,
      descriptor: 0x21,
      data: [0x00, 0xfc, 0x1f, 0x00]
    });
    assert.strictEqual(image.pixelFormat, 'rgba8');
    assert.deepStrictEqual(Array.from(image.pixels.data), [255, 0, 0, 255, 0, 0, 255, 0]);
  });

  test('15-bit pixels have no alpha', async () => {
    const image = await decodeTga({
      imageType: TgaImageType.TrueColor,
      width: 2,
      height: 1,
      pixelDepth: 15,
      descriptor: 0x20,
      data: [0x00, 0x7c, 0xe0, 0x03]
    });
    assert.strictEqual(image.pixelFormat, 'rgb8');
    assert.deepStrictEqual(Array.from(image.pixels.data), [255, 0, 0, 0, 255, 0]);
  });
});

describe('TGA Decoder - Greyscale and colour-mapped', () => {
  test('RLE packets run across row boundaries', async () => {
    const image = await decodeTga({
      imageType: TgaImageType.GrayscaleRle,
      width: 3,
      height: 2,
      pixelDepth: 8,
      descriptor: 0x20,
      data: [0x83, 50, 0x01, 10, 20]
    });
    assert.strictEqual(image.pixelFormat, 'l8');
    assert.deepStrictEqual(Array.from(image.pixels.data), [50, 50, 50, 50, 10, 20]);
  });

  test('16-bit greyscale carries alpha', async () => {
    const image = await decodeTga({ imageType: TgaImageType.Grayscale, width: 1, height: 1, pixelDepth: 16, data: [100, 200] });
    assert.strictEqual(image.pixelFormat, 'la8');
    assert.deepStrictEqual(Array.from(image.pixels.data), [100, 200]);
  });

  test('looks indices up relative to the colour map origin', async () => {
    const decoder = open({
      imageType: TgaImageType.ColorMapped,
      width: 3,
      height: 1,
      pixelDepth: 8,
      colorMap: { origin: 2, depth: 24, entries: [0, 0, 255, 255, 0, 0] },
      data: [2, 3, 3]
    });
    const image = await decoder.decode();
    assert.strictEqual(image.pixelFormat, 'rgb8');
    assert.deepStrictEqual(Array.from(image.pixels.data), [255, 0, 0, 0, 0, 255, 0, 0, 255]);
    assert.deepStrictEqual(decoder.getImageInfo().colorMap, [
      { red: 255, green: 0, blue: 0, alpha: 255 },
      { red: 0, green: 0, blue: 255, alpha: 255 }
    ]);
  });

  test('rejects an index below the colour map origin', async () => {
    const fixture: TgaFixture = {
      imageType: TgaImageType.ColorMappedRle,
      width: 1,
      height: 1,
      pixelDepth: 8,
      colorMap: { origin: 2, depth: 24, entries: [0, 0, 255] },
      data: [0x80, 1]
    };
    await assert.rejects(decodeTga(fixture), OutOfBoundsError);
  });
});

describe('TGA Decoder - Header', () => {
  test('reads the image ID and the TGA 2.0 footer', () => {
    const info = open({
      imageType: TgaImageType.TrueColor,
      width: 1,
      height: 1,
      pixelDepth: 24,
      imageId: 'hello',
      data: [0, 0, 0],
      footer: { extensionOffset: 123, developerOffset: 0 }
    }).readHeader();
    assert.strictEqual(info.format, 'tga');
    assert.strictEqual(info.imageId, 'hello');
    assert.deepStrictEqual(info.footer, { extensionOffset: 123, developerOffset: 0 });
    assert.strictEqual(info.header?.pixelDepth, 24);
  });

  test('files without a footer report none', () => {
    const info = open({ imageType: TgaImageType.Grayscale, width: 1, height: 1, pixelDepth: 8, data: [0] }).readHeader();
    assert.strictEqual(info.footer, undefined);
  });

  test('is found by content detection', async () => {
    const decoder = await createDecoder(
      createTga({ imageType: TgaImageType.Grayscale, width: 1, height: 1, pixelDepth: 8, data: [42] })
    );
    assert.strictEqual(decoder.format, 'tga');
    const image = await decoder.decode();
    assert.deepStrictEqual(Array.from(image.pixels.data), [42]);
  });
});

describe('TGA Decoder - Errors', () => {
  test('rejects a header without image data', () => {
    assert.throws(
      () => open({ imageType: TgaImageType.NoImage, width: 1, height: 1, pixelDepth: 8, data: [] }).readHeader(),
      (err: unknown) => err instanceof DecodeError && err.message === 'TGA header declares no image data'
    );
  });

  test('rejects Huffman-coded images', () => {
    assert.throws(
      () => open({ imageType: TgaImageType.Huffman, width: 1, height: 1, pixelDepth: 8, data: [] }).readHeader(),
      UnsupportedFormatError
    );
  });

  test('rejects a pixel depth the image type cannot use', () => {
    assert.throws(
      () => open({ imageType: TgaImageType.Grayscale, width: 1, height: 1, pixelDepth: 24, data: [] }).readHeader(),
      (err: unknown) =>
        err instanceof UnsupportedFormatError && err.message === 'Unsupported TGA pixel depth 24 for image type 3'
    );
  });

  test('rejects a colour-mapped image without a colour map', () => {
    assert.throws(
      () => open({ imageType: TgaImageType.ColorMapped, width: 1, height: 1, pixelDepth: 8, data: [0] }).readHeader(),
      /Colour-mapped TGA has no colour map/
    );
  });

  test('reports truncated pixel data', async () => {
    await assert.rejects(
      decodeTga({ imageType: TgaImageType.TrueColor, width: 2, height: 1, pixelDepth: 24, data: [1, 2, 3] }),
      IoError
    );
    await assert.rejects(
      decodeTga({ imageType: TgaImageType.GrayscaleRle, width: 4, height: 1, pixelDepth: 8, data: [0x81, 7] }),
      IoError
    );
  });

  test('cuts an RLE packet short at the end of the image and logs it', async () => {
    const { logger, messages } = captureLogger();
    const image = await open(
      { imageType: TgaImageType.GrayscaleRle, width: 1, height: 1, pixelDepth: 8, data: [0x81, 5] },
      { logger }
    ).decode();
    assert.deepStrictEqual(Array.from(image.pixels.data), [5]);
    assert.deepStrictEqual(messages, ['RLE packet runs past the end of the image']);
  });
});
