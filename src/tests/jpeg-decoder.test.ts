/**
 * JPEG Decoder Tests
 *
 * Streams are assembled by hand so every expected sample can be traced
 * through the entropy decoder and the IDCT.
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';
import { MemorySource } from '../byte-source.js';
import { DecodeError, InvalidDimensionsError, UnsupportedFormatError } from '../errors.js';
import type { Image } from '../image.js';
import { JpegDecoder } from '../decoders/jpeg-decoder.js';
import type { DecoderOptions } from '../decoders/types.js';
import { JpegMarker } from '../jpeg-markers.js';
import {
  ArithmeticBlockEncoder,
  ArithmeticEncoder,
  FLAT_GREY_VALUE,
  adobeApp14,
  buildJpeg,
  dht,
  dqt,
  dri,
  flatGreyJpeg,
  marker,
  segment,
  sof,
  sos,
  unitDqt
} from '../test-utils/jpeg-builder.js';
import { captureLogger } from '../test-utils/logging.js';

function open(bytes: Uint8Array, options?: DecoderOptions): JpegDecoder {
  return new JpegDecoder(new MemorySource(bytes), options);
}

function decodeJpeg(bytes: Uint8Array, options?: DecoderOptions): Promise<Image> {
  return open(bytes, options).decode();
}

function filled(length: number, value: number): number[] {
  return new Array<number>(length).fill(value);
}

/** Three components, flat luma of 138 and neutral chroma */
function colourJpeg(ids: [number, number, number], extra: Uint8Array[] = []): Uint8Array {
  return buildJpeg([
    ...extra,
    unitDqt(),
    sof(JpegMarker.SOF0, 8, 8, [{ id: ids[0] }, { id: ids[1] }, { id: ids[2] }]),
    dht(0, 0, [2], [0, 7]),
    dht(1, 0, [1], [0x00]),
    sos([{ id: ids[0] }, { id: ids[1] }, { id: ids[2] }]),
    // Y: 1 1010000 0, Cb: 0 0, Cr: 0 0, padded with ones
    new Uint8Array([0xd0, 0x07])
  ]);
}

describe('JPEG Decoder - Baseline', () => {
  test('decodes a flat greyscale block', async () => {
    const image = await decodeJpeg(flatGreyJpeg());
    assert.strictEqual(image.width, 8);
    assert.strictEqual(image.height, 8);
    assert.strictEqual(image.pixelFormat, 'l8');
    assert.deepStrictEqual(Array.from(image.pixels.data), filled(64, FLAT_GREY_VALUE));
  });

  test('reconstructs a horizontal cosine from one AC coefficient', async () => {
    const table = filled(64, 1);
    table[1] = 16;
    const bytes = buildJpeg([
      dqt(0, table),
      sof(JpegMarker.SOF0, 8, 8, [{ id: 1 }]),
      dht(0, 0, [1], [7]),
      dht(1, 0, [2], [0x00, 0x01]),
      sos([{ id: 1 }]),
      // DC 0 1010000, AC run 0 size 1: 1 1, EOB: 0
      new Uint8Array([0x50, 0xdf])
    ]);

    const image = await decodeJpeg(bytes);
    const row = [141, 140, 140, 139, 137, 136, 136, 135];
    for (let y = 0; y < 8; y++) {
      assert.deepStrictEqual(Array.from(image.pixels.data.subarray(y * 8, y * 8 + 8)), row, `row ${y}`);
    }
  });

  test('decodes without an EOI marker', async () => {
    const image = await decodeJpeg(flatGreyJpeg({ withEoi: false }));
    assert.strictEqual(image.pixels.data[63], FLAT_GREY_VALUE);
  });

  test('resets DC prediction at restart markers', async () => {
    const bytes = buildJpeg([
      unitDqt(),
      dri(1),
      sof(JpegMarker.SOF0, 16, 8, [{ id: 1 }]),
      dht(0, 0, [1], [7]),
      dht(1, 0, [1], [0x00]),
      sos([{ id: 1 }]),
      new Uint8Array([0x50, 0x7f]),
      marker(JpegMarker.RST0),
      new Uint8Array([0x50, 0x7f])
    ]);

    const decoder = open(bytes);
    const image = await decoder.decode();
    assert.deepStrictEqual(Array.from(image.pixels.data), filled(128, FLAT_GREY_VALUE));
    assert.strictEqual(decoder.getImageInfo().restartInterval, 1);
    assert.strictEqual(decoder.getImageInfo().scans[0].dataLength, 4);
  });

  test('rejects a scan that names a missing Huffman table', async () => {
    const bytes = buildJpeg([
      unitDqt(),
      sof(JpegMarker.SOF0, 8, 8, [{ id: 1 }]),
      dht(0, 0, [1], [7]),
      sos([{ id: 1, ta: 1 }]),
      new Uint8Array([0x50, 0x7f])
    ]);
    await assert.rejects(decodeJpeg(bytes), /Scan references undefined AC Huffman table 1/);
  });
});

describe('JPEG Decoder - Colour', () => {
  test('converts YCbCr to RGB', async () => {
    const image = await decodeJpeg(colourJpeg([1, 2, 3]));
    assert.strictEqual(image.pixelFormat, 'rgb8');
    assert.deepStrictEqual(Array.from(image.pixels.data.subarray(0, 6)), [138, 138, 138, 138, 138, 138]);
  });

  test('keeps components labelled R, G, B untransformed', async () => {
    const image = await decodeJpeg(colourJpeg([0x52, 0x47, 0x42]));
    assert.deepStrictEqual(Array.from(image.pixels.data.subarray(0, 3)), [138, 128, 128]);
  });

  test('follows the Adobe transform flag', async () => {
    const decoder = open(colourJpeg([1, 2, 3], [adobeApp14(0)]));
    const image = await decoder.decode();
    assert.strictEqual(decoder.getImageInfo().adobeTransform, 0);
    assert.deepStrictEqual(Array.from(image.pixels.data.subarray(0, 3)), [138, 128, 128]);
  });

  test('colorTransform option overrides the file', async () => {
    const image = await decodeJpeg(colourJpeg([1, 2, 3]), { jpeg: { colorTransform: false } });
    assert.deepStrictEqual(Array.from(image.pixels.data.subarray(0, 3)), [138, 128, 128]);
  });

  test('upsamples 4:2:0 chroma', async () => {
    const bytes = buildJpeg([
      unitDqt(),
      sof(JpegMarker.SOF0, 16, 16, [{ id: 1, h: 2, v: 2 }, { id: 2 }, { id: 3 }]),
      dht(0, 0, [2], [0, 7]),
      dht(1, 0, [1], [0x00]),
      sos([{ id: 1 }, { id: 2 }, { id: 3 }]),
      // Four luma blocks (the last three with a zero DC difference), then Cb and Cr
      new Uint8Array([0xd0, 0x00, 0x1f])
    ]);

    const decoder = open(bytes);
    const image = await decoder.decode();
    assert.strictEqual(image.width, 16);
    assert.deepStrictEqual(Array.from(image.pixels.data), filled(16 * 16 * 3, 138));

    const [luma] = decoder.getImageInfo().colorComponents;
    assert.strictEqual(luma.horizontalSampling, 2);
    assert.strictEqual(luma.verticalSampling, 2);
  });
});

describe('JPEG Decoder - Progressive', () => {
  test('combines DC first, DC refinement and AC scans', async () => {
    const bytes = buildJpeg([
      unitDqt(),
      sof(JpegMarker.SOF2, 8, 8, [{ id: 1 }]),
      dht(0, 0, [1], [6]),
      dht(1, 0, [1], [0x00]),
      // DC first with Al = 1: 0 101000 (40, scaled to 80)
      sos([{ id: 1 }], 0, 0, 0, 1),
      new Uint8Array([0x51]),
      // DC refinement adds nothing
      sos([{ id: 1 }], 0, 0, 1, 0),
      new Uint8Array([0x00]),
      // AC 1..63 with an immediate EOB
      sos([{ id: 1 }], 1, 63, 0, 0),
      new Uint8Array([0x7f])
    ]);

    const decoder = open(bytes);
    const image = await decoder.decode();
    assert.deepStrictEqual(Array.from(image.pixels.data), filled(64, FLAT_GREY_VALUE));

    const info = decoder.getImageInfo();
    assert.strictEqual(info.mode, 'progressive');
    assert.deepStrictEqual(
      info.scans.map((scan) => [scan.startSpectral, scan.endSpectral, scan.successiveHigh, scan.successiveLow]),
      [
        [0, 0, 0, 1],
        [0, 0, 1, 0],
        [1, 63, 0, 0]
      ]
    );
  });

  test('rejects a DC scan that carries AC coefficients', async () => {
    const bytes = buildJpeg([
      unitDqt(),
      sof(JpegMarker.SOF2, 8, 8, [{ id: 1 }]),
      dht(0, 0, [1], [6]),
      sos([{ id: 1 }], 0, 5),
      new Uint8Array([0x51])
    ]);
    await assert.rejects(decodeJpeg(bytes), /Progressive DC scan includes AC coefficients/);
  });
});

describe('JPEG Decoder - Lossless', () => {
  test('predicts from the left neighbour', async () => {
    const bytes = buildJpeg([
      sof(JpegMarker.SOF3, 2, 1, [{ id: 1 }]),
      // Two-bit codes: 00 -> category 1, 01 -> category 2
      dht(0, 0, [0, 2], [1, 2]),
      sos([{ id: 1 }], 1, 0),
      // 01 10 (diff 2 from 128), 00 1 (diff 1), padded
      new Uint8Array([0x63])
    ]);

    const decoder = open(bytes);
    const image = await decoder.decode();
    assert.strictEqual(image.pixelFormat, 'l8');
    assert.deepStrictEqual(Array.from(image.pixels.data), [130, 131]);
    assert.strictEqual(decoder.getImageInfo().mode, 'lossless');
  });
});

describe('JPEG Decoder - Arithmetic coding', () => {
  test('decodes extended sequential arithmetic scans', async () => {
    const encoder = new ArithmeticEncoder();
    const blocks = new ArithmeticBlockEncoder(encoder);
    const first = filled(64, 0);
    first[0] = 80;
    const second = filled(64, 0);
    second[0] = 96;
    blocks.encodeBlock(first);
    blocks.encodeBlock(second);

    const bytes = buildJpeg([
      unitDqt(),
      sof(JpegMarker.SOF9, 16, 8, [{ id: 1 }]),
      sos([{ id: 1 }]),
      encoder.finish()
    ]);

    const decoder = open(bytes);
    const image = await decoder.decode();
    assert.strictEqual(decoder.getImageInfo().codingMethod, 'arithmetic');
    for (let y = 0; y < 8; y++) {
      const row = Array.from(image.pixels.data.subarray(y * 16, y * 16 + 16));
      assert.deepStrictEqual(row, [...filled(8, 138), ...filled(8, 140)], `row ${y}`);
    }
  });
});

describe('JPEG Decoder - Header and metadata', () => {
  test('readHeader stops before the first scan', () => {
    const decoder = open(flatGreyJpeg({ comment: 'made by hand' }));
    const info = decoder.readHeader();

    assert.strictEqual(info.format, 'jpeg');
    assert.strictEqual(info.width, 8);
    assert.strictEqual(info.height, 8);
    assert.strictEqual(info.mode, 'baseline');
    assert.strictEqual(info.codingMethod, 'huffman');
    assert.strictEqual(info.colorDepth, 8);
    assert.strictEqual(info.numberOfComponents, 1);
    assert.deepStrictEqual(info.comments, ['made by hand']);
    assert.strictEqual(info.quantizationTables.length, 1);
    assert.strictEqual(info.huffmanTables.length, 2);
    assert.strictEqual(info.scans.length, 0);
  });

  test('records the JFIF header', () => {
    const info = open(flatGreyJpeg()).readHeader();
    assert.ok(info.jfifHeader);
    assert.strictEqual(info.jfifHeader.versionMajor, 1);
    assert.strictEqual(info.jfifHeader.versionMinor, 2);
    assert.strictEqual(info.jfifHeader.xDensity, 72);
    assert.strictEqual(info.jfifHeader.thumbnailWidth, 0);
  });

  test('records scans after decoding', async () => {
    const decoder = open(flatGreyJpeg());
    await decoder.decode();
    const [scan] = decoder.getImageInfo().scans;
    assert.deepStrictEqual(scan.components, [{ componentId: 1, dcTableSelector: 0, acTableSelector: 0 }]);
    assert.strictEqual(scan.dataLength, 2);
  });

  test('decode returns the same image on repeated calls', async () => {
    const decoder = open(flatGreyJpeg());
    const first = await decoder.decode();
    assert.strictEqual(await decoder.decode(), first);
  });
});

describe('JPEG Decoder - Errors', () => {
  test('rejects unsupported frame types', () => {
    const bytes = buildJpeg([unitDqt(), sof(JpegMarker.SOF10, 8, 8, [{ id: 1 }])]);
    assert.throws(
      () => open(bytes).readHeader(),
      (err: unknown) =>
        err instanceof UnsupportedFormatError && err.message === 'Progressive arithmetic-coded JPEG is not supported'
    );
  });

  test('rejects JPEG-LS frames', () => {
    const bytes = buildJpeg([sof(JpegMarker.SOF55, 8, 8, [{ id: 1 }])]);
    assert.throws(
      () => open(bytes).readHeader(),
      (err: unknown) => err instanceof UnsupportedFormatError && err.message === 'JPEG-LS is not supported'
    );
  });

  test('rejects hierarchical frames', () => {
    const bytes = buildJpeg([sof(JpegMarker.SOF5, 8, 8, [{ id: 1 }])]);
    assert.throws(() => open(bytes).readHeader(), UnsupportedFormatError);
  });

  test('requires a frame header', () => {
    assert.throws(
      () => open(buildJpeg([unitDqt()])).readHeader(),
      (err: unknown) => err instanceof DecodeError && err.message === 'No frame header (SOF) found'
    );
  });

  test('requires scan data', async () => {
    const bytes = buildJpeg([unitDqt(), sof(JpegMarker.SOF0, 8, 8, [{ id: 1 }])]);
    await assert.rejects(decodeJpeg(bytes), /No scan data found/);
  });

  test('rejects a baseline frame with 12-bit precision', () => {
    const bytes = buildJpeg([sof(JpegMarker.SOF0, 8, 8, [{ id: 1 }], 12)]);
    assert.throws(() => open(bytes).readHeader(), /Invalid sample precision 12 for baseline JPEG/);
  });

  test('wraps truncated segments', () => {
    const bytes = buildJpeg([segment(JpegMarker.DQT, [0, 1, 2, 3])]);
    assert.throws(
      () => open(bytes).readHeader(),
      (err: unknown) => err instanceof DecodeError && err.message === 'Malformed DQT segment'
    );
  });

  test('rejects a frame without components', () => {
    const bytes = buildJpeg([unitDqt(), sof(JpegMarker.SOF0, 8, 8, [])]);
    assert.throws(
      () => open(bytes).readHeader(),
      (err: unknown) => err instanceof DecodeError && err.message === 'Frame header declares no components'
    );
  });

  test('decodes the first of two components as grey and logs it', async () => {
    const { logger, messages } = captureLogger();
    const bytes = buildJpeg([
      unitDqt(),
      sof(JpegMarker.SOF0, 8, 8, [{ id: 1 }, { id: 2 }]),
      dht(0, 0, [2], [0, 7]),
      dht(1, 0, [1], [0x00]),
      sos([{ id: 1 }, { id: 2 }]),
      // First: 1 1010000 0, second: 0 0, padded with ones
      new Uint8Array([0xd0, 0x1f])
    ]);

    const image = await decodeJpeg(bytes, { logger });
    assert.strictEqual(image.pixelFormat, 'l8');
    assert.deepStrictEqual(Array.from(image.pixels.data), filled(64, 138));
    assert.deepStrictEqual(
      messages.filter((message) => message.startsWith('Unsupported component count')),
      ['Unsupported component count, decoding the first component as grey']
    );
  });

  test('enforces maxPixels', () => {
    assert.throws(() => open(flatGreyJpeg(), { maxPixels: 63 }).readHeader(), InvalidDimensionsError);
  });
});
