import { test } from 'node:test';
import assert from 'node:assert';
import { ADAM7_PASSES, deinterlaceAdam7, getPassDimensions } from '../../src/adam7.js';
import { inflateChunks } from '../../src/png-decompress.js';
import { FilterType } from '../../src/png-filter.js';
import { compressImage, createHeader } from '../../src/test-utils/png-builder.js';
import { ColorType } from '../../src/types.js';

test('pass dimensions of an 8x8 image cover every pixel once', () => {
  const sizes = ADAM7_PASSES.map((pass) => getPassDimensions(8, 8, pass));
  assert.deepStrictEqual(sizes.map((s) => s.width), [1, 1, 2, 2, 4, 4, 8]);
  assert.deepStrictEqual(sizes.map((s) => s.height), [1, 1, 1, 2, 2, 4, 4]);
  assert.strictEqual(sizes.reduce((sum, s) => sum + s.width * s.height, 0), 64);
});

test('passes starting beyond a small image are empty', () => {
  assert.deepStrictEqual(getPassDimensions(1, 1, ADAM7_PASSES[1]), { width: 0, height: 1 });
  assert.deepStrictEqual(getPassDimensions(1, 1, ADAM7_PASSES[6]), { width: 1, height: 0 });
});

test('deinterlaceAdam7 places RGBA pixels from passes 1, 6 and 7', () => {
  const header = createHeader(2, 2, ColorType.RGBA, 8, 1);
  const decompressed = new Uint8Array([
    FilterType.None, 10, 20, 30, 40,
    FilterType.None, 50, 60, 70, 80,
    FilterType.None, 90, 100, 110, 120, 130, 140, 150, 160
  ]);

  const result = deinterlaceAdam7(decompressed, header);
  assert.deepStrictEqual(
    Array.from(result),
    [10, 20, 30, 40, 50, 60, 70, 80, 90, 100, 110, 120, 130, 140, 150, 160]
  );
});

test('deinterlaceAdam7 packs sub-byte samples', () => {
  // 3x1 bilevel: x=0 in pass 1, x=2 in pass 4, x=1 in pass 6
  const header = createHeader(3, 1, ColorType.GRAYSCALE, 1, 1);
  const decompressed = new Uint8Array([
    FilterType.None, 0b10000000,
    FilterType.None, 0b00000000,
    FilterType.None, 0b10000000
  ]);

  const result = deinterlaceAdam7(decompressed, header);
  assert.deepStrictEqual(Array.from(result), [0b11000000]);
});

test('deinterlaceAdam7 reverses filtered passes', () => {
  const header = createHeader(5, 3, ColorType.RGB, 8, 1);
  const raw = new Uint8Array(5 * 3 * 3);
  for (let i = 0; i < raw.length; i++) {
    raw[i] = (i * 37 + 11) & 0xff;
  }

  const decompressed = inflateChunks([compressImage(raw, header, FilterType.Paeth)]);
  assert.deepStrictEqual(deinterlaceAdam7(decompressed, header), raw);
});

test('deinterlaceAdam7 reports the pass and line of truncated data', () => {
  const header = createHeader(2, 2, ColorType.RGBA, 8, 1);
  assert.throws(
    () => deinterlaceAdam7(new Uint8Array([FilterType.None]), header),
    /Unexpected end of decompressed data at pass 1, line 0/
  );
});
