import { test } from 'node:test';
import assert from 'node:assert';
import { deflate } from 'pako';
import { decompressImageData, getScanlineLength, inflateChunks, unfilterImage } from '../../src/png-decompress.js';
import { FilterType } from '../../src/png-filter.js';
import { compressImage, createHeader } from '../../src/test-utils/png-builder.js';
import { ColorType } from '../../src/types.js';

function sampleRows(length: number): Uint8Array {
  const raw = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    raw[i] = (i * 13 + 7) & 0xff;
  }
  return raw;
}

test('inflateChunks joins a stream split across chunks', () => {
  const payload = sampleRows(200);
  const compressed = deflate(payload);
  const parts = [compressed.subarray(0, 3), compressed.subarray(3, 10), compressed.subarray(10)];
  assert.deepStrictEqual(inflateChunks(parts), payload);
});

test('inflateChunks rejects empty and corrupt input', () => {
  assert.throws(() => inflateChunks([]), /No compressed data/);
  assert.throws(() => inflateChunks([new Uint8Array([1, 2, 3, 4])]), /Inflate failed/);
});

test('getScanlineLength rounds packed rows up to whole bytes', () => {
  assert.strictEqual(getScanlineLength(createHeader(3, 1, ColorType.GRAYSCALE, 1)), 1);
  assert.strictEqual(getScanlineLength(createHeader(9, 1, ColorType.PALETTE, 4)), 5);
  assert.strictEqual(getScanlineLength(createHeader(5, 1, ColorType.RGBA, 16)), 40);
});

test('unfilterImage removes filter bytes and applies Up', () => {
  const header = createHeader(2, 2, ColorType.GRAYSCALE);
  const filtered = new Uint8Array([FilterType.None, 10, 20, FilterType.Up, 5, 250]);
  assert.deepStrictEqual(Array.from(unfilterImage(filtered, header)), [10, 20, 15, 14]);
});

test('unfilterImage reports the truncated line', () => {
  const header = createHeader(2, 2, ColorType.GRAYSCALE);
  const filtered = new Uint8Array([FilterType.None, 10, 20, FilterType.None, 1]);
  assert.throws(() => unfilterImage(filtered, header), /Unexpected end of decompressed data at line 1/);
});

for (const interlaceMethod of [0, 1]) {
  test(`decompressImageData restores rows (interlace ${interlaceMethod})`, () => {
    const header = createHeader(9, 6, ColorType.RGBA, 8, interlaceMethod);
    const raw = sampleRows(9 * 6 * 4);
    const compressed = compressImage(raw, header, FilterType.Average);
    const half = Math.floor(compressed.length / 2);
    const result = decompressImageData([compressed.subarray(0, half), compressed.subarray(half)], header);
    assert.deepStrictEqual(result, raw);
  });
}
