import { test } from 'node:test';
import assert from 'node:assert';
import {
  unfilterScanline,
  filterScanline,
  getBytesPerPixel,
  FilterType
} from './png-filter.js';
import { DecodeError } from './errors.js';
import { ColorType } from './types.js';

const ALL_FILTERS = [FilterType.None, FilterType.Sub, FilterType.Up, FilterType.Average, FilterType.Paeth];

test('getBytesPerPixel calculates correct values', () => {
  assert.strictEqual(getBytesPerPixel(8, ColorType.GRAYSCALE), 1);
  assert.strictEqual(getBytesPerPixel(8, ColorType.RGB), 3);
  assert.strictEqual(getBytesPerPixel(8, ColorType.RGBA), 4);
  assert.strictEqual(getBytesPerPixel(8, ColorType.GRAYSCALE_ALPHA), 2);
  assert.strictEqual(getBytesPerPixel(16, ColorType.GRAYSCALE), 2);
  assert.strictEqual(getBytesPerPixel(16, ColorType.RGB), 6);
  assert.strictEqual(getBytesPerPixel(1, ColorType.GRAYSCALE), 1);
  assert.strictEqual(getBytesPerPixel(4, ColorType.PALETTE), 1);
});

test('unfilterScanline handles None filter', () => {
  const scanline = new Uint8Array([1, 2, 3, 4, 5]);
  const result = unfilterScanline(FilterType.None, scanline, null, 1);
  assert.deepStrictEqual(result, scanline);
});

test('unfilterScanline handles Sub filter', () => {
  const scanline = new Uint8Array([10, 20, 30, 40]);
  const result = unfilterScanline(FilterType.Sub, scanline, null, 2);
  assert.deepStrictEqual(Array.from(result), [10, 20, 40, 60]);
});

test('unfilterScanline handles Up filter', () => {
  const scanline = new Uint8Array([5, 10, 15, 20]);
  const previousLine = new Uint8Array([100, 50, 80, 30]);
  const result = unfilterScanline(FilterType.Up, scanline, previousLine, 1);
  assert.deepStrictEqual(Array.from(result), [105, 60, 95, 50]);
});

test('unfilterScanline treats a missing previous line as zeros', () => {
  const scanline = new Uint8Array([5, 10, 15, 20]);
  assert.deepStrictEqual(unfilterScanline(FilterType.Up, scanline, null, 1), scanline);
});

test('unfilterScanline handles Average filter', () => {
  const scanline = new Uint8Array([10, 20]);
  const previousLine = new Uint8Array([50, 30]);
  const result = unfilterScanline(FilterType.Average, scanline, previousLine, 1);

  // 10 + floor((0 + 50) / 2), then 20 + floor((35 + 30) / 2)
  assert.deepStrictEqual(Array.from(result), [35, 52]);
});

test('unfilterScanline handles Paeth filter', () => {
  const scanline = new Uint8Array([5, 10]);
  const previousLine = new Uint8Array([100, 50]);
  const result = unfilterScanline(FilterType.Paeth, scanline, previousLine, 1);

  // First byte predicts from up (100); second from up (50) since |p - b| is smallest
  assert.deepStrictEqual(Array.from(result), [105, 60]);
});

test('unfilterScanline wraps sums modulo 256', () => {
  const result = unfilterScanline(FilterType.Sub, new Uint8Array([200, 100]), null, 1);
  assert.deepStrictEqual(Array.from(result), [200, 44]);
});

test('unfilterScanline rejects unknown filter types', () => {
  const filterType: number = 5;
  assert.throws(() => unfilterScanline(filterType, new Uint8Array([1, 2, 3]), null, 1), DecodeError);
});

test('filterScanline rejects unknown filter types', () => {
  const filterType: number = 7;
  assert.throws(() => filterScanline(filterType, new Uint8Array([1]), null, 1), /Unknown filter type: 7/);
});

test('filterScanline is the inverse of unfilterScanline for every filter', () => {
  const original = new Uint8Array([100, 150, 200, 250, 50, 75, 125, 175]);
  const previousLine = new Uint8Array([110, 140, 190, 240, 60, 80, 130, 170]);

  for (const filter of ALL_FILTERS) {
    const filtered = filterScanline(filter, original, previousLine, 2);
    assert.deepStrictEqual(unfilterScanline(filter, filtered, previousLine, 2), original, `filter ${filter}`);
  }
});

test('filterScanline Sub stores differences from the left pixel', () => {
  const filtered = filterScanline(FilterType.Sub, new Uint8Array([10, 20, 15, 5]), null, 2);
  assert.deepStrictEqual(Array.from(filtered), [10, 20, 5, 241]);
});

test('getBytesPerPixel throws on invalid color type', () => {
  assert.throws(() => getBytesPerPixel(8, 99), /Unknown color type/);
});
