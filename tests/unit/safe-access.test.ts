import { test } from 'node:test';
import assert from 'node:assert';
import { OutOfBoundsError } from '../../src/errors.js';
import { checkRange, getKeySafe, getRangeSafe, getSafe, getSubarraySafe } from '../../src/safe-access.js';

test('getSafe returns in-range elements', () => {
  assert.strictEqual(getSafe([10, 20, 30], 2), 30);
  assert.strictEqual(getSafe(new Uint8Array([5]), 0), 5);
});

test('getSafe rejects out-of-range and non-integer indices', () => {
  assert.throws(() => getSafe([1, 2], 2), /Index 2 out of bounds \(len 2\)/);
  assert.throws(() => getSafe([1, 2], -1), OutOfBoundsError);
  assert.throws(() => getSafe([1, 2], 0.5), OutOfBoundsError);
});

test('checkRange accepts empty and full ranges', () => {
  assert.doesNotThrow(() => checkRange(4, 4, 4));
  assert.doesNotThrow(() => checkRange(4, 0, 4));
});

test('checkRange reports inverted ranges', () => {
  assert.throws(() => checkRange(10, 5, 3), /Invalid range: start \(5\) > end \(3\)/);
});

test('checkRange reports ranges past the end', () => {
  assert.throws(() => checkRange(3, 1, 4), /Range 1..4 out of bounds \(len 3\)/);
});

test('getRangeSafe copies, getSubarraySafe shares', () => {
  const bytes = new Uint8Array([1, 2, 3, 4]);
  const copy = getRangeSafe(bytes, 1, 3);
  const view = getSubarraySafe(bytes, 1, 3);
  bytes[1] = 99;
  assert.deepStrictEqual(Array.from(copy), [2, 3]);
  assert.deepStrictEqual(Array.from(view), [99, 3]);
  assert.throws(() => getSubarraySafe(bytes, 2, 8), OutOfBoundsError);
});

test('getKeySafe names the container in its error', () => {
  const tables = new Map([[0, 'luma']]);
  assert.strictEqual(getKeySafe(tables, 0), 'luma');
  assert.throws(() => getKeySafe(tables, 3, 'quantization tables'), /Key 3 not found in quantization tables/);
});
