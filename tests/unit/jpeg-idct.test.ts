import { test } from 'node:test';
import assert from 'node:assert';
import { ZIGZAG_TO_NATURAL, dequantizeBlock, idctBlock, quantizeBlock } from '../../src/jpeg-idct.js';

test('zig-zag table is a permutation of the block', () => {
  assert.deepStrictEqual([...ZIGZAG_TO_NATURAL].sort((a, b) => a - b), Array.from({ length: 64 }, (_, i) => i));
  assert.strictEqual(ZIGZAG_TO_NATURAL[1], 1);
  assert.strictEqual(ZIGZAG_TO_NATURAL[2], 8);
  assert.strictEqual(ZIGZAG_TO_NATURAL[63], 63);
});

test('quantizeBlock rounds to the nearest step', () => {
  const coefficients = new Array<number>(64).fill(0);
  const table = new Array<number>(64).fill(1);
  coefficients.splice(0, 3, 100, -50, 7);
  table.splice(0, 3, 10, 20, 3);
  const quantized = quantizeBlock(coefficients, table);
  assert.deepStrictEqual(Array.from(quantized.subarray(0, 3)), [10, -2, 2]);
});

test('dequantizeBlock reads from an offset', () => {
  const quantized = new Int32Array(128);
  quantized[64] = 2;
  quantized[65] = -3;
  const table = new Array<number>(64).fill(1);
  table[0] = 4;
  table[1] = 5;
  const out = dequantizeBlock(quantized, table, new Float32Array(64), 64);
  assert.strictEqual(out[0], 8);
  assert.strictEqual(out[1], -15);
  assert.strictEqual(out[2], 0);
});

test('idctBlock spreads a DC coefficient evenly', () => {
  const input = new Float32Array(64);
  input[0] = 80;
  const out = idctBlock(input);
  for (const value of out) {
    assert.ok(Math.abs(value - 10) < 1e-4, `expected 10, got ${value}`);
  }
});

test('idctBlock of the first horizontal frequency varies along x only', () => {
  const input = new Float32Array(64);
  input[1] = 16;
  const out = idctBlock(input);
  for (let x = 0; x < 8; x++) {
    const expected = 16 * (Math.SQRT1_2 / 2) * (Math.cos(((2 * x + 1) * Math.PI) / 16) / 2);
    for (let y = 0; y < 8; y++) {
      assert.ok(Math.abs(out[y * 8 + x] - expected) < 1e-4);
    }
  }
  assert.ok(out[0] > 0 && out[7] < 0);
});
