import { test } from 'node:test';
import assert from 'node:assert';
import { BitReader } from '../../src/bit-reader.js';
import { buildHuffmanTable, decodeHuffman, receiveExtend } from '../../src/jpeg-huffman.js';

// Typical luminance DC table: one 2-bit code, five 3-bit codes, then one per length up to 9
const DC_COUNTS = [0, 1, 5, 1, 1, 1, 1, 1, 1, 0, 0, 0, 0, 0, 0, 0];
const DC_VALUES = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11];

test('buildHuffmanTable assigns canonical codes', () => {
  const table = buildHuffmanTable(DC_COUNTS, DC_VALUES);
  assert.strictEqual(table.maxCode[1], -1);
  assert.strictEqual(table.minCode[2], 0);
  assert.strictEqual(table.maxCode[2], 0);
  assert.strictEqual(table.minCode[3], 2);
  assert.strictEqual(table.maxCode[3], 6);
  assert.strictEqual(table.minCode[4], 14);
  assert.strictEqual(table.valPtr[4], 6);
});

test('decodeHuffman reads symbols of different lengths', () => {
  const table = buildHuffmanTable(DC_COUNTS, DC_VALUES);
  // 00 | 010 | 1110 | 0...
  const reader = BitReader.fromBytes(new Uint8Array([0b00010111, 0b00000000]));
  assert.strictEqual(decodeHuffman(reader, table), 0);
  assert.strictEqual(decodeHuffman(reader, table), 1);
  assert.strictEqual(decodeHuffman(reader, table), 6);
});

test('decodeHuffman rejects codes longer than 16 bits', () => {
  const table = buildHuffmanTable([1, ...new Array<number>(15).fill(0)], [7]);
  const reader = BitReader.fromBytes(new Uint8Array([0xff, 0xff]));
  assert.throws(() => decodeHuffman(reader, table), /Invalid Huffman code/);
});

test('buildHuffmanTable validates its input', () => {
  assert.throws(() => buildHuffmanTable(new Array<number>(15).fill(0), []), /needs 16 code-length counts, got 15/);
  assert.throws(
    () => buildHuffmanTable([1, ...new Array<number>(15).fill(0)], [1, 2]),
    /declares 1 codes but lists 2 values/
  );
  assert.throws(
    () => buildHuffmanTable([3, ...new Array<number>(15).fill(0)], [1, 2, 3]),
    /overflows 1-bit codes/
  );
});

test('receiveExtend sign-extends magnitude bits', () => {
  const reader = BitReader.fromBytes(new Uint8Array([0b01011000]));
  assert.strictEqual(receiveExtend(reader, 3), -5);
  assert.strictEqual(receiveExtend(reader, 3), 6);
  assert.strictEqual(receiveExtend(reader, 0), 0);
  assert.strictEqual(receiveExtend(reader, 16), 32768);
});
