/**
 * JPEG Huffman tables and entropy primitives (ITU T.81 Annex C, F.2.2)
 */

import type { BitReader } from './bit-reader.js';
import { DecodeError } from './errors.js';

export interface HuffmanTable {
  /** Largest code of each length, -1 when the length is unused (index 1..16) */
  maxCode: Int32Array;
  /** Smallest code of each length */
  minCode: Int32Array;
  /** Index into `values` of the first symbol of each length */
  valPtr: Int32Array;
  values: Uint8Array;
}

/**
 * Build decoding tables from the DHT code-length counts and symbol list
 */
export function buildHuffmanTable(codeLengths: ArrayLike<number>, values: ArrayLike<number>): HuffmanTable {
  if (codeLengths.length !== 16) {
    throw new DecodeError(`Huffman table needs 16 code-length counts, got ${codeLengths.length}`);
  }

  // Figure C.1: code sizes
  const sizes: number[] = [];
  for (let length = 1; length <= 16; length++) {
    for (let i = 0; i < codeLengths[length - 1]; i++) {
      sizes.push(length);
    }
  }
  if (sizes.length !== values.length) {
    throw new DecodeError(`Huffman table declares ${sizes.length} codes but lists ${values.length} values`);
  }
  if (sizes.length > 256) {
    throw new DecodeError(`Huffman table declares ${sizes.length} codes`);
  }

  // Figure C.2: codes
  const codes: number[] = [];
  let code = 0;
  let k = 0;
  let size = sizes.length > 0 ? sizes[0] : 0;
  while (k < sizes.length) {
    while (k < sizes.length && sizes[k] === size) {
      codes.push(code++);
      k++;
    }
    if (code > 1 << size) {
      throw new DecodeError(`Huffman table overflows ${size}-bit codes`);
    }
    code <<= 1;
    size++;
  }

  // Figure F.15: decoder tables
  const maxCode = new Int32Array(18).fill(-1);
  const minCode = new Int32Array(17);
  const valPtr = new Int32Array(17);
  let j = 0;
  for (let length = 1; length <= 16; length++) {
    const count = codeLengths[length - 1];
    if (count === 0) {
      continue;
    }
    valPtr[length] = j;
    minCode[length] = codes[j];
    j += count;
    maxCode[length] = codes[j - 1];
  }
  maxCode[17] = 0x7fffffff;

  return { maxCode, minCode, valPtr, values: Uint8Array.from(values) };
}

/**
 * Decode one symbol (Figure F.16)
 */
export function decodeHuffman(reader: BitReader, table: HuffmanTable): number {
  let code = reader.readBit();
  let length = 1;
  while (length <= 16 && code > table.maxCode[length]) {
    code = (code << 1) | reader.readBit();
    length++;
  }
  if (length > 16) {
    throw new DecodeError('Invalid Huffman code');
  }
  return table.values[table.valPtr[length] + code - table.minCode[length]];
}

/**
 * Read `size` magnitude bits and sign-extend them (Figure F.12)
 */
export function receiveExtend(reader: BitReader, size: number): number {
  if (size === 0) {
    return 0;
  }
  if (size === 16) {
    // Lossless difference category 16 carries no extra bits.
    return 32768;
  }
  const value = reader.readBits(size);
  return value < 1 << (size - 1) ? value - (1 << size) + 1 : value;
}
