/**
 * Variable-width LZW decoding for GIF image data
 *
 * Codes are packed least-significant bit first and start at
 * minCodeSize + 1 bits, growing to at most 12.
 */

import { BitReader } from './bit-reader.js';
import { DecodeError } from './errors.js';

const MAX_CODES = 4096;
const MAX_CODE_SIZE = 12;
// Indices are bytes, so literals must fit in eight bits.
const MAX_MIN_CODE_SIZE = 8;

export interface LzwResult {
  /** Colour indices, sized to the requested pixel count */
  indices: Uint8Array;
  /** Number of indices actually produced */
  decoded: number;
  /** Whether an end-of-information code was seen */
  ended: boolean;
}

export function decodeLzw(data: Uint8Array, minCodeSize: number, pixelCount: number): LzwResult {
  if (minCodeSize < 1 || minCodeSize > MAX_MIN_CODE_SIZE) {
    throw new DecodeError(`Invalid LZW minimum code size ${minCodeSize}`);
  }

  const reader = BitReader.fromBytes(data, { bitOrder: 'lsb' });
  const clearCode = 1 << minCodeSize;
  const endCode = clearCode + 1;

  const prefix = new Int16Array(MAX_CODES);
  const suffix = new Uint8Array(MAX_CODES);
  const first = new Uint8Array(MAX_CODES);
  const lengths = new Uint16Array(MAX_CODES);
  for (let i = 0; i < clearCode; i++) {
    suffix[i] = i;
    first[i] = i;
    lengths[i] = 1;
  }

  const indices = new Uint8Array(pixelCount);
  let pos = 0;
  let codeSize = minCodeSize + 1;
  let nextCode = endCode + 1;
  let previous = -1;

  // Write the string for `code` at `pos`, dropping anything past the end.
  const emit = (code: number): void => {
    const length = lengths[code];
    let c = code;
    for (let i = length - 1; i >= 0; i--) {
      if (pos + i < pixelCount) {
        indices[pos + i] = suffix[c];
      }
      c = prefix[c];
    }
    pos += length;
  };

  while (pos < pixelCount) {
    if (reader.bytesLeft() * 8 + reader.bitsInBuffer < codeSize) {
      break;
    }
    const code = reader.readBits(codeSize);

    if (code === clearCode) {
      codeSize = minCodeSize + 1;
      nextCode = endCode + 1;
      previous = -1;
      continue;
    }
    if (code === endCode) {
      return { indices, decoded: pos, ended: true };
    }

    if (previous < 0) {
      if (code >= clearCode) {
        throw new DecodeError(`Invalid LZW code ${code} after clear`);
      }
      emit(code);
      previous = code;
      continue;
    }

    if (code > nextCode || (code === nextCode && nextCode >= MAX_CODES)) {
      throw new DecodeError(`Invalid LZW code ${code}`);
    }

    if (nextCode < MAX_CODES) {
      // The new entry is the previous string plus the first index of the
      // current one; for code === nextCode that is the previous string's own.
      prefix[nextCode] = previous;
      suffix[nextCode] = code === nextCode ? first[previous] : first[code];
      first[nextCode] = first[previous];
      lengths[nextCode] = lengths[previous] + 1;
      nextCode++;
      if (nextCode === 1 << codeSize && codeSize < MAX_CODE_SIZE) {
        codeSize++;
      }
    }

    emit(code);
    previous = code;
  }

  return { indices, decoded: Math.min(pos, pixelCount), ended: false };
}
