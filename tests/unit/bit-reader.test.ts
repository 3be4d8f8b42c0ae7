import { describe, test } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BitReader } from '../../src/bit-reader.js';
import { MemorySource, readSource } from '../../src/byte-source.js';
import { IoError } from '../../src/errors.js';
import { JpegMarker, jpegMarkerCodec } from '../../src/jpeg-markers.js';

/** `width` bits at bit `offset`, reading the bytes as one big-endian integer */
function msbFirstBits(bytes: Uint8Array, offset: number, width: number): number {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  const shift = BigInt(bytes.length * 8 - offset - width);
  return Number((value >> shift) & ((1n << BigInt(width)) - 1n));
}

/** `width` bits at bit `offset`, reading the bytes as one little-endian integer */
function lsbFirstBits(bytes: Uint8Array, offset: number, width: number): number {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  return Number((value >> BigInt(offset)) & ((1n << BigInt(width)) - 1n));
}

describe('MemorySource', () => {
  test('reads bytes and reports -1 at end of stream', () => {
    const source = new MemorySource(new Uint8Array([7, 8]));
    assert.strictEqual(source.readByte(), 7);
    assert.strictEqual(source.readByte(), 8);
    assert.strictEqual(source.readByte(), -1);
    assert.strictEqual(source.tell(), 2);
  });

  test('short reads stop at the end of data', () => {
    const source = new MemorySource(new Uint8Array([1, 2, 3]));
    source.seek(1);
    assert.deepStrictEqual(Array.from(source.read(10)), [2, 3]);
    assert.strictEqual(source.read(1).length, 0);
  });

  test('seeks relative to start, current position and end', () => {
    const source = new MemorySource(new Uint8Array(10));
    assert.strictEqual(source.seek(4), 4);
    assert.strictEqual(source.seek(2, 'current'), 6);
    assert.strictEqual(source.seek(-3, 'end'), 7);
  });

  test('rejects a seek before the start', () => {
    const source = new MemorySource(new Uint8Array(4));
    assert.throws(() => source.seek(-1), IoError);
  });

  test('wraps an ArrayBuffer', () => {
    const buffer = new ArrayBuffer(3);
    new Uint8Array(buffer).set([9, 8, 7]);
    const source = new MemorySource(buffer);
    assert.strictEqual(source.length, 3);
    assert.strictEqual(source.readByte(), 9);
  });

  test('readSource loads a file and reports missing files as IoError', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'vexel-source-'));
    try {
      const path = join(dir, 'data.bin');
      await writeFile(path, new Uint8Array([1, 2, 3, 4]));
      const source = await readSource(path);
      assert.strictEqual(source.length, 4);
      await assert.rejects(readSource(join(dir, 'missing.bin')), IoError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('BitReader', () => {
  test('reads bits most-significant first by default', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0b10110010, 0xff]));
    assert.strictEqual(reader.readBits(3), 0b101);
    assert.strictEqual(reader.bitsInBuffer, 5);
    assert.strictEqual(reader.readBits(5), 0b10010);
    assert.strictEqual(reader.readU8(), 0xff);
  });

  test('reads bits least-significant first when asked', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0b10110010]), { bitOrder: 'lsb' });
    assert.strictEqual(reader.readBits(3), 0b010);
    assert.strictEqual(reader.readBits(5), 0b10110);
  });

  test('readBits matches the bytes as one integer for every width up to 32', () => {
    const patterns: [string, number][] = [
      ['all zero', 0x00],
      ['all one', 0xff],
      ['alternating from one', 0xaa],
      ['alternating from zero', 0x55]
    ];
    for (const [name, byte] of patterns) {
      const bytes = new Uint8Array(5).fill(byte);
      for (const offset of [0, 3]) {
        for (let width = 1; width <= 32; width++) {
          const label = `${name}, offset ${offset}, width ${width}`;

          const msb = BitReader.fromBytes(bytes);
          msb.readBits(offset);
          assert.strictEqual(msb.readBits(width), msbFirstBits(bytes, offset, width), `msb ${label}`);

          const lsb = BitReader.fromBytes(bytes, { bitOrder: 'lsb' });
          lsb.readBits(offset);
          assert.strictEqual(lsb.readBits(width), lsbFirstBits(bytes, offset, width), `lsb ${label}`);
        }
      }
    }
  });

  test('consecutive reads concatenate to the same bits', () => {
    const bytes = new Uint8Array([0xaa, 0x55, 0xff, 0x00, 0xa5]);
    const reader = BitReader.fromBytes(bytes);
    let offset = 0;
    for (const width of [1, 2, 3, 4, 5, 6, 7, 8]) {
      assert.strictEqual(reader.readBits(width), msbFirstBits(bytes, offset, width), `width ${width}`);
      offset += width;
    }
  });

  test('reads multi-byte integers in both byte orders', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0x12, 0x34, 0x12, 0x34, 0xde, 0xad, 0xbe, 0xef]));
    assert.strictEqual(reader.readU16(), 0x1234);
    assert.strictEqual(reader.readU16LE(), 0x3412);
    assert.strictEqual(reader.readU32(), 0xdeadbeef);
  });

  test('keeps 32-bit values unsigned and sign-extends readI32LE', () => {
    const bytes = new Uint8Array([0xff, 0xff, 0xff, 0xff]);
    assert.strictEqual(BitReader.fromBytes(bytes).readBits(32), 0xffffffff);
    assert.strictEqual(BitReader.fromBytes(bytes).readU32LE(), 0xffffffff);
    assert.strictEqual(BitReader.fromBytes(bytes).readI32LE(), -1);
  });

  test('throws IoError past the end of data', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0xaa]));
    reader.readBits(8);
    assert.throws(() => reader.readBit(), IoError);
    assert.throws(() => BitReader.fromBytes(new Uint8Array(2)).readBytes(4), /needed 4 bytes, got 2/);
  });

  test('readBytes drops pending bits and starts on the next byte', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0xab, 0xcd, 0xef]));
    assert.strictEqual(reader.readBits(4), 0xa);
    assert.deepStrictEqual(Array.from(reader.readBytes(1)), [0xcd]);
    assert.strictEqual(reader.bytesLeft(), 1);
  });

  test('peekBytes leaves the cursor in place', () => {
    const reader = BitReader.fromBytes(new Uint8Array([1, 2, 3]));
    reader.skip(1);
    assert.deepStrictEqual(Array.from(reader.peekBytes(5)), [2, 3]);
    assert.strictEqual(reader.tell(), 1);
  });

  test('readToEnd returns the remaining bytes', () => {
    const reader = BitReader.fromBytes(new Uint8Array([1, 2, 3, 4]));
    reader.skip(2);
    assert.deepStrictEqual(Array.from(reader.readToEnd()), [3, 4]);
    assert.strictEqual(reader.bytesLeft(), 0);
  });

  test('findMarker leaves the cursor after the marker', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0x00, 0xff, 0xd8, 0x01]));
    assert.strictEqual(reader.findMarker(JpegMarker.SOI, jpegMarkerCodec), true);
    assert.strictEqual(reader.tell(), 3);
  });

  test('findMarker rewinds when the marker is absent', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0x00, 0xff, 0xd8, 0x01]));
    reader.skip(2);
    assert.strictEqual(reader.findMarker(JpegMarker.EOI, jpegMarkerCodec), false);
    assert.strictEqual(reader.tell(), 0);
  });

  test('nextMarker skips stuffed bytes and unknown pairs', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0x12, 0xff, 0x00, 0xff, 0xe0, 0x99]));
    assert.strictEqual(reader.nextMarker([JpegMarker.APP0, JpegMarker.SOI], jpegMarkerCodec), JpegMarker.APP0);
    assert.strictEqual(reader.tell(), 5);
    assert.strictEqual(reader.nextMarker([JpegMarker.APP0], jpegMarkerCodec), undefined);
  });

  test('reset rewinds to the start of the source', () => {
    const reader = BitReader.fromBytes(new Uint8Array([5, 6]));
    reader.readBits(3);
    reader.reset();
    assert.strictEqual(reader.bitsInBuffer, 0);
    assert.strictEqual(reader.readU8(), 5);
  });
});
