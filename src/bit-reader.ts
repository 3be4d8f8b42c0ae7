/**
 * Bit-level reader over a seekable byte source.
 *
 * Bits are consumed most-significant first by default; GIF's LZW stream
 * packs codes least-significant first and uses `bitOrder: 'lsb'`.
 * At most 7 bits are ever pending after a bit read.
 */

import type { ByteSource, SeekOrigin } from './byte-source.js';
import { MemorySource } from './byte-source.js';
import { IoError } from './errors.js';
import type { MarkerCodec } from './marker.js';

export type BitOrder = 'msb' | 'lsb';

export interface BitReaderOptions {
  bitOrder?: BitOrder;
}

export class BitReader {
  private readonly source: ByteSource;
  private readonly lsbFirst: boolean;
  private buffer = 0;
  private bitCount = 0;

  constructor(source: ByteSource, options: BitReaderOptions = {}) {
    this.source = source;
    this.lsbFirst = options.bitOrder === 'lsb';
  }

  static fromBytes(bytes: Uint8Array, options?: BitReaderOptions): BitReader {
    return new BitReader(new MemorySource(bytes), options);
  }

  /** Pending bits of the partially consumed byte */
  get bitsInBuffer(): number {
    return this.bitCount;
  }

  /** Total length of the underlying source */
  get length(): number {
    return this.source.length;
  }

  /** Byte position of the cursor (pending bits belong to the byte before it) */
  tell(): number {
    return this.source.tell();
  }

  bytesLeft(): number {
    return Math.max(0, this.source.length - this.source.tell());
  }

  readBit(): number {
    if (this.bitCount === 0) {
      const byte = this.source.readByte();
      if (byte < 0) {
        throw new IoError('Unexpected end of stream');
      }
      this.buffer = byte;
      this.bitCount = 8;
    }
    this.bitCount--;
    const shift = this.lsbFirst ? 7 - this.bitCount : this.bitCount;
    return (this.buffer >> shift) & 1;
  }

  /**
   * Read `count` bits (0..32) as an unsigned integer
   */
  readBits(count: number): number {
    let result = 0;
    if (this.lsbFirst) {
      let weight = 1;
      for (let i = 0; i < count; i++) {
        result += this.readBit() * weight;
        weight *= 2;
      }
    } else {
      for (let i = 0; i < count; i++) {
        // Multiplication keeps 32-bit results unsigned.
        result = result * 2 + this.readBit();
      }
    }
    return result;
  }

  readU8(): number {
    if (this.bitCount === 0) {
      const byte = this.source.readByte();
      if (byte < 0) {
        throw new IoError('Unexpected end of stream');
      }
      return byte;
    }
    return this.readBits(8);
  }

  /** Big-endian 16-bit value */
  readU16(): number {
    const high = this.readU8();
    return (high << 8) | this.readU8();
  }

  readU16LE(): number {
    const low = this.readU8();
    return low | (this.readU8() << 8);
  }

  /** Big-endian 32-bit value */
  readU32(): number {
    const high = this.readU16();
    return high * 0x10000 + this.readU16();
  }

  readU32LE(): number {
    const low = this.readU16LE();
    return this.readU16LE() * 0x10000 + low;
  }

  /** Signed little-endian 32-bit value */
  readI32LE(): number {
    return this.readU32LE() | 0;
  }

  /** Drop pending bits so the next read starts on a byte boundary */
  clearBuffer(): void {
    this.buffer = 0;
    this.bitCount = 0;
  }

  /**
   * Read exactly `count` bytes from the next byte boundary
   */
  readBytes(count: number): Uint8Array {
    this.clearBuffer();
    const bytes = this.source.read(count);
    if (bytes.length < count) {
      throw new IoError(`Unexpected end of stream: needed ${count} bytes, got ${bytes.length}`);
    }
    return bytes;
  }

  /** Up to `count` bytes without moving the cursor */
  peekBytes(count: number): Uint8Array {
    const position = this.source.tell();
    const bytes = this.source.read(count);
    this.source.seek(position);
    return bytes;
  }

  skip(count: number): void {
    this.readBytes(count);
  }

  seek(offset: number, origin: SeekOrigin = 'start'): number {
    this.clearBuffer();
    return this.source.seek(offset, origin);
  }

  /** Drain the rest of the source */
  readToEnd(): Uint8Array {
    this.clearBuffer();
    return this.source.read(this.bytesLeft());
  }

  /** Rewind to the start of the source */
  reset(): void {
    this.clearBuffer();
    this.source.seek(0);
  }

  /**
   * Scan forward for `marker`. On success the cursor sits just past it; on
   * failure the cursor is rewound to the start of the stream.
   */
  findMarker<M>(marker: M, codec: MarkerCodec<M>): boolean {
    const target = codec.toU16(marker);
    this.clearBuffer();

    let previous = this.source.readByte();
    while (previous >= 0) {
      const current = this.source.readByte();
      if (current < 0) {
        break;
      }
      if (((previous << 8) | current) === target) {
        return true;
      }
      previous = current;
    }

    this.reset();
    return false;
  }

  /**
   * Return the next marker from `known`, leaving the cursor just past it,
   * or undefined at end of stream.
   *
   * Any 0xFF followed by a known code matches, whatever precedes it; a
   * stuffed 0xFF 0x00 pair never matches since 0xFF00 is not a marker.
   */
  nextMarker<M>(known: readonly M[], codec: MarkerCodec<M>): M | undefined {
    const codes = new Set<number>();
    for (const marker of known) {
      codes.add(codec.toU16(marker));
    }
    this.clearBuffer();

    let previous = this.source.readByte();
    while (previous >= 0) {
      const current = this.source.readByte();
      if (current < 0) {
        return undefined;
      }
      const value = (previous << 8) | current;
      const marker = codes.has(value) ? codec.fromU16(value) : undefined;
      if (marker !== undefined) {
        return marker;
      }
      previous = current;
    }
    return undefined;
  }
}
