/**
 * Netpbm decoder: PBM, PGM and PPM in plain (P1-P3) and raw (P4-P6)
 * encodings, plus PAM (P7)
 */

import type { ByteSource } from '../byte-source.js';
import { DecodeError, UnsupportedFormatError } from '../errors.js';
import { Image } from '../image.js';
import type { PixelData } from '../image.js';
import { bytesToString, scaleSample } from '../utils.js';
import { BaseDecoder } from './base-decoder.js';
import type { DecoderOptions, DecoderPlugin } from './types.js';

export type NetpbmVariant = 'P1' | 'P2' | 'P3' | 'P4' | 'P5' | 'P6' | 'P7';

export type TupleType =
  | 'BLACKANDWHITE'
  | 'GRAYSCALE'
  | 'RGB'
  | 'BLACKANDWHITE_ALPHA'
  | 'GRAYSCALE_ALPHA'
  | 'RGB_ALPHA';

const TUPLE_DEPTHS: Record<TupleType, number> = {
  BLACKANDWHITE: 1,
  GRAYSCALE: 1,
  RGB: 3,
  BLACKANDWHITE_ALPHA: 2,
  GRAYSCALE_ALPHA: 2,
  RGB_ALPHA: 4
};

function isTupleType(value: string): value is TupleType {
  return Object.prototype.hasOwnProperty.call(TUPLE_DEPTHS, value);
}

const DEFAULT_TUPLE_TYPES: readonly TupleType[] = ['GRAYSCALE', 'GRAYSCALE_ALPHA', 'RGB', 'RGB_ALPHA'];

export interface NetpbmInfo {
  format: 'netpbm';
  variant?: NetpbmVariant;
  encoding?: 'ascii' | 'binary';
  width: number;
  height: number;
  maxValue: number;
  depth: number;
  tupleType?: TupleType;
  comments: string[];
}

function createNetpbmInfo(): NetpbmInfo {
  return { format: 'netpbm', width: 0, height: 0, maxValue: 0, depth: 0, comments: [] };
}

const VARIANTS: readonly NetpbmVariant[] = ['P1', 'P2', 'P3', 'P4', 'P5', 'P6', 'P7'];

function isVariant(value: string): value is NetpbmVariant {
  return VARIANTS.some((variant) => variant === value);
}

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0b || byte === 0x0c || byte === 0x0d;
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

/**
 * Cursor over header or plain-raster text
 */
class TokenCursor {
  private readonly data: Uint8Array;
  offset = 0;
  readonly comments: string[] = [];

  constructor(data: Uint8Array) {
    this.data = data;
  }

  skipWhitespaceAndComments(): void {
    const data = this.data;
    while (this.offset < data.length) {
      const byte = data[this.offset];
      if (byte === 0x23) {
        const start = this.offset + 1;
        while (this.offset < data.length && data[this.offset] !== 0x0a && data[this.offset] !== 0x0d) {
          this.offset++;
        }
        this.comments.push(bytesToString(data, start, this.offset - start).trim());
      } else if (isWhitespace(byte)) {
        this.offset++;
      } else {
        return;
      }
    }
  }

  readInteger(what: string): number {
    this.skipWhitespaceAndComments();
    const start = this.offset;
    let value = 0;
    while (this.offset < this.data.length && isDigit(this.data[this.offset])) {
      value = value * 10 + (this.data[this.offset] - 0x30);
      this.offset++;
    }
    if (this.offset === start) {
      throw new DecodeError(`Expected ${what} at offset ${start}`);
    }
    return value;
  }

  /** Single 0/1 digit of a plain PBM raster, which needs no separators */
  readBit(): number {
    this.skipWhitespaceAndComments();
    const byte = this.data[this.offset];
    if (byte !== 0x30 && byte !== 0x31) {
      throw new DecodeError(`Expected 0 or 1 at offset ${this.offset}`);
    }
    this.offset++;
    return byte - 0x30;
  }

  /** Rest of the current line, without the terminator */
  readLine(): string {
    const start = this.offset;
    while (this.offset < this.data.length && this.data[this.offset] !== 0x0a) {
      this.offset++;
    }
    const line = bytesToString(this.data, start, this.offset - start);
    if (this.offset < this.data.length) {
      this.offset++;
    }
    return line.replace(/\r$/, '');
  }

  get exhausted(): boolean {
    return this.offset >= this.data.length;
  }
}

export class NetpbmDecoder extends BaseDecoder<NetpbmInfo> {
  readonly format = 'netpbm' as const;

  /** File bytes from the start of the raster */
  private raster: Uint8Array = new Uint8Array(0);

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, createNetpbmInfo(), options, 'netpbm');
  }

  protected parseHeader(): void {
    const bytes = this.reader.readToEnd();
    const magic = bytesToString(bytes, 0, 2);
    if (!isVariant(magic)) {
      throw new UnsupportedFormatError(`Invalid Netpbm magic "${magic}"`);
    }
    const info = this.info;
    info.variant = magic;
    info.encoding = magic === 'P1' || magic === 'P2' || magic === 'P3' ? 'ascii' : 'binary';

    const cursor = new TokenCursor(bytes);
    cursor.offset = 2;
    if (magic === 'P7') {
      this.parsePamHeader(cursor);
    } else {
      info.width = cursor.readInteger('width');
      info.height = cursor.readInteger('height');
      const bitmap = magic === 'P1' || magic === 'P4';
      info.maxValue = bitmap ? 1 : cursor.readInteger('maximum value');
      info.depth = magic === 'P3' || magic === 'P6' ? 3 : 1;
      if (info.encoding === 'binary') {
        if (cursor.exhausted || !isWhitespace(bytes[cursor.offset])) {
          throw new DecodeError('Missing whitespace after header');
        }
        cursor.offset++;
      }
    }
    info.comments = cursor.comments;

    this.checkDimensions(info.width, info.height);
    if (info.maxValue < 1 || info.maxValue > 65535) {
      throw new DecodeError(`Invalid maximum value ${info.maxValue}`);
    }
    this.raster = bytes.subarray(cursor.offset);
  }

  private parsePamHeader(cursor: TokenCursor): void {
    const info = this.info;
    let tupleType: string | undefined;
    let ended = false;
    while (!cursor.exhausted) {
      const line = cursor.readLine().trim();
      if (line === '') {
        continue;
      }
      if (line.startsWith('#')) {
        cursor.comments.push(line.slice(1).trim());
        continue;
      }
      const [key, ...rest] = line.split(/\s+/);
      const value = rest.join(' ');
      const numeric = (): number => {
        if (!/^\d+$/.test(value)) {
          throw new DecodeError(`Invalid ${key} value "${value}"`);
        }
        return Number(value);
      };
      switch (key) {
        case 'WIDTH':
          info.width = numeric();
          break;
        case 'HEIGHT':
          info.height = numeric();
          break;
        case 'DEPTH':
          info.depth = numeric();
          break;
        case 'MAXVAL':
          info.maxValue = numeric();
          break;
        case 'TUPLTYPE':
          tupleType = tupleType ? `${tupleType} ${value}` : value;
          break;
        case 'ENDHDR':
          ended = true;
          break;
        default:
          throw new DecodeError(`Unknown PAM header field "${key}"`);
      }
      if (ended) {
        break;
      }
    }
    if (!ended) {
      throw new DecodeError('PAM header is missing ENDHDR');
    }

    if (tupleType !== undefined && isTupleType(tupleType)) {
      if (TUPLE_DEPTHS[tupleType] !== info.depth) {
        throw new DecodeError(`Tuple type ${tupleType} does not match depth ${info.depth}`);
      }
      info.tupleType = tupleType;
    } else {
      const fallback = DEFAULT_TUPLE_TYPES[info.depth - 1];
      if (!fallback) {
        throw new UnsupportedFormatError(`Unsupported PAM depth ${info.depth}`);
      }
      this.logger.warn({ tupleType, depth: info.depth }, 'Unknown PAM tuple type, inferring from depth');
      info.tupleType = fallback;
    }
  }

  protected decodePixels(): Image {
    const info = this.info;
    const { width, height, maxValue, depth } = info;
    const count = width * height * depth;

    if (info.variant === 'P1' || info.variant === 'P4') {
      const bits = info.variant === 'P1' ? this.readPlainBits(count) : this.readPackedBits();
      // PBM stores 1 for black.
      for (let i = 0; i < bits.length; i++) {
        bits[i] = bits[i] ^ 1;
      }
      return new Image(width, height, { format: 'l1', data: bits });
    }

    const samples = info.encoding === 'ascii' ? this.readPlainSamples(count) : this.readRawSamples(count);

    if (info.tupleType === 'BLACKANDWHITE' && maxValue === 1) {
      return new Image(width, height, { format: 'l1', data: Uint8Array.from(samples) });
    }
    return new Image(width, height, this.scaleSamples(samples, depth, maxValue));
  }

  private scaleSamples(samples: Uint16Array, depth: number, maxValue: number): PixelData {
    if (maxValue > 255) {
      const data = new Uint16Array(samples.length);
      for (let i = 0; i < samples.length; i++) {
        data[i] = scaleSample(samples[i], maxValue, 65535);
      }
      switch (depth) {
        case 1:
          return { format: 'l16', data };
        case 2:
          return { format: 'la16', data };
        case 3:
          return { format: 'rgb16', data };
        default:
          return { format: 'rgba16', data };
      }
    }
    const data = new Uint8Array(samples.length);
    for (let i = 0; i < samples.length; i++) {
      data[i] = scaleSample(samples[i], maxValue, 255);
    }
    switch (depth) {
      case 1:
        return { format: 'l8', data };
      case 2:
        return { format: 'la8', data };
      case 3:
        return { format: 'rgb8', data };
      default:
        return { format: 'rgba8', data };
    }
  }

  private readPlainBits(count: number): Uint8Array {
    const cursor = new TokenCursor(this.raster);
    const bits = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      bits[i] = cursor.readBit();
    }
    return bits;
  }

  private readPackedBits(): Uint8Array {
    const { width, height } = this.info;
    const rowBytes = Math.ceil(width / 8);
    if (this.raster.length < rowBytes * height) {
      throw new DecodeError(`Raster is truncated: expected ${rowBytes * height} bytes, got ${this.raster.length}`);
    }
    const bits = new Uint8Array(width * height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const byte = this.raster[y * rowBytes + (x >> 3)];
        bits[y * width + x] = (byte >> (7 - (x & 7))) & 1;
      }
    }
    return bits;
  }

  private readPlainSamples(count: number): Uint16Array {
    const cursor = new TokenCursor(this.raster);
    const samples = new Uint16Array(count);
    for (let i = 0; i < count; i++) {
      samples[i] = this.checkSample(cursor.readInteger('sample'));
    }
    return samples;
  }

  private readRawSamples(count: number): Uint16Array {
    const wide = this.info.maxValue > 255;
    const needed = count * (wide ? 2 : 1);
    if (this.raster.length < needed) {
      throw new DecodeError(`Raster is truncated: expected ${needed} bytes, got ${this.raster.length}`);
    }
    const samples = new Uint16Array(count);
    for (let i = 0; i < count; i++) {
      samples[i] = this.checkSample(wide ? (this.raster[i * 2] << 8) | this.raster[i * 2 + 1] : this.raster[i]);
    }
    return samples;
  }

  private checkSample(value: number): number {
    if (value > this.info.maxValue) {
      throw new DecodeError(`Sample ${value} exceeds maximum value ${this.info.maxValue}`);
    }
    return value;
  }
}

export const netpbmDecoder: DecoderPlugin = {
  format: 'netpbm',
  create: (source, options) => new NetpbmDecoder(source, options)
};
