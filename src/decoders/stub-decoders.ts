/**
 * WebP and AVIF decoders: container headers are parsed for metadata,
 * pixel decoding is not available.
 */

import type { ByteSource } from '../byte-source.js';
import { DecodeError, NotImplementedError, UnsupportedFormatError } from '../errors.js';
import type { Image } from '../image.js';
import { bytesToString } from '../utils.js';
import { BaseDecoder } from './base-decoder.js';
import type { DecoderOptions, DecoderPlugin } from './types.js';

export type WebpEncoding = 'VP8' | 'VP8L' | 'VP8X';

export interface WebpInfo {
  format: 'webp';
  width: number;
  height: number;
  /** RIFF payload size from the file header */
  riffSize?: number;
  encoding?: WebpEncoding;
  hasAlpha?: boolean;
  animated?: boolean;
}

export interface AvifInfo {
  format: 'avif';
  majorBrand?: string;
  minorVersion?: number;
  compatibleBrands: string[];
}

export class WebpDecoder extends BaseDecoder<WebpInfo> {
  readonly format = 'webp' as const;

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, { format: 'webp', width: 0, height: 0 }, options, 'webp');
  }

  protected parseHeader(): void {
    const reader = this.reader;
    const riff = bytesToString(reader.readBytes(4));
    const riffSize = reader.readU32LE();
    const webp = bytesToString(reader.readBytes(4));
    if (riff !== 'RIFF' || webp !== 'WEBP') {
      throw new UnsupportedFormatError('Not a WebP file');
    }
    this.info.riffSize = riffSize;

    const fourcc = bytesToString(reader.readBytes(4));
    const chunkSize = reader.readU32LE();
    const payload = reader.readBytes(Math.min(chunkSize, 30));

    switch (fourcc) {
      case 'VP8 ':
        this.parseLossy(payload);
        break;
      case 'VP8L':
        this.parseLossless(payload);
        break;
      case 'VP8X':
        this.parseExtended(payload);
        break;
      default:
        throw new DecodeError(`Unknown WebP chunk "${fourcc}"`);
    }
    this.checkDimensions(this.info.width, this.info.height);
  }

  private parseLossy(payload: Uint8Array): void {
    if (payload.length < 10 || payload[3] !== 0x9d || payload[4] !== 0x01 || payload[5] !== 0x2a) {
      throw new DecodeError('Invalid VP8 frame header');
    }
    Object.assign(this.info, {
      encoding: 'VP8',
      hasAlpha: false,
      animated: false,
      width: (payload[6] | (payload[7] << 8)) & 0x3fff,
      height: (payload[8] | (payload[9] << 8)) & 0x3fff
    });
  }

  private parseLossless(payload: Uint8Array): void {
    if (payload.length < 5 || payload[0] !== 0x2f) {
      throw new DecodeError('Invalid VP8L signature');
    }
    const bits = payload[1] | (payload[2] << 8) | (payload[3] << 16) | (payload[4] << 24);
    Object.assign(this.info, {
      encoding: 'VP8L',
      animated: false,
      width: (bits & 0x3fff) + 1,
      height: ((bits >>> 14) & 0x3fff) + 1,
      hasAlpha: ((bits >>> 28) & 1) === 1
    });
  }

  private parseExtended(payload: Uint8Array): void {
    if (payload.length < 10) {
      throw new DecodeError('VP8X chunk is truncated');
    }
    const flags = payload[0];
    Object.assign(this.info, {
      encoding: 'VP8X',
      hasAlpha: (flags & 0x10) !== 0,
      animated: (flags & 0x02) !== 0,
      width: (payload[4] | (payload[5] << 8) | (payload[6] << 16)) + 1,
      height: (payload[7] | (payload[8] << 8) | (payload[9] << 16)) + 1
    });
  }

  protected decodePixels(): Image {
    throw new NotImplementedError('WebP decoding is not implemented');
  }
}

export class AvifDecoder extends BaseDecoder<AvifInfo> {
  readonly format = 'avif' as const;

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, { format: 'avif', compatibleBrands: [] }, options, 'avif');
  }

  protected parseHeader(): void {
    const reader = this.reader;
    const boxSize = reader.readU32();
    if (bytesToString(reader.readBytes(4)) !== 'ftyp') {
      throw new UnsupportedFormatError('Not an AVIF file');
    }
    if (boxSize < 16 || boxSize % 4 !== 0) {
      throw new DecodeError(`Invalid ftyp box size ${boxSize}`);
    }
    this.info.majorBrand = bytesToString(reader.readBytes(4));
    this.info.minorVersion = reader.readU32();
    for (let remaining = boxSize - 16; remaining > 0; remaining -= 4) {
      this.info.compatibleBrands.push(bytesToString(reader.readBytes(4)));
    }
  }

  protected decodePixels(): Image {
    throw new NotImplementedError('AVIF decoding is not implemented');
  }
}

export const webpDecoder: DecoderPlugin = {
  format: 'webp',
  create: (source, options) => new WebpDecoder(source, options)
};

export const avifDecoder: DecoderPlugin = {
  format: 'avif',
  create: (source, options) => new AvifDecoder(source, options)
};
