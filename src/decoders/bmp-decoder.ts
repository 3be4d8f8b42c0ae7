/**
 * BMP / DIB decoder
 *
 * Reads the Windows and OS/2 header variants, palettes, bitfield masks and
 * RLE4/RLE8 compression. Rows are stored bottom-up unless the height is
 * negative, each padded to four bytes.
 */

import type { BitReader } from '../bit-reader.js';
import type { ByteSource } from '../byte-source.js';
import { DecodeError, UnsupportedFormatError } from '../errors.js';
import { Image } from '../image.js';
import { getSafe } from '../safe-access.js';
import { bytesToString, scaleSample } from '../utils.js';
import { BaseDecoder } from './base-decoder.js';
import type { DecoderOptions, DecoderPlugin } from './types.js';

const SIGNATURES = ['BM', 'BA', 'CI', 'CP', 'IC', 'PT'];

export enum BmpCompression {
  RGB = 0,
  RLE8 = 1,
  RLE4 = 2,
  BITFIELDS = 3,
  JPEG = 4,
  PNG = 5,
  ALPHABITFIELDS = 6,
  CMYK = 11,
  CMYKRLE8 = 12,
  CMYKRLE4 = 13
}

export interface BmpFileHeader {
  signature: string;
  fileSize: number;
  reserved1: number;
  reserved2: number;
  pixelOffset: number;
}

export interface BmpDibHeader {
  headerSize: number;
  width: number;
  /** Signed; negative means rows are stored top-down */
  height: number;
  planes: number;
  bitCount: number;
  compression: number;
  imageSize: number;
  xPixelsPerMeter: number;
  yPixelsPerMeter: number;
  colorsUsed: number;
  colorsImportant: number;
  redMask?: number;
  greenMask?: number;
  blueMask?: number;
  alphaMask?: number;
  colorSpaceType?: number;
  intent?: number;
  profileData?: number;
  profileSize?: number;
}

export interface BmpColorEntry {
  red: number;
  green: number;
  blue: number;
}

export interface BmpInfo {
  format: 'bmp';
  width: number;
  height: number;
  topDown: boolean;
  fileHeader?: BmpFileHeader;
  dibHeader?: BmpDibHeader;
  colorTable: BmpColorEntry[];
}

function createBmpInfo(): BmpInfo {
  return { format: 'bmp', width: 0, height: 0, topDown: false, colorTable: [] };
}

interface ChannelMask {
  mask: number;
  shift: number;
  max: number;
}

function describeMask(mask: number): ChannelMask {
  if (mask === 0) {
    return { mask: 0, shift: 0, max: 0 };
  }
  let shift = 0;
  while (((mask >>> shift) & 1) === 0) {
    shift++;
  }
  let bits = 0;
  while (((mask >>> (shift + bits)) & 1) === 1 && shift + bits < 32) {
    bits++;
  }
  return { mask, shift, max: 2 ** bits - 1 };
}

function applyMask(pixel: number, channel: ChannelMask): number {
  if (channel.max === 0) {
    return 0;
  }
  return scaleSample((pixel & channel.mask) >>> channel.shift, channel.max, 255);
}

function readFileHeader(reader: BitReader): BmpFileHeader {
  let signature = bytesToString(reader.readBytes(2));
  if (!SIGNATURES.includes(signature)) {
    throw new UnsupportedFormatError(`Invalid BMP signature "${signature}"`);
  }
  if (signature === 'BA') {
    // Bitmap array: skip the array header and read the first image's header.
    reader.skip(12);
    signature = bytesToString(reader.readBytes(2));
    if (!SIGNATURES.includes(signature) || signature === 'BA') {
      throw new UnsupportedFormatError(`Invalid BMP signature "${signature}" in bitmap array`);
    }
  }
  return {
    signature,
    fileSize: reader.readU32LE(),
    reserved1: reader.readU16LE(),
    reserved2: reader.readU16LE(),
    pixelOffset: reader.readU32LE()
  };
}

function readDibHeader(reader: BitReader): BmpDibHeader {
  const headerSize = reader.readU32LE();
  const header: BmpDibHeader = {
    headerSize,
    width: 0,
    height: 0,
    planes: 1,
    bitCount: 0,
    compression: BmpCompression.RGB,
    imageSize: 0,
    xPixelsPerMeter: 0,
    yPixelsPerMeter: 0,
    colorsUsed: 0,
    colorsImportant: 0
  };

  if (headerSize === 12) {
    header.width = reader.readU16LE();
    header.height = reader.readU16LE();
    header.planes = reader.readU16LE();
    header.bitCount = reader.readU16LE();
    return header;
  }

  const os2 = headerSize === 16 || headerSize === 64;
  if (!os2 && ![40, 52, 56, 108, 124].includes(headerSize)) {
    throw new UnsupportedFormatError(`Unsupported DIB header size ${headerSize}`);
  }

  header.width = reader.readI32LE();
  header.height = reader.readI32LE();
  header.planes = reader.readU16LE();
  header.bitCount = reader.readU16LE();
  if (headerSize === 16) {
    return header;
  }

  header.compression = reader.readU32LE();
  header.imageSize = reader.readU32LE();
  header.xPixelsPerMeter = reader.readI32LE();
  header.yPixelsPerMeter = reader.readI32LE();
  header.colorsUsed = reader.readU32LE();
  header.colorsImportant = reader.readU32LE();

  if (os2) {
    // Units, padding, recording, rendering, size1, size2, encoding, identifier
    reader.skip(24);
    if (header.compression === 3 || header.compression === 4) {
      throw new UnsupportedFormatError(`Unsupported OS/2 BMP compression ${header.compression}`);
    }
    return header;
  }

  if (headerSize >= 52) {
    header.redMask = reader.readU32LE();
    header.greenMask = reader.readU32LE();
    header.blueMask = reader.readU32LE();
  }
  if (headerSize >= 56) {
    header.alphaMask = reader.readU32LE();
  }
  if (headerSize >= 108) {
    header.colorSpaceType = reader.readU32LE();
    // CIEXYZTRIPLE endpoints and three gamma values
    reader.skip(48);
  }
  if (headerSize === 124) {
    header.intent = reader.readU32LE();
    header.profileData = reader.readU32LE();
    header.profileSize = reader.readU32LE();
    reader.skip(4);
  }
  return header;
}

export class BmpDecoder extends BaseDecoder<BmpInfo> {
  readonly format = 'bmp' as const;

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, createBmpInfo(), options, 'bmp');
  }

  protected parseHeader(): void {
    const reader = this.reader;
    const fileHeader = readFileHeader(reader);
    const dib = readDibHeader(reader);
    const info = this.info;
    info.fileHeader = fileHeader;
    info.dibHeader = dib;

    switch (dib.compression) {
      case BmpCompression.JPEG:
      case BmpCompression.PNG:
        throw new UnsupportedFormatError('BMP with embedded JPEG or PNG data is not supported');
      case BmpCompression.CMYK:
      case BmpCompression.CMYKRLE8:
      case BmpCompression.CMYKRLE4:
        throw new UnsupportedFormatError('CMYK BMP is not supported');
      case BmpCompression.RGB:
      case BmpCompression.RLE8:
      case BmpCompression.RLE4:
      case BmpCompression.BITFIELDS:
      case BmpCompression.ALPHABITFIELDS:
        break;
      default:
        throw new DecodeError(`Unknown BMP compression ${dib.compression}`);
    }
    if (![1, 4, 8, 16, 24, 32].includes(dib.bitCount)) {
      throw new DecodeError(`Unsupported BMP bit depth ${dib.bitCount}`);
    }
    if (dib.compression === BmpCompression.RLE8 && dib.bitCount !== 8) {
      throw new DecodeError('RLE8 compression requires 8 bits per pixel');
    }
    if (dib.compression === BmpCompression.RLE4 && dib.bitCount !== 4) {
      throw new DecodeError('RLE4 compression requires 4 bits per pixel');
    }

    info.width = dib.width;
    info.height = Math.abs(dib.height);
    info.topDown = dib.height < 0;
    this.checkDimensions(info.width, info.height);

    // Masks stored after a 40-byte header
    if (dib.headerSize === 40 && dib.compression === BmpCompression.BITFIELDS) {
      dib.redMask = reader.readU32LE();
      dib.greenMask = reader.readU32LE();
      dib.blueMask = reader.readU32LE();
    } else if (dib.headerSize === 40 && dib.compression === BmpCompression.ALPHABITFIELDS) {
      dib.redMask = reader.readU32LE();
      dib.greenMask = reader.readU32LE();
      dib.blueMask = reader.readU32LE();
      dib.alphaMask = reader.readU32LE();
    }

    if (dib.bitCount <= 8) {
      const maxColors = 1 << dib.bitCount;
      const count = dib.colorsUsed > 0 ? Math.min(dib.colorsUsed, maxColors) : maxColors;
      const entrySize = dib.headerSize === 12 ? 3 : 4;
      for (let i = 0; i < count; i++) {
        const entry = reader.readBytes(entrySize);
        info.colorTable.push({ blue: entry[0], green: entry[1], red: entry[2] });
      }
    }
  }

  protected decodePixels(): Image {
    const info = this.info;
    const fileHeader = info.fileHeader;
    const dib = info.dibHeader;
    if (!fileHeader || !dib) {
      throw new DecodeError('Missing BMP headers');
    }
    this.reader.seek(fileHeader.pixelOffset);

    const { width, height } = info;
    if (dib.compression === BmpCompression.RLE8 || dib.compression === BmpCompression.RLE4) {
      return this.indexedToImage(this.decodeRle(dib.compression === BmpCompression.RLE4));
    }

    const stride = Math.floor((dib.bitCount * width + 31) / 32) * 4;
    const rows = this.reader.readBytes(stride * height);

    if (dib.bitCount <= 8) {
      const indices = new Uint8Array(width * height);
      const mask = (1 << dib.bitCount) - 1;
      for (let row = 0; row < height; row++) {
        const rowStart = row * stride;
        for (let x = 0; x < width; x++) {
          const bit = x * dib.bitCount;
          const byte = rows[rowStart + (bit >> 3)];
          indices[row * width + x] = (byte >> (8 - dib.bitCount - (bit & 7))) & mask;
        }
      }
      return this.indexedToImage(indices);
    }

    return this.directToImage(rows, stride, dib);
  }

  /** Output row for a row in file order */
  private targetRow(row: number): number {
    return this.info.topDown ? row : this.info.height - 1 - row;
  }

  private indexedToImage(indices: Uint8Array): Image {
    const { width, height, colorTable } = this.info;
    const data = new Uint8Array(width * height * 3);
    for (let row = 0; row < height; row++) {
      const y = this.targetRow(row);
      for (let x = 0; x < width; x++) {
        const color = getSafe(colorTable, indices[row * width + x]);
        const out = (y * width + x) * 3;
        data[out] = color.red;
        data[out + 1] = color.green;
        data[out + 2] = color.blue;
      }
    }
    return new Image(width, height, { format: 'rgb8', data });
  }

  private directToImage(rows: Uint8Array, stride: number, dib: BmpDibHeader): Image {
    const { width, height } = this.info;
    const bitfields = dib.compression === BmpCompression.BITFIELDS || dib.compression === BmpCompression.ALPHABITFIELDS;
    const bytesPerPixel = dib.bitCount / 8;

    let red: ChannelMask;
    let green: ChannelMask;
    let blue: ChannelMask;
    let alpha: ChannelMask;
    if (bitfields) {
      red = describeMask(dib.redMask ?? 0);
      green = describeMask(dib.greenMask ?? 0);
      blue = describeMask(dib.blueMask ?? 0);
      alpha = describeMask(dib.alphaMask ?? 0);
    } else if (dib.bitCount === 16) {
      red = describeMask(0x7c00);
      green = describeMask(0x03e0);
      blue = describeMask(0x001f);
      alpha = describeMask(0);
    } else {
      red = describeMask(0xff0000);
      green = describeMask(0x00ff00);
      blue = describeMask(0x0000ff);
      alpha = describeMask(0);
    }

    const channels = alpha.max > 0 ? 4 : 3;
    const data = new Uint8Array(width * height * channels);
    for (let row = 0; row < height; row++) {
      const y = this.targetRow(row);
      for (let x = 0; x < width; x++) {
        const offset = row * stride + x * bytesPerPixel;
        let pixel = 0;
        for (let b = bytesPerPixel - 1; b >= 0; b--) {
          pixel = pixel * 256 + rows[offset + b];
        }
        const out = (y * width + x) * channels;
        data[out] = applyMask(pixel, red);
        data[out + 1] = applyMask(pixel, green);
        data[out + 2] = applyMask(pixel, blue);
        if (channels === 4) {
          data[out + 3] = applyMask(pixel, alpha);
        }
      }
    }
    return new Image(width, height, channels === 4 ? { format: 'rgba8', data } : { format: 'rgb8', data });
  }

  /**
   * Expand RLE4/RLE8 data into colour indices in file row order. Pixels
   * skipped by delta or end-of-line codes keep index 0.
   */
  private decodeRle(rle4: boolean): Uint8Array {
    const reader = this.reader;
    const { width, height } = this.info;
    const indices = new Uint8Array(width * height);
    let x = 0;
    let row = 0;

    const put = (value: number): void => {
      if (x < width && row < height) {
        indices[row * width + x] = value;
      }
      x++;
    };

    while (row < height) {
      if (reader.bytesLeft() < 2) {
        this.logger.warn({ row }, 'RLE data ended without end-of-bitmap');
        break;
      }
      const count = reader.readU8();
      const value = reader.readU8();

      if (count > 0) {
        for (let i = 0; i < count; i++) {
          put(rle4 ? (i % 2 === 0 ? value >> 4 : value & 15) : value);
        }
        continue;
      }

      if (value === 0) {
        x = 0;
        row++;
      } else if (value === 1) {
        break;
      } else if (value === 2) {
        x += reader.readU8();
        row += reader.readU8();
      } else {
        const byteCount = rle4 ? Math.ceil(value / 2) : value;
        const literal = reader.readBytes(byteCount + (byteCount % 2));
        for (let i = 0; i < value; i++) {
          put(rle4 ? (i % 2 === 0 ? literal[i >> 1] >> 4 : literal[i >> 1] & 15) : literal[i]);
        }
      }
    }
    return indices;
  }
}

export const bmpDecoder: DecoderPlugin = {
  format: 'bmp',
  create: (source, options) => new BmpDecoder(source, options)
};
