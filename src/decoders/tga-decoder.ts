/**
 * TGA (Truevision Targa) decoder
 *
 * Handles colour-mapped, true-colour and greyscale images, raw or
 * run-length encoded. The 18-byte header is little-endian. Rows are stored
 * bottom-up unless descriptor bit 5 is set; bit 4 mirrors each row.
 */

import type { ByteSource } from '../byte-source.js';
import { DecodeError, UnsupportedFormatError } from '../errors.js';
import { Image } from '../image.js';
import { getSafe } from '../safe-access.js';
import { bytesToString, scaleSample } from '../utils.js';
import { BaseDecoder } from './base-decoder.js';
import type { DecoderOptions, DecoderPlugin } from './types.js';

export enum TgaImageType {
  NoImage = 0,
  ColorMapped = 1,
  TrueColor = 2,
  Grayscale = 3,
  ColorMappedRle = 9,
  TrueColorRle = 10,
  GrayscaleRle = 11,
  Huffman = 32,
  HuffmanQuadtree = 33
}

const HEADER_SIZE = 18;
const FOOTER_SIZE = 26;
export const TGA_FOOTER_SIGNATURE = 'TRUEVISION-XFILE.\0';

const TOP_TO_BOTTOM = 0x20;
const RIGHT_TO_LEFT = 0x10;
const ALPHA_BITS_MASK = 0x0f;

export interface TgaHeader {
  idLength: number;
  colorMapType: number;
  imageType: number;
  colorMapOrigin: number;
  colorMapLength: number;
  /** Bits per colour map entry */
  colorMapDepth: number;
  xOrigin: number;
  yOrigin: number;
  width: number;
  height: number;
  /** Bits per stored pixel */
  pixelDepth: number;
  descriptor: number;
}

/** TGA 2.0 trailer */
export interface TgaFooter {
  extensionOffset: number;
  developerOffset: number;
}

export interface TgaColorEntry {
  red: number;
  green: number;
  blue: number;
  alpha: number;
}

export interface TgaInfo {
  format: 'tga';
  width: number;
  height: number;
  header?: TgaHeader;
  imageId: string;
  colorMap: TgaColorEntry[];
  topToBottom: boolean;
  rightToLeft: boolean;
  alphaBits: number;
  footer?: TgaFooter;
}

function createTgaInfo(): TgaInfo {
  return {
    format: 'tga',
    width: 0,
    height: 0,
    imageId: '',
    colorMap: [],
    topToBottom: false,
    rightToLeft: false,
    alphaBits: 0
  };
}

function isRle(imageType: number): boolean {
  return imageType >= TgaImageType.ColorMappedRle;
}

function readU32LE(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16) | (bytes[offset + 3] << 24)) >>> 0;
}

/** Strip the RLE bit to get the colour model */
function baseType(imageType: number): number {
  return imageType & 0x07;
}

/**
 * Unpack a 15/16/24/32-bit BGR(A) value stored little-endian at `offset`.
 * 15 and 16 bit values carry 5 bits per channel plus an attribute bit.
 */
function readColor(bytes: Uint8Array, offset: number, depth: number): TgaColorEntry {
  if (depth === 15 || depth === 16) {
    const value = bytes[offset] | (bytes[offset + 1] << 8);
    return {
      red: scaleSample((value >> 10) & 0x1f, 31, 255),
      green: scaleSample((value >> 5) & 0x1f, 31, 255),
      blue: scaleSample(value & 0x1f, 31, 255),
      alpha: value & 0x8000 ? 255 : 0
    };
  }
  return {
    red: bytes[offset + 2],
    green: bytes[offset + 1],
    blue: bytes[offset],
    alpha: depth === 32 ? bytes[offset + 3] : 255
  };
}

export class TgaDecoder extends BaseDecoder<TgaInfo> {
  readonly format = 'tga' as const;

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, createTgaInfo(), options, 'tga');
  }

  protected parseHeader(): void {
    const reader = this.reader;
    const info = this.info;
    info.footer = this.readFooter();
    reader.seek(0);

    const header: TgaHeader = {
      idLength: reader.readU8(),
      colorMapType: reader.readU8(),
      imageType: reader.readU8(),
      colorMapOrigin: reader.readU16LE(),
      colorMapLength: reader.readU16LE(),
      colorMapDepth: reader.readU8(),
      xOrigin: reader.readU16LE(),
      yOrigin: reader.readU16LE(),
      width: reader.readU16LE(),
      height: reader.readU16LE(),
      pixelDepth: reader.readU8(),
      descriptor: reader.readU8()
    };
    info.header = header;

    switch (header.imageType) {
      case TgaImageType.NoImage:
        throw new DecodeError('TGA header declares no image data');
      case TgaImageType.Huffman:
      case TgaImageType.HuffmanQuadtree:
        throw new UnsupportedFormatError('Huffman-coded TGA is not supported');
      case TgaImageType.ColorMapped:
      case TgaImageType.TrueColor:
      case TgaImageType.Grayscale:
      case TgaImageType.ColorMappedRle:
      case TgaImageType.TrueColorRle:
      case TgaImageType.GrayscaleRle:
        break;
      default:
        throw new DecodeError(`Unknown TGA image type ${header.imageType}`);
    }
    if (header.colorMapType > 1) {
      throw new DecodeError(`Invalid TGA colour map type ${header.colorMapType}`);
    }
    this.checkPixelDepth(header);

    info.width = header.width;
    info.height = header.height;
    info.topToBottom = (header.descriptor & TOP_TO_BOTTOM) !== 0;
    info.rightToLeft = (header.descriptor & RIGHT_TO_LEFT) !== 0;
    info.alphaBits = header.descriptor & ALPHA_BITS_MASK;
    this.checkDimensions(info.width, info.height);

    info.imageId = bytesToString(reader.readBytes(header.idLength)).replace(/\0+$/, '');

    if (header.colorMapType === 1) {
      const depth = header.colorMapDepth;
      if (![15, 16, 24, 32].includes(depth)) {
        throw new UnsupportedFormatError(`Unsupported TGA colour map entry size ${depth}`);
      }
      const entrySize = Math.ceil(depth / 8);
      const entries = reader.readBytes(header.colorMapLength * entrySize);
      for (let i = 0; i < header.colorMapLength; i++) {
        info.colorMap.push(readColor(entries, i * entrySize, depth));
      }
    }
  }

  private checkPixelDepth(header: TgaHeader): void {
    const depth = header.pixelDepth;
    let supported: number[];
    switch (baseType(header.imageType)) {
      case TgaImageType.ColorMapped:
        if (header.colorMapType !== 1) {
          throw new DecodeError('Colour-mapped TGA has no colour map');
        }
        supported = [8, 16];
        break;
      case TgaImageType.Grayscale:
        supported = [8, 16];
        break;
      default:
        supported = [15, 16, 24, 32];
    }
    if (!supported.includes(depth)) {
      throw new UnsupportedFormatError(`Unsupported TGA pixel depth ${depth} for image type ${header.imageType}`);
    }
  }

  private readFooter(): TgaFooter | undefined {
    const reader = this.reader;
    if (reader.length < HEADER_SIZE + FOOTER_SIZE) {
      return undefined;
    }
    reader.seek(-FOOTER_SIZE, 'end');
    const footer = reader.readBytes(FOOTER_SIZE);
    if (bytesToString(footer, 8) !== TGA_FOOTER_SIGNATURE) {
      return undefined;
    }
    return { extensionOffset: readU32LE(footer, 0), developerOffset: readU32LE(footer, 4) };
  }

  protected decodePixels(): Image {
    const { width, height, header } = this.info;
    if (!header) {
      throw new DecodeError('Missing TGA header');
    }
    const bytesPerPixel = Math.ceil(header.pixelDepth / 8);
    const stored = isRle(header.imageType)
      ? this.expandRle(width * height, bytesPerPixel)
      : this.reader.readBytes(width * height * bytesPerPixel);

    switch (baseType(header.imageType)) {
      case TgaImageType.Grayscale:
        return this.greyToImage(stored, bytesPerPixel);
      case TgaImageType.ColorMapped:
        return this.mappedToImage(stored, bytesPerPixel, header);
      default:
        return this.colorToImage(stored, bytesPerPixel, header.pixelDepth);
    }
  }

  /**
   * Expand RLE packets into stored pixels. A packet header's top bit marks
   * a run of one repeated pixel; otherwise raw pixels follow. Packets may
   * cross row boundaries.
   */
  private expandRle(pixelCount: number, bytesPerPixel: number): Uint8Array {
    const reader = this.reader;
    const out = new Uint8Array(pixelCount * bytesPerPixel);
    let pixel = 0;
    while (pixel < pixelCount) {
      const packet = reader.readU8();
      let count = (packet & 0x7f) + 1;
      if (pixel + count > pixelCount) {
        this.logger.warn({ pixel, count }, 'RLE packet runs past the end of the image');
        count = pixelCount - pixel;
      }
      if (packet & 0x80) {
        const value = reader.readBytes(bytesPerPixel);
        for (let i = 0; i < count; i++) {
          out.set(value, (pixel + i) * bytesPerPixel);
        }
      } else {
        out.set(reader.readBytes(count * bytesPerPixel), pixel * bytesPerPixel);
      }
      pixel += count;
    }
    return out;
  }

  /** Output pixel index for the stored pixel at `index` */
  private targetIndex(index: number): number {
    const { width, height, topToBottom, rightToLeft } = this.info;
    const row = Math.floor(index / width);
    const col = index % width;
    const y = topToBottom ? row : height - 1 - row;
    const x = rightToLeft ? width - 1 - col : col;
    return y * width + x;
  }

  private greyToImage(stored: Uint8Array, bytesPerPixel: number): Image {
    const { width, height } = this.info;
    const data = new Uint8Array(width * height * bytesPerPixel);
    for (let i = 0; i < width * height; i++) {
      const out = this.targetIndex(i) * bytesPerPixel;
      for (let c = 0; c < bytesPerPixel; c++) {
        data[out + c] = stored[i * bytesPerPixel + c];
      }
    }
    return new Image(width, height, bytesPerPixel === 2 ? { format: 'la8', data } : { format: 'l8', data });
  }

  private mappedToImage(stored: Uint8Array, bytesPerPixel: number, header: TgaHeader): Image {
    const { width, height, colorMap } = this.info;
    const withAlpha = header.colorMapDepth === 32 || (header.colorMapDepth === 16 && this.info.alphaBits > 0);
    const channels = withAlpha ? 4 : 3;
    const data = new Uint8Array(width * height * channels);
    for (let i = 0; i < width * height; i++) {
      const index = bytesPerPixel === 2 ? stored[i * 2] | (stored[i * 2 + 1] << 8) : stored[i];
      const entry = getSafe(colorMap, index - header.colorMapOrigin);
      writeEntry(data, this.targetIndex(i) * channels, entry, withAlpha);
    }
    return new Image(width, height, withAlpha ? { format: 'rgba8', data } : { format: 'rgb8', data });
  }

  private colorToImage(stored: Uint8Array, bytesPerPixel: number, depth: number): Image {
    const { width, height } = this.info;
    const withAlpha = depth === 32 || (depth === 16 && this.info.alphaBits > 0);
    const channels = withAlpha ? 4 : 3;
    const data = new Uint8Array(width * height * channels);
    for (let i = 0; i < width * height; i++) {
      const entry = readColor(stored, i * bytesPerPixel, depth);
      writeEntry(data, this.targetIndex(i) * channels, entry, withAlpha);
    }
    return new Image(width, height, withAlpha ? { format: 'rgba8', data } : { format: 'rgb8', data });
  }
}

function writeEntry(data: Uint8Array, offset: number, entry: TgaColorEntry, withAlpha: boolean): void {
  data[offset] = entry.red;
  data[offset + 1] = entry.green;
  data[offset + 2] = entry.blue;
  if (withAlpha) {
    data[offset + 3] = entry.alpha;
  }
}

export const tgaDecoder: DecoderPlugin = {
  format: 'tga',
  create: (source, options) => new TgaDecoder(source, options)
};
