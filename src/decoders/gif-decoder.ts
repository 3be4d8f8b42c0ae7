/**
 * GIF87a/GIF89a decoder
 *
 * readHeader parses every block and keeps each frame's compressed data;
 * decode runs LZW per frame. The returned image is the logical screen with
 * the first frame placed at its offset; all frames are exposed as
 * ImageFrames covering their own regions.
 */

import type { BitReader } from '../bit-reader.js';
import type { ByteSource } from '../byte-source.js';
import { DecodeError, UnsupportedFormatError } from '../errors.js';
import { decodeLzw } from '../gif-lzw.js';
import { Image } from '../image.js';
import type { FrameDisposal, ImageFrame } from '../image.js';
import { getSafe } from '../safe-access.js';
import { bytesToString } from '../utils.js';
import { BaseDecoder } from './base-decoder.js';
import type { DecoderOptions, DecoderPlugin } from './types.js';

const EXTENSION_INTRODUCER = 0x21;
const IMAGE_SEPARATOR = 0x2c;
const TRAILER = 0x3b;

const GRAPHIC_CONTROL_LABEL = 0xf9;
const COMMENT_LABEL = 0xfe;
const PLAIN_TEXT_LABEL = 0x01;
const APPLICATION_LABEL = 0xff;

const DEFAULT_DELAY_MS = 100;

export type GifDisposalMethod = 'unspecified' | 'none' | 'background' | 'previous';

export interface GifApplicationExtension {
  identifier: string;
  authCode: string;
  loopCount?: number;
  bufferSize?: number;
  /** Sub-block payload length in bytes */
  dataLength: number;
}

export interface GifPlainTextExtension {
  left: number;
  top: number;
  width: number;
  height: number;
  cellWidth: number;
  cellHeight: number;
  foregroundColor: number;
  backgroundColor: number;
  text: string;
}

export interface GifFrameInfo {
  left: number;
  top: number;
  width: number;
  height: number;
  localColorTableFlag: boolean;
  interlaced: boolean;
  sortFlag: boolean;
  localColorTableSize: number;
  /** Packed RGB triples */
  localColorTable: number[];
  lzwMinimumCodeSize: number;
  transparentIndex?: number;
  disposalMethod: GifDisposalMethod;
  userInput: boolean;
  delayMs: number;
  /** Compressed image data in bytes */
  dataLength: number;
}

export interface GifInfo {
  format: 'gif';
  width: number;
  height: number;
  version: string;
  globalColorTableFlag: boolean;
  colorResolution: number;
  sortFlag: boolean;
  globalColorTableSize: number;
  backgroundColorIndex: number;
  pixelAspectRatio: number;
  /** Packed RGB triples */
  globalColorTable: number[];
  frames: GifFrameInfo[];
  comments: string[];
  applicationExtensions: GifApplicationExtension[];
  plainTextExtensions: GifPlainTextExtension[];
}

function createGifInfo(): GifInfo {
  return {
    format: 'gif',
    width: 0,
    height: 0,
    version: '',
    globalColorTableFlag: false,
    colorResolution: 0,
    sortFlag: false,
    globalColorTableSize: 0,
    backgroundColorIndex: 0,
    pixelAspectRatio: 0,
    globalColorTable: [],
    frames: [],
    comments: [],
    applicationExtensions: [],
    plainTextExtensions: []
  };
}

interface GraphicControl {
  disposalMethod: GifDisposalMethod;
  userInput: boolean;
  transparentIndex?: number;
  delayMs: number;
}

const DISPOSAL_METHODS: readonly GifDisposalMethod[] = ['unspecified', 'none', 'background', 'previous'];

function toFrameDisposal(method: GifDisposalMethod): FrameDisposal {
  return method === 'background' || method === 'previous' ? method : 'none';
}

/**
 * Concatenate data sub-blocks up to the zero-length terminator
 */
function readSubBlocks(reader: BitReader): Uint8Array {
  const blocks: Uint8Array[] = [];
  let total = 0;
  for (let size = reader.readU8(); size > 0; size = reader.readU8()) {
    const block = reader.readBytes(size);
    blocks.push(block);
    total += size;
  }
  const data = new Uint8Array(total);
  let offset = 0;
  for (const block of blocks) {
    data.set(block, offset);
    offset += block.length;
  }
  return data;
}

function readColorTable(reader: BitReader, entries: number): number[] {
  return Array.from(reader.readBytes(entries * 3));
}

function toPalette(table: readonly number[]): [number, number, number][] {
  const palette: [number, number, number][] = [];
  for (let i = 0; i + 2 < table.length; i += 3) {
    palette.push([table[i], table[i + 1], table[i + 2]]);
  }
  return palette;
}

/**
 * Row order of a 4-pass interlaced frame
 */
export function interlacedRows(height: number): number[] {
  const rows: number[] = [];
  for (const [start, step] of [
    [0, 8],
    [4, 8],
    [2, 4],
    [1, 2]
  ]) {
    for (let y = start; y < height; y += step) {
      rows.push(y);
    }
  }
  return rows;
}

export class GifDecoder extends BaseDecoder<GifInfo> {
  readonly format = 'gif' as const;

  private readonly frameData: Uint8Array[] = [];
  private pendingControl?: GraphicControl;

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, createGifInfo(), options, 'gif');
  }

  protected parseHeader(): void {
    const reader = this.reader;
    const signature = bytesToString(reader.peekBytes(6));
    if (signature !== 'GIF87a' && signature !== 'GIF89a') {
      throw new UnsupportedFormatError(`Invalid GIF signature "${signature}"`);
    }
    reader.skip(6);

    const info = this.info;
    info.version = signature.slice(3);
    info.width = reader.readU16LE();
    info.height = reader.readU16LE();
    const packed = reader.readU8();
    info.backgroundColorIndex = reader.readU8();
    info.pixelAspectRatio = reader.readU8();
    info.globalColorTableFlag = (packed & 0x80) !== 0;
    info.colorResolution = ((packed >> 4) & 7) + 1;
    info.sortFlag = (packed & 0x08) !== 0;
    info.globalColorTableSize = info.globalColorTableFlag ? 1 << ((packed & 7) + 1) : 0;
    this.checkDimensions(info.width, info.height);

    if (info.globalColorTableFlag) {
      info.globalColorTable = readColorTable(reader, info.globalColorTableSize);
    }

    this.readBlocks();
  }

  private readBlocks(): void {
    const reader = this.reader;
    while (reader.bytesLeft() > 0) {
      const introducer = reader.readU8();
      switch (introducer) {
        case TRAILER:
          return;
        case EXTENSION_INTRODUCER:
          this.readExtension();
          break;
        case IMAGE_SEPARATOR:
          this.readImage();
          break;
        default:
          throw new DecodeError(`Unknown block type 0x${introducer.toString(16)} at offset ${reader.tell() - 1}`);
      }
    }
    this.logger.warn('Missing GIF trailer');
  }

  private readExtension(): void {
    const reader = this.reader;
    const label = reader.readU8();
    switch (label) {
      case GRAPHIC_CONTROL_LABEL: {
        const data = readSubBlocks(reader);
        if (data.length < 4) {
          throw new DecodeError('Graphic control extension is truncated');
        }
        const packed = data[0];
        this.pendingControl = {
          disposalMethod: DISPOSAL_METHODS[(packed >> 2) & 7] ?? 'unspecified',
          userInput: (packed & 0x02) !== 0,
          transparentIndex: packed & 0x01 ? data[3] : undefined,
          delayMs: (data[1] | (data[2] << 8)) * 10
        };
        return;
      }
      case COMMENT_LABEL:
        this.info.comments.push(bytesToString(readSubBlocks(reader)));
        return;
      case PLAIN_TEXT_LABEL: {
        const size = reader.readU8();
        const header = reader.readBytes(size);
        if (size < 12) {
          throw new DecodeError('Plain text extension header is truncated');
        }
        const u16 = (offset: number): number => header[offset] | (header[offset + 1] << 8);
        this.info.plainTextExtensions.push({
          left: u16(0),
          top: u16(2),
          width: u16(4),
          height: u16(6),
          cellWidth: header[8],
          cellHeight: header[9],
          foregroundColor: header[10],
          backgroundColor: header[11],
          text: bytesToString(readSubBlocks(reader))
        });
        this.pendingControl = undefined;
        return;
      }
      case APPLICATION_LABEL:
        this.readApplicationExtension();
        return;
      default:
        this.logger.debug({ label }, 'Skipping unknown extension');
        readSubBlocks(reader);
    }
  }

  private readApplicationExtension(): void {
    const reader = this.reader;
    const size = reader.readU8();
    const header = reader.readBytes(size);
    const identifier = bytesToString(header, 0, 8);
    const authCode = bytesToString(header, 8, 3);
    const extension: GifApplicationExtension = { identifier, authCode, dataLength: 0 };

    const looping = identifier === 'NETSCAPE' || identifier === 'ANIMEXTS';
    for (let blockSize = reader.readU8(); blockSize > 0; blockSize = reader.readU8()) {
      const block = reader.readBytes(blockSize);
      extension.dataLength += blockSize;
      if (!looping || blockSize < 3) {
        continue;
      }
      if (block[0] === 1) {
        extension.loopCount = block[1] | (block[2] << 8);
      } else if (block[0] === 2 && blockSize >= 5) {
        extension.bufferSize = (block[1] | (block[2] << 8) | (block[3] << 16) | (block[4] << 24)) >>> 0;
      }
    }
    this.info.applicationExtensions.push(extension);
  }

  private readImage(): void {
    const reader = this.reader;
    const left = reader.readU16LE();
    const top = reader.readU16LE();
    const width = reader.readU16LE();
    const height = reader.readU16LE();
    const packed = reader.readU8();
    this.checkDimensions(width, height);

    const localColorTableFlag = (packed & 0x80) !== 0;
    const localColorTableSize = localColorTableFlag ? 1 << ((packed & 7) + 1) : 0;
    const localColorTable = localColorTableFlag ? readColorTable(reader, localColorTableSize) : [];
    const lzwMinimumCodeSize = reader.readU8();
    const data = readSubBlocks(reader);

    const control = this.pendingControl;
    this.pendingControl = undefined;

    this.info.frames.push({
      left,
      top,
      width,
      height,
      localColorTableFlag,
      interlaced: (packed & 0x40) !== 0,
      sortFlag: (packed & 0x20) !== 0,
      localColorTableSize,
      localColorTable,
      lzwMinimumCodeSize,
      transparentIndex: control?.transparentIndex,
      disposalMethod: control?.disposalMethod ?? 'unspecified',
      userInput: control?.userInput ?? false,
      delayMs: control ? control.delayMs : DEFAULT_DELAY_MS,
      dataLength: data.length
    });
    this.frameData.push(data);
    this.logger.debug({ frame: this.frameData.length - 1, left, top, width, height }, 'Image descriptor');
  }

  protected decodePixels(): Image {
    const info = this.info;
    if (info.frames.length === 0) {
      throw new DecodeError('GIF contains no image data');
    }

    const frames = info.frames.map((frame, index) => this.decodeFrame(frame, index));

    const canvas = new Uint8Array(info.width * info.height * 4);
    const first = frames[0];
    const source = first.pixels.data;
    for (let y = 0; y < first.height; y++) {
      const canvasY = first.top + y;
      if (canvasY >= info.height) break;
      for (let x = 0; x < first.width; x++) {
        const canvasX = first.left + x;
        if (canvasX >= info.width) break;
        const from = (y * first.width + x) * 4;
        const to = (canvasY * info.width + canvasX) * 4;
        canvas[to] = source[from];
        canvas[to + 1] = source[from + 1];
        canvas[to + 2] = source[from + 2];
        canvas[to + 3] = source[from + 3];
      }
    }

    return new Image(info.width, info.height, { format: 'rgba8', data: canvas }, frames);
  }

  private decodeFrame(frame: GifFrameInfo, index: number): ImageFrame {
    const table = frame.localColorTableFlag ? frame.localColorTable : this.info.globalColorTable;
    if (table.length === 0) {
      throw new DecodeError(`Frame ${index} has no colour table`);
    }
    const palette = toPalette(table);
    const pixelCount = frame.width * frame.height;

    const result = decodeLzw(this.frameData[index], frame.lzwMinimumCodeSize, pixelCount);
    if (result.decoded < pixelCount) {
      this.logger.warn({ frame: index, decoded: result.decoded, expected: pixelCount }, 'Frame image data ended early');
    }

    const rows = frame.interlaced ? interlacedRows(frame.height) : undefined;
    const data = new Uint8Array(pixelCount * 4);
    for (let row = 0; row < frame.height; row++) {
      const y = rows ? rows[row] : row;
      for (let x = 0; x < frame.width; x++) {
        const colorIndex = result.indices[row * frame.width + x];
        const out = (y * frame.width + x) * 4;
        if (colorIndex === frame.transparentIndex) {
          continue;
        }
        const [r, g, b] = getSafe(palette, colorIndex);
        data[out] = r;
        data[out + 1] = g;
        data[out + 2] = b;
        data[out + 3] = 255;
      }
    }

    return {
      left: frame.left,
      top: frame.top,
      width: frame.width,
      height: frame.height,
      delayMs: frame.delayMs,
      dispose: toFrameDisposal(frame.disposalMethod),
      blend: 'over',
      pixels: { format: 'rgba8', data }
    };
  }
}

export const gifDecoder: DecoderPlugin = {
  format: 'gif',
  create: (source, options) => new GifDecoder(source, options)
};
