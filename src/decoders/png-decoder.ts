/**
 * PNG decoder, including APNG frame data
 *
 * readHeader walks the whole chunk stream, which is cheap: it collects the
 * compressed image data and every metadata chunk without inflating pixels.
 */

import type { ByteSource } from '../byte-source.js';
import { DecodeError, IoError } from '../errors.js';
import { Image } from '../image.js';
import type { FrameBlend, FrameDisposal, ImageFrame } from '../image.js';
import {
  parseAnimationControl,
  parseBackground,
  parseChromaticities,
  parseCompressedText,
  parseFrameControl,
  parseGamma,
  parseHistogram,
  parseIccProfile,
  parseInternationalText,
  parsePalette,
  parsePhysicalDimensions,
  parseRenderingIntent,
  parseSignificantBits,
  parseSuggestedPalette,
  parseText,
  parseTime,
  parseTransparency
} from '../png-chunks.js';
import { decompressImageData } from '../png-decompress.js';
import { PngParser } from '../png-parser.js';
import { toPixelData } from '../png-pixels.js';
import { ColorType, createPngInfo } from '../types.js';
import type { PngChunk, PngHeader, PngInfo } from '../types.js';
import { BaseDecoder } from './base-decoder.js';
import type { DecoderOptions, DecoderPlugin } from './types.js';

const VALID_BIT_DEPTHS: ReadonlyMap<number, readonly number[]> = new Map([
  [ColorType.GRAYSCALE, [1, 2, 4, 8, 16]],
  [ColorType.RGB, [8, 16]],
  [ColorType.PALETTE, [1, 2, 4, 8]],
  [ColorType.GRAYSCALE_ALPHA, [8, 16]],
  [ColorType.RGBA, [8, 16]]
]);

const DISPOSE_OPS: readonly FrameDisposal[] = ['none', 'background', 'previous'];
const BLEND_OPS: readonly FrameBlend[] = ['source', 'over'];

function validateHeader(header: PngHeader): void {
  const depths = VALID_BIT_DEPTHS.get(header.colorType);
  if (!depths) {
    throw new DecodeError(`Invalid color type ${header.colorType}`);
  }
  if (!depths.includes(header.bitDepth)) {
    throw new DecodeError(`Invalid bit depth ${header.bitDepth} for color type ${header.colorType}`);
  }
  if (header.compressionMethod !== 0) {
    throw new DecodeError(`Unknown compression method ${header.compressionMethod}`);
  }
  if (header.filterMethod !== 0) {
    throw new DecodeError(`Unknown filter method ${header.filterMethod}`);
  }
  if (header.interlaceMethod !== 0 && header.interlaceMethod !== 1) {
    throw new DecodeError(`Unknown interlace method ${header.interlaceMethod}`);
  }
}

export class PngDecoder extends BaseDecoder<PngInfo> {
  readonly format = 'png' as const;

  private header?: PngHeader;
  private readonly imageData: Uint8Array[] = [];
  /** Compressed data per fcTL entry, parallel to info.frames */
  private readonly frameData: Uint8Array[][] = [];
  /** Index of the fcTL that describes the IDAT image, if any */
  private defaultFrame?: number;
  private seenImageData = false;

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, createPngInfo(), options, 'png');
  }

  protected parseHeader(): void {
    const parser = new PngParser(this.reader);
    const verifyCrc = this.options.png?.verifyCrc ?? true;

    let chunk: PngChunk | null;
    while ((chunk = parser.readChunk()) !== null) {
      if (!this.header && chunk.type !== 'IHDR') {
        throw new DecodeError(`${chunk.type} chunk encountered before IHDR`);
      }
      if (verifyCrc && !PngParser.hasValidCrc(chunk)) {
        if (PngParser.isCritical(chunk.type)) {
          throw new DecodeError(`CRC mismatch for chunk ${chunk.type}`);
        }
        this.logger.warn({ chunk: chunk.type }, 'CRC mismatch in ancillary chunk, skipping');
        continue;
      }
      if (chunk.type === 'IEND') {
        return;
      }
      this.processChunk(chunk);
    }
    if (!this.header) {
      throw new DecodeError('Missing IHDR chunk');
    }
    this.logger.warn('Missing IEND chunk');
  }

  private requireHeader(): PngHeader {
    if (!this.header) {
      throw new DecodeError('Missing IHDR chunk');
    }
    return this.header;
  }

  private processChunk(chunk: PngChunk): void {
    this.logger.debug({ chunk: chunk.type, length: chunk.length }, 'Chunk');
    try {
      this.applyChunk(chunk);
    } catch (err) {
      if (err instanceof IoError) {
        throw new DecodeError(`Malformed ${chunk.type} chunk`, { cause: err });
      }
      throw err;
    }
  }

  private applyChunk(chunk: PngChunk): void {
    const { type, data } = chunk;
    const info = this.info;

    switch (type) {
      case 'IHDR': {
        if (this.header) {
          throw new DecodeError('Duplicate IHDR chunk');
        }
        const header = PngParser.parseHeader(chunk);
        this.checkDimensions(header.width, header.height);
        validateHeader(header);
        this.header = header;
        Object.assign(info, {
          width: header.width,
          height: header.height,
          bitDepth: header.bitDepth,
          colorType: header.colorType,
          compressionMethod: header.compressionMethod,
          filterMethod: header.filterMethod,
          interlaced: header.interlaceMethod === 1
        });
        return;
      }
      case 'PLTE': {
        const colorType = this.requireHeader().colorType;
        if (colorType === ColorType.GRAYSCALE || colorType === ColorType.GRAYSCALE_ALPHA) {
          this.logger.warn('Ignoring PLTE chunk in greyscale image');
          return;
        }
        const palette = parsePalette(data);
        if (colorType === ColorType.PALETTE && palette.length > 1 << this.requireHeader().bitDepth) {
          throw new DecodeError(`Palette has ${palette.length} entries for bit depth ${this.requireHeader().bitDepth}`);
        }
        info.palette = palette;
        return;
      }
      case 'IDAT':
        this.seenImageData = true;
        this.imageData.push(data);
        if (this.defaultFrame !== undefined) {
          this.frameData[this.defaultFrame].push(data);
          info.frames[this.defaultFrame].dataLength += data.length;
        }
        return;
      case 'tRNS':
        info.transparency = parseTransparency(data, this.requireHeader().colorType, info.palette?.length ?? 0);
        return;
      case 'bKGD':
        info.background = parseBackground(data, this.requireHeader().colorType);
        return;
      case 'gAMA':
        info.gamma = parseGamma(data);
        return;
      case 'cHRM':
        info.chromaticities = parseChromaticities(data);
        return;
      case 'sRGB':
        info.renderingIntent = parseRenderingIntent(data);
        return;
      case 'iCCP':
        info.iccProfile = parseIccProfile(data);
        return;
      case 'pHYs':
        info.physicalDimensions = parsePhysicalDimensions(data);
        return;
      case 'sBIT':
        info.significantBits = parseSignificantBits(data);
        return;
      case 'hIST':
        info.histogram = parseHistogram(data);
        return;
      case 'tIME':
        info.modificationTime = parseTime(data);
        return;
      case 'sPLT':
        info.suggestedPalettes.push(parseSuggestedPalette(data));
        return;
      case 'tEXt':
        info.textChunks.push(parseText(data));
        return;
      case 'zTXt':
        info.textChunks.push(parseCompressedText(data));
        return;
      case 'iTXt':
        info.textChunks.push(parseInternationalText(data));
        return;
      case 'acTL':
        info.animationControl = parseAnimationControl(data);
        return;
      case 'fcTL': {
        const control = parseFrameControl(data);
        if (!this.seenImageData) {
          this.defaultFrame = info.frames.length;
        }
        info.frames.push(control);
        this.frameData.push([]);
        return;
      }
      case 'fdAT': {
        const current = info.frames.length - 1;
        if (current < 0 || current === this.defaultFrame) {
          throw new DecodeError('fdAT chunk without a preceding fcTL');
        }
        if (data.length < 4) {
          throw new DecodeError('fdAT chunk is truncated');
        }
        const payload = data.subarray(4);
        this.frameData[current].push(payload);
        info.frames[current].dataLength += payload.length;
        return;
      }
      default:
        this.logger.debug({ chunk: type }, 'Skipping unknown chunk');
    }
  }

  protected decodePixels(): Image {
    const header = this.requireHeader();
    if (this.imageData.length === 0) {
      throw new DecodeError('No IDAT chunks found in PNG');
    }
    const context = { palette: this.info.palette, transparency: this.info.transparency };
    const pixels = toPixelData(decompressImageData(this.imageData, header), header, context);

    const frames = this.info.frames.map((control, index): ImageFrame => {
      if (control.width === 0 || control.height === 0) {
        throw new DecodeError(`Frame ${index} has empty dimensions`);
      }
      if (control.xOffset + control.width > header.width || control.yOffset + control.height > header.height) {
        throw new DecodeError(`Frame ${index} lies outside the canvas`);
      }
      let framePixels = pixels;
      if (index !== this.defaultFrame) {
        const frameHeader = { ...header, width: control.width, height: control.height };
        framePixels = toPixelData(decompressImageData(this.frameData[index], frameHeader), frameHeader, context);
      } else if (control.width !== header.width || control.height !== header.height) {
        throw new DecodeError('Default image frame must cover the canvas');
      }
      return {
        left: control.xOffset,
        top: control.yOffset,
        width: control.width,
        height: control.height,
        delayMs: Math.round((control.delayNum * 1000) / (control.delayDen === 0 ? 100 : control.delayDen)),
        dispose: DISPOSE_OPS[control.disposeOp] ?? 'none',
        blend: BLEND_OPS[control.blendOp] ?? 'source',
        pixels: framePixels
      };
    });

    return new Image(header.width, header.height, pixels, frames);
  }
}

export const pngDecoder: DecoderPlugin = {
  format: 'png',
  create: (source, options) => new PngDecoder(source, options)
};
