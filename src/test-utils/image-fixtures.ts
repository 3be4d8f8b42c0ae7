/**
 * Test Image Fixture Utilities
 *
 * Creates small images in every supported format for testing.
 */

import { PNG } from 'pngjs';
import { ColorType } from '../types.js';
import type { ImageFormat } from '../decoders/types.js';
import { stringToBytes, writeUInt16LE, writeUInt32LE } from '../utils.js';
import { createHeader, encodePng } from './png-builder.js';

/**
 * Packed RGBA gradient: red rises left to right, blue top to bottom
 */
export function createGradientRgba(width: number, height: number): Uint8Array {
  const pixels = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      pixels[i] = Math.floor((x / width) * 255);
      pixels[i + 1] = 64;
      pixels[i + 2] = Math.floor((y / height) * 255);
      pixels[i + 3] = 255;
    }
  }
  return pixels;
}

/**
 * Create a simple solid-color PNG for testing
 */
export function createTestPng(width: number, height: number, color: ArrayLike<number>): Uint8Array {
  const pixels = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    pixels.set([color[0], color[1], color[2], color[3]], i * 4);
  }
  return encodePng(pixels, createHeader(width, height, ColorType.RGBA));
}

/**
 * Encode RGBA pixels with pngjs
 */
export function createPngjsImage(width: number, height: number, rgba: Uint8Array): Uint8Array {
  const png = new PNG({ width, height });
  png.data.set(rgba);
  return new Uint8Array(PNG.sync.write(png));
}

/**
 * Encode RGBA pixels as a baseline JPEG with jpeg-js
 */
export async function createTestJpeg(width: number, height: number, rgba: Uint8Array, quality = 90): Promise<Uint8Array> {
  const jpegJs = await import('jpeg-js');
  const encoded = jpegJs.encode({ data: rgba, width, height }, quality);
  return new Uint8Array(encoded.data);
}

/**
 * Decode a JPEG with jpeg-js for cross-checking, as packed RGBA
 */
export async function decodeWithJpegJs(data: Uint8Array): Promise<{ width: number; height: number; data: Uint8Array }> {
  const jpegJs = await import('jpeg-js');
  const decoded = jpegJs.decode(data, { useTArray: true, formatAsRGBA: true });
  return { width: decoded.width, height: decoded.height, data: decoded.data };
}

export interface BmpFixtureOptions {
  bitsPerPixel?: 24 | 32;
  topDown?: boolean;
}

/**
 * Uncompressed BMP with a 40-byte info header from packed RGB pixels
 */
export function createTestBmp(width: number, height: number, rgb: Uint8Array, options: BmpFixtureOptions = {}): Uint8Array {
  const bitsPerPixel = options.bitsPerPixel ?? 24;
  const bytesPerPixel = bitsPerPixel / 8;
  const rowSize = Math.ceil((width * bytesPerPixel) / 4) * 4;
  const offset = 54;
  const out = new Uint8Array(offset + rowSize * height);

  out.set(stringToBytes('BM'), 0);
  writeUInt32LE(out, out.length, 2);
  writeUInt32LE(out, offset, 10);
  writeUInt32LE(out, 40, 14);
  writeUInt32LE(out, width, 18);
  writeUInt32LE(out, options.topDown ? -height >>> 0 : height, 22);
  writeUInt16LE(out, 1, 26);
  writeUInt16LE(out, bitsPerPixel, 28);
  writeUInt32LE(out, rowSize * height, 34);

  for (let y = 0; y < height; y++) {
    const fileRow = options.topDown ? y : height - 1 - y;
    for (let x = 0; x < width; x++) {
      const src = (y * width + x) * 3;
      const dst = offset + fileRow * rowSize + x * bytesPerPixel;
      out[dst] = rgb[src + 2];
      out[dst + 1] = rgb[src + 1];
      out[dst + 2] = rgb[src];
    }
  }
  return out;
}

/**
 * Netpbm file from a text header and optional binary raster
 */
export function createNetpbm(header: string, raster: ArrayLike<number> = []): Uint8Array {
  const head = stringToBytes(header);
  const out = new Uint8Array(head.length + raster.length);
  out.set(head, 0);
  out.set(Array.from(raster), head.length);
  return out;
}

/**
 * Lossless WebP header (VP8L) declaring the given size
 */
export function createWebpLossless(width: number, height: number, alpha = false): Uint8Array {
  const out = new Uint8Array(30);
  out.set(stringToBytes('RIFF'), 0);
  writeUInt32LE(out, out.length - 8, 4);
  out.set(stringToBytes('WEBPVP8L'), 8);
  writeUInt32LE(out, 10, 16);
  out[20] = 0x2f;
  writeUInt32LE(out, (width - 1) | ((height - 1) << 14) | ((alpha ? 1 : 0) << 28), 21);
  return out;
}

/**
 * AVIF ftyp box with major brand avif
 */
export function createAvifHeader(): Uint8Array {
  return new Uint8Array([
    0x00, 0x00, 0x00, 0x18, // box size (24 bytes)
    ...stringToBytes('ftyp'),
    ...stringToBytes('avif'), // major brand
    0x00, 0x00, 0x00, 0x00, // minor version
    ...stringToBytes('mif1'),
    ...stringToBytes('miaf')
  ]);
}

export interface TgaFixture {
  imageType: number;
  width: number;
  height: number;
  pixelDepth: number;
  descriptor?: number;
  imageId?: string;
  /** Raw colour map entries of `depth` bits each */
  colorMap?: { origin?: number; depth: number; entries: ArrayLike<number> };
  /** Pixel data exactly as stored, RLE packets included */
  data: ArrayLike<number>;
  footer?: { extensionOffset: number; developerOffset: number };
}

/**
 * Assemble a TGA file around hand-written pixel data
 */
export function createTga(fixture: TgaFixture): Uint8Array {
  const imageId = stringToBytes(fixture.imageId ?? '');
  const map = fixture.colorMap;
  const entrySize = map ? Math.ceil(map.depth / 8) : 0;
  const header = new Uint8Array(18);
  header[0] = imageId.length;
  header[1] = map ? 1 : 0;
  header[2] = fixture.imageType;
  if (map) {
    writeUInt16LE(header, map.origin ?? 0, 3);
    writeUInt16LE(header, map.entries.length / entrySize, 5);
    header[7] = map.depth;
  }
  writeUInt16LE(header, fixture.width, 12);
  writeUInt16LE(header, fixture.height, 14);
  header[16] = fixture.pixelDepth;
  header[17] = fixture.descriptor ?? 0;

  const parts: number[] = [...header, ...imageId, ...Array.from(map?.entries ?? []), ...Array.from(fixture.data)];
  if (fixture.footer) {
    const footer = new Uint8Array(26);
    writeUInt32LE(footer, fixture.footer.extensionOffset, 0);
    writeUInt32LE(footer, fixture.footer.developerOffset, 4);
    footer.set(stringToBytes('TRUEVISION-XFILE.\0'), 8);
    parts.push(...footer);
  }
  return new Uint8Array(parts);
}

/**
 * Radiance HDR file: header text (ending in the resolution line) then raw
 * scanline bytes
 */
export function createHdr(header: string, scanlines: ArrayLike<number> = []): Uint8Array {
  return new Uint8Array([...stringToBytes(header), ...Array.from(scanlines)]);
}

/**
 * Create test image bytes with specific magic bytes for format detection testing
 */
export function createMagicBytesTest(format: Exclude<ImageFormat, 'unknown'>): Uint8Array {
  const padding = new Array<number>(24).fill(0);
  switch (format) {
    case 'png':
      return new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, ...padding]);
    case 'jpeg':
      return new Uint8Array([0xff, 0xd8, 0xff, 0xe0, ...padding]);
    case 'gif':
      return new Uint8Array([...stringToBytes('GIF89a'), ...padding]);
    case 'bmp':
      return new Uint8Array([...stringToBytes('BM'), ...padding]);
    case 'netpbm':
      return new Uint8Array([...stringToBytes('P6\n1 1\n255\n'), 0, 0, 0]);
    case 'webp':
      return createWebpLossless(1, 1);
    case 'avif':
      return createAvifHeader();
    case 'tga':
      return createTga({ imageType: 2, width: 1, height: 1, pixelDepth: 24, data: [0, 0, 0] });
    case 'hdr':
      return createHdr('#?RADIANCE\nFORMAT=32-bit_rle_rgbe\n\n-Y 1 +X 1\n', [0, 0, 0, 0]);
  }
}
