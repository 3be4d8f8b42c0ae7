/**
 * PNG assembly for tests: chunks are serialized by hand, image data is
 * filtered and compressed with pako.
 */

import { deflate } from 'pako';
import { ADAM7_PASSES, getPassDimensions } from '../adam7.js';
import { FilterType, filterScanline, getBytesPerPixel } from '../png-filter.js';
import { PngParser } from '../png-parser.js';
import { ColorType } from '../types.js';
import type { PngChunk, PngHeader } from '../types.js';
import { PNG_SIGNATURE, getSamplesPerPixel, stringToBytes, writeUInt32BE } from '../utils.js';

/**
 * Create a PNG chunk with a correct CRC
 */
export function createChunk(type: string, data: Uint8Array): PngChunk {
  if (type.length !== 4) {
    throw new Error('Chunk type must be exactly 4 characters');
  }
  return { length: data.length, type, data, crc: PngParser.computeCrc({ type, data }) };
}

/**
 * Serialize a chunk to bytes
 */
export function serializeChunk(chunk: PngChunk): Uint8Array {
  const buffer = new Uint8Array(12 + chunk.data.length);
  writeUInt32BE(buffer, chunk.length, 0);
  buffer.set(stringToBytes(chunk.type), 4);
  buffer.set(chunk.data, 8);
  writeUInt32BE(buffer, chunk.crc, 8 + chunk.data.length);
  return buffer;
}

export function createIHDR(header: PngHeader): PngChunk {
  const data = new Uint8Array(13);
  writeUInt32BE(data, header.width, 0);
  writeUInt32BE(data, header.height, 4);
  data[8] = header.bitDepth;
  data[9] = header.colorType;
  data[10] = header.compressionMethod;
  data[11] = header.filterMethod;
  data[12] = header.interlaceMethod;
  return createChunk('IHDR', data);
}

export function createIEND(): PngChunk {
  return createChunk('IEND', new Uint8Array(0));
}

/**
 * Build a complete PNG file from chunks
 */
export function buildPng(chunks: PngChunk[]): Uint8Array {
  const parts = chunks.map(serializeChunk);
  const buffer = new Uint8Array(8 + parts.reduce((sum, part) => sum + part.length, 0));
  buffer.set(PNG_SIGNATURE, 0);
  let offset = 8;
  for (const part of parts) {
    buffer.set(part, offset);
    offset += part.length;
  }
  return buffer;
}

export function createHeader(
  width: number,
  height: number,
  colorType: ColorType,
  bitDepth = 8,
  interlaceMethod = 0
): PngHeader {
  return { width, height, bitDepth, colorType, compressionMethod: 0, filterMethod: 0, interlaceMethod };
}

function rowLength(width: number, header: PngHeader): number {
  return Math.ceil((width * header.bitDepth * getSamplesPerPixel(header.colorType)) / 8);
}

function filterRows(raw: Uint8Array, width: number, height: number, header: PngHeader, filter: FilterType): Uint8Array {
  const length = rowLength(width, header);
  const bpp = getBytesPerPixel(header.bitDepth, header.colorType);
  const output = new Uint8Array(height * (length + 1));
  let previous: Uint8Array | null = null;
  for (let y = 0; y < height; y++) {
    const row = raw.subarray(y * length, (y + 1) * length);
    output[y * (length + 1)] = filter;
    output.set(filterScanline(filter, row, previous, bpp), y * (length + 1) + 1);
    previous = row;
  }
  return output;
}

/**
 * Filter and compress packed, unfiltered rows. Interlaced headers are split
 * into Adam7 passes, which needs whole-byte pixels.
 */
export function compressImage(raw: Uint8Array, header: PngHeader, filter = FilterType.None): Uint8Array {
  if (header.interlaceMethod !== 1) {
    return deflate(filterRows(raw, header.width, header.height, header, filter));
  }

  const bpp = getBytesPerPixel(header.bitDepth, header.colorType);
  if (header.bitDepth < 8) {
    throw new Error('Interlaced fixtures need a bit depth of at least 8');
  }
  const parts: Uint8Array[] = [];
  for (const pass of ADAM7_PASSES) {
    const { width, height } = getPassDimensions(header.width, header.height, pass);
    if (width === 0 || height === 0) {
      continue;
    }
    const passRaw = new Uint8Array(width * height * bpp);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const srcX = pass.xStart + x * pass.xStep;
        const srcY = pass.yStart + y * pass.yStep;
        const src = (srcY * header.width + srcX) * bpp;
        passRaw.set(raw.subarray(src, src + bpp), (y * width + x) * bpp);
      }
    }
    parts.push(filterRows(passRaw, width, height, header, filter));
  }
  const joined = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    joined.set(part, offset);
    offset += part.length;
  }
  return deflate(joined);
}

export interface PngFixtureOptions {
  filter?: FilterType;
  /** Chunks placed between IHDR and IDAT */
  before?: PngChunk[];
  /** Chunks placed between IDAT and IEND */
  after?: PngChunk[];
  /** Split the compressed data over this many IDAT chunks */
  idatCount?: number;
}

/**
 * Encode raw rows as a PNG file
 */
export function encodePng(raw: Uint8Array, header: PngHeader, options: PngFixtureOptions = {}): Uint8Array {
  const compressed = compressImage(raw, header, options.filter);
  const count = Math.max(1, options.idatCount ?? 1);
  const size = Math.ceil(compressed.length / count);
  const idats: PngChunk[] = [];
  for (let offset = 0; offset < compressed.length; offset += size) {
    idats.push(createChunk('IDAT', compressed.subarray(offset, offset + size)));
  }
  return buildPng([createIHDR(header), ...(options.before ?? []), ...idats, ...(options.after ?? []), createIEND()]);
}

/**
 * Solid-colour 8-bit RGBA PNG
 */
export function createSolidPng(width: number, height: number, color: ArrayLike<number>): Uint8Array {
  const raw = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    raw.set([color[0], color[1], color[2], color[3]], i * 4);
  }
  return encodePng(raw, createHeader(width, height, ColorType.RGBA));
}
