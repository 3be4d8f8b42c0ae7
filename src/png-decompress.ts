import { Inflate } from 'pako';
import { deinterlaceAdam7 } from './adam7.js';
import { DecodeError } from './errors.js';
import { unfilterScanline, getBytesPerPixel } from './png-filter.js';
import type { PngHeader } from './types.js';
import { getSamplesPerPixel } from './utils.js';

/**
 * Inflate a zlib stream that may be split across several chunks
 */
export function inflateChunks(chunks: readonly Uint8Array[]): Uint8Array {
  const parts: Uint8Array[] = [];
  let totalLength = 0;
  const inflator = new Inflate();
  inflator.onData = (chunk) => {
    if (chunk instanceof Uint8Array) {
      parts.push(chunk);
      totalLength += chunk.length;
    }
  };

  if (chunks.length === 0) {
    throw new DecodeError('No compressed data');
  }
  for (let i = 0; i < chunks.length; i++) {
    inflator.push(chunks[i], i === chunks.length - 1);
    if (inflator.err) {
      throw new DecodeError(`Inflate failed: ${inflator.msg}`);
    }
  }

  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * Bytes in one unfiltered row of the given header
 */
export function getScanlineLength(header: PngHeader): number {
  return Math.ceil((header.width * header.bitDepth * getSamplesPerPixel(header.colorType)) / 8);
}

/**
 * Undo per-row filtering of non-interlaced image data
 */
export function unfilterImage(decompressed: Uint8Array, header: PngHeader): Uint8Array {
  const bytesPerPixel = getBytesPerPixel(header.bitDepth, header.colorType);
  const scanlineLength = getScanlineLength(header);
  const unfilteredData = new Uint8Array(header.height * scanlineLength);

  let previousLine: Uint8Array | null = null;
  let srcOffset = 0;
  let dstOffset = 0;

  for (let y = 0; y < header.height; y++) {
    if (srcOffset + 1 + scanlineLength > decompressed.length) {
      throw new DecodeError(`Unexpected end of decompressed data at line ${y}`);
    }

    const filterType = decompressed[srcOffset++];
    const scanline = decompressed.subarray(srcOffset, srcOffset + scanlineLength);
    srcOffset += scanlineLength;

    const unfilteredLine = unfilterScanline(filterType, scanline, previousLine, bytesPerPixel);
    unfilteredData.set(unfilteredLine, dstOffset);
    dstOffset += scanlineLength;

    previousLine = unfilteredLine;
  }

  return unfilteredData;
}

/**
 * Decompress and unfilter PNG image data
 * @param chunks IDAT (or fdAT payload) data in stream order
 * @returns Unfiltered rows, top to bottom, without filter bytes
 */
export function decompressImageData(chunks: readonly Uint8Array[], header: PngHeader): Uint8Array {
  const decompressed = inflateChunks(chunks);
  return header.interlaceMethod === 1
    ? deinterlaceAdam7(decompressed, header)
    : unfilterImage(decompressed, header);
}
