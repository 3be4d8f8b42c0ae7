/**
 * Adam7 deinterlacing
 */

import { DecodeError } from './errors.js';
import { unfilterScanline, getBytesPerPixel } from './png-filter.js';
import type { PngHeader } from './types.js';
import { getSamplesPerPixel } from './utils.js';

export interface Adam7Pass {
  xStart: number;
  yStart: number;
  xStep: number;
  yStep: number;
}

function pass(xStart: number, yStart: number, xStep: number, yStep: number): Adam7Pass {
  return { xStart, yStart, xStep, yStep };
}

export const ADAM7_PASSES: readonly Adam7Pass[] = [
  pass(0, 0, 8, 8),
  pass(4, 0, 8, 8),
  pass(0, 4, 4, 8),
  pass(2, 0, 4, 4),
  pass(0, 2, 2, 4),
  pass(1, 0, 2, 2),
  pass(0, 1, 1, 2),
];

/**
 * Size of the reduced image a pass carries; either side may be zero
 */
export function getPassDimensions(width: number, height: number, p: Adam7Pass): { width: number; height: number } {
  return {
    width: width > p.xStart ? Math.ceil((width - p.xStart) / p.xStep) : 0,
    height: height > p.yStart ? Math.ceil((height - p.yStart) / p.yStep) : 0,
  };
}

function rowBytes(width: number, header: PngHeader): number {
  return Math.ceil((width * header.bitDepth * getSamplesPerPixel(header.colorType)) / 8);
}

/**
 * Copies pixel `from` of a reduced row into pixel `to` of a full row.
 * Packed depths move a single sample; wider depths move whole pixels.
 */
type PixelCopier = (src: Uint8Array, from: number, dst: Uint8Array, rowStart: number, to: number) => void;

function createCopier(header: PngHeader): PixelCopier {
  const depth = header.bitDepth;
  if (depth >= 8) {
    const bpp = getBytesPerPixel(depth, header.colorType);
    return (src, from, dst, rowStart, to) => {
      dst.set(src.subarray(from * bpp, from * bpp + bpp), rowStart + to * bpp);
    };
  }

  const perByte = 8 / depth;
  const mask = (1 << depth) - 1;
  return (src, from, dst, rowStart, to) => {
    const value = (src[Math.floor(from / perByte)] >> ((perByte - 1 - (from % perByte)) * depth)) & mask;
    const target = rowStart + Math.floor(to / perByte);
    const shift = (perByte - 1 - (to % perByte)) * depth;
    dst[target] = (dst[target] & ~(mask << shift)) | (value << shift);
  };
}

/**
 * Unfilter the seven passes in `decompressed` and scatter them into
 * row-major scanlines without filter bytes
 */
export function deinterlaceAdam7(decompressed: Uint8Array, header: PngHeader): Uint8Array {
  const bpp = getBytesPerPixel(header.bitDepth, header.colorType);
  const stride = rowBytes(header.width, header);
  const output = new Uint8Array(stride * header.height);
  const copy = createCopier(header);

  let offset = 0;
  ADAM7_PASSES.forEach((p, index) => {
    const size = getPassDimensions(header.width, header.height, p);
    if (size.width === 0 || size.height === 0) {
      return;
    }

    const length = rowBytes(size.width, header);
    let previous: Uint8Array | null = null;
    for (let row = 0; row < size.height; row++) {
      if (offset + 1 + length > decompressed.length) {
        throw new DecodeError(`Unexpected end of decompressed data at pass ${index + 1}, line ${row}`);
      }
      const filterType = decompressed[offset];
      const line = unfilterScanline(filterType, decompressed.subarray(offset + 1, offset + 1 + length), previous, bpp);
      offset += 1 + length;
      previous = line;

      const rowStart = (p.yStart + row * p.yStep) * stride;
      for (let col = 0; col < size.width; col++) {
        copy(line, col, output, rowStart, p.xStart + col * p.xStep);
      }
    }
  });

  return output;
}
