/**
 * Conversion of unfiltered PNG rows into the unified pixel layouts
 */

import { DecodeError } from './errors.js';
import type { PixelData } from './image.js';
import { getSafe } from './safe-access.js';
import { ColorType } from './types.js';
import type { PngHeader, PngTransparency } from './types.js';
import { getSamplesPerPixel, scaleSample } from './utils.js';
import { getScanlineLength } from './png-decompress.js';

type Format8 = 'l8' | 'la8' | 'rgb8' | 'rgba8';
type Format16 = 'l16' | 'la16' | 'rgb16' | 'rgba16';

function layoutFor(channels: number): [Format8, Format16] {
  switch (channels) {
    case 1:
      return ['l8', 'l16'];
    case 2:
      return ['la8', 'la16'];
    case 3:
      return ['rgb8', 'rgb16'];
    case 4:
      return ['rgba8', 'rgba16'];
    default:
      throw new DecodeError(`Unsupported channel count ${channels}`);
  }
}

/**
 * Sample reader over packed rows of 1, 2, 4, 8 or 16 bits
 */
function createSampleReader(raw: Uint8Array, header: PngHeader): (y: number, index: number) => number {
  const rowBytes = getScanlineLength(header);
  const depth = header.bitDepth;
  const mask = (1 << depth) - 1;

  if (depth === 8) {
    return (y, index) => raw[y * rowBytes + index];
  }
  if (depth === 16) {
    return (y, index) => {
      const offset = y * rowBytes + index * 2;
      return (raw[offset] << 8) | raw[offset + 1];
    };
  }
  return (y, index) => {
    const bitOffset = index * depth;
    const byte = raw[y * rowBytes + (bitOffset >> 3)];
    return (byte >> (8 - depth - (bitOffset & 7))) & mask;
  };
}

export interface PngPixelContext {
  palette?: readonly (readonly [number, number, number])[];
  transparency?: PngTransparency;
}

/**
 * Expand unfiltered rows to PixelData. Sub-byte greyscale is scaled to 8
 * bits; palette images become rgb8, or rgba8 when tRNS is present; a
 * greyscale or RGB colour key adds an alpha channel.
 */
export function toPixelData(raw: Uint8Array, header: PngHeader, context: PngPixelContext): PixelData {
  const { width, height, bitDepth, colorType } = header;
  const readSample = createSampleReader(raw, header);
  const pixelCount = width * height;

  if (colorType === ColorType.PALETTE) {
    const palette = context.palette;
    if (!palette) {
      throw new DecodeError('Missing PLTE chunk for indexed image');
    }
    const alpha = context.transparency?.type === 'palette' ? context.transparency.alpha : undefined;
    const channels = alpha ? 4 : 3;
    const data = new Uint8Array(pixelCount * channels);
    let out = 0;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const index = readSample(y, x);
        const [r, g, b] = getSafe(palette, index);
        data[out++] = r;
        data[out++] = g;
        data[out++] = b;
        if (alpha) {
          data[out++] = index < alpha.length ? alpha[index] : 255;
        }
      }
    }
    return alpha ? { format: 'rgba8', data } : { format: 'rgb8', data };
  }

  const samples = getSamplesPerPixel(colorType);
  const key = colorKey(colorType, context.transparency);
  const channels = samples + (key ? 1 : 0);
  const wide = bitDepth === 16;
  const sampleMax = (1 << bitDepth) - 1;
  const outMax = wide ? 0xffff : 0xff;
  const [format8, format16] = layoutFor(channels);

  const fill = (data: Uint8Array | Uint16Array): void => {
    let out = 0;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const base = x * samples;
        let keyed = key !== undefined;
        for (let c = 0; c < samples; c++) {
          const value = readSample(y, base + c);
          if (key && value !== key[c]) {
            keyed = false;
          }
          data[out++] = scaleSample(value, sampleMax, outMax);
        }
        if (key) {
          data[out++] = keyed ? 0 : outMax;
        }
      }
    }
  };

  if (wide) {
    const data = new Uint16Array(pixelCount * channels);
    fill(data);
    return { format: format16, data };
  }
  const data = new Uint8Array(pixelCount * channels);
  fill(data);
  return { format: format8, data };
}

function colorKey(colorType: number, transparency: PngTransparency | undefined): number[] | undefined {
  if (!transparency) {
    return undefined;
  }
  if (colorType === ColorType.GRAYSCALE && transparency.type === 'gray') {
    return [transparency.gray];
  }
  if (colorType === ColorType.RGB && transparency.type === 'rgb') {
    return [transparency.red, transparency.green, transparency.blue];
  }
  return undefined;
}
