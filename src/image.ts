/**
 * Unified decoded image model
 */

import { DecodeError, InvalidDimensionsError } from './errors.js';

export type PixelFormat =
  | 'l1'
  | 'l8'
  | 'l16'
  | 'la8'
  | 'la16'
  | 'rgb8'
  | 'rgba8'
  | 'rgb16'
  | 'rgba16'
  | 'rgb32f';

/**
 * Pixel buffer tagged with its layout. `l1` holds one 0/1 sample per pixel
 * (1 is white); 16-bit layouts use native-order Uint16Array samples;
 * `rgb32f` holds linear radiance where 1.0 is full scale.
 */
export type PixelData =
  | { format: 'l1' | 'l8' | 'la8' | 'rgb8' | 'rgba8'; data: Uint8Array }
  | { format: 'l16' | 'la16' | 'rgb16' | 'rgba16'; data: Uint16Array }
  | { format: 'rgb32f'; data: Float32Array };

export type FrameDisposal = 'none' | 'background' | 'previous';
export type FrameBlend = 'source' | 'over';

/**
 * One frame of an animated image, covering only its own region
 */
export interface ImageFrame {
  left: number;
  top: number;
  width: number;
  height: number;
  delayMs: number;
  dispose: FrameDisposal;
  blend: FrameBlend;
  pixels: PixelData;
}

const CHANNELS: Record<PixelFormat, number> = {
  l1: 1,
  l8: 1,
  l16: 1,
  la8: 2,
  la16: 2,
  rgb8: 3,
  rgba8: 4,
  rgb16: 3,
  rgba16: 4,
  rgb32f: 3,
};

export function getChannelCount(format: PixelFormat): number {
  return CHANNELS[format];
}

export function formatHasAlpha(format: PixelFormat): boolean {
  return format === 'la8' || format === 'la16' || format === 'rgba8' || format === 'rgba16';
}

/**
 * Check that a pixel buffer matches its declared dimensions
 */
export function validatePixels(width: number, height: number, pixels: PixelData): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidDimensionsError(width, height);
  }
  const expected = width * height * CHANNELS[pixels.format];
  if (pixels.data.length !== expected) {
    throw new DecodeError(
      `Pixel buffer holds ${pixels.data.length} samples, expected ${expected} for ${width}x${height} ${pixels.format}`
    );
  }
}

/**
 * Sample accessor normalised to 8 bits
 */
function sampleReader(pixels: PixelData): (index: number) => number {
  switch (pixels.format) {
    case 'l1': {
      const data = pixels.data;
      return (index) => (data[index] ? 255 : 0);
    }
    case 'l16':
    case 'la16':
    case 'rgb16':
    case 'rgba16': {
      const data = pixels.data;
      return (index) => Math.round(data[index] / 257);
    }
    case 'rgb32f': {
      const data = pixels.data;
      return (index) => Math.round(Math.min(Math.max(data[index], 0), 1) * 255);
    }
    default: {
      const data = pixels.data;
      return (index) => data[index];
    }
  }
}

/**
 * Convert any pixel layout to packed 8-bit RGB or RGBA
 */
export function convertPixels(pixels: PixelData, pixelCount: number, withAlpha: boolean): Uint8Array {
  const channels = CHANNELS[pixels.format];
  const outChannels = withAlpha ? 4 : 3;
  const read = sampleReader(pixels);
  const output = new Uint8Array(pixelCount * outChannels);
  const colour = channels >= 3;
  const alphaIndex = formatHasAlpha(pixels.format) ? channels - 1 : -1;

  for (let i = 0; i < pixelCount; i++) {
    const src = i * channels;
    const dst = i * outChannels;
    if (colour) {
      output[dst] = read(src);
      output[dst + 1] = read(src + 1);
      output[dst + 2] = read(src + 2);
    } else {
      const grey = read(src);
      output[dst] = grey;
      output[dst + 1] = grey;
      output[dst + 2] = grey;
    }
    if (withAlpha) {
      output[dst + 3] = alphaIndex >= 0 ? read(src + alphaIndex) : 255;
    }
  }

  return output;
}

export class Image {
  readonly width: number;
  readonly height: number;
  readonly pixels: PixelData;
  readonly frames: readonly ImageFrame[];
  private rgb8?: Uint8Array;
  private rgba8?: Uint8Array;

  constructor(width: number, height: number, pixels: PixelData, frames: readonly ImageFrame[] = []) {
    validatePixels(width, height, pixels);
    this.width = width;
    this.height = height;
    this.pixels = pixels;
    this.frames = frames;
  }

  get pixelFormat(): PixelFormat {
    return this.pixels.format;
  }

  get channels(): number {
    return CHANNELS[this.pixels.format];
  }

  get hasAlpha(): boolean {
    return formatHasAlpha(this.pixels.format);
  }

  get bitDepth(): 1 | 8 | 16 | 32 {
    switch (this.pixels.format) {
      case 'l1':
        return 1;
      case 'rgb32f':
        return 32;
      case 'l16':
      case 'la16':
      case 'rgb16':
      case 'rgba16':
        return 16;
      default:
        return 8;
    }
  }

  /**
   * Packed row-major RGB triples. The conversion runs once; every call
   * returns its own copy.
   */
  asRgb8(): Uint8Array {
    if (!this.rgb8) {
      this.rgb8 = convertPixels(this.pixels, this.width * this.height, false);
    }
    return this.rgb8.slice();
  }

  /**
   * Packed row-major RGBA quadruples, opaque when the source has no alpha.
   * Cached like asRgb8; every call returns its own copy.
   */
  asRgba8(): Uint8Array {
    if (!this.rgba8) {
      this.rgba8 = convertPixels(this.pixels, this.width * this.height, true);
    }
    return this.rgba8.slice();
  }
}
