/**
 * Sample reconstruction, chroma upsampling and colour conversion for JPEG
 */

import type { Logger } from 'pino';
import type { PixelData } from './image.js';
import { dequantizeBlock, idctBlock } from './jpeg-idct.js';
import type { JpegFrame } from './jpeg-types.js';
import { getKeySafe } from './safe-access.js';
import { scaleSample } from './utils.js';

/**
 * Reconstructed samples of one component at its own resolution
 */
export interface ComponentPlane {
  stride: number;
  rows: number;
  h: number;
  v: number;
  data: Uint16Array;
}

function clamp(value: number, max: number): number {
  return value < 0 ? 0 : value > max ? max : value;
}

/**
 * Dequantize and inverse-transform every block of every component
 */
export function reconstructDctPlanes(frame: JpegFrame, quantizationTables: ReadonlyMap<number, number[]>): ComponentPlane[] {
  const center = 1 << (frame.precision - 1);
  const max = (1 << frame.precision) - 1;
  const dequantized = new Float32Array(64);
  const spatial = new Float32Array(64);

  return frame.components.map((component) => {
    const table = getKeySafe(quantizationTables, component.quantizationTableId, 'quantization tables');
    const stride = component.blocksPerLine * 8;
    const rows = component.blocksPerColumn * 8;
    const data = new Uint16Array(stride * rows);

    for (let blockRow = 0; blockRow < component.blocksPerColumn; blockRow++) {
      for (let blockCol = 0; blockCol < component.blocksPerLine; blockCol++) {
        const offset = (blockRow * component.blocksPerLineForMcu + blockCol) * 64;
        dequantizeBlock(component.coefficients, table, dequantized, offset);
        idctBlock(dequantized, spatial);
        const origin = blockRow * 8 * stride + blockCol * 8;
        for (let y = 0; y < 8; y++) {
          for (let x = 0; x < 8; x++) {
            data[origin + y * stride + x] = clamp(Math.round(spatial[y * 8 + x] + center), max);
          }
        }
      }
    }

    return { stride, rows, h: component.h, v: component.v, data };
  });
}

/**
 * Lossless scans already hold samples; apply the point transform
 */
export function losslessPlanes(frame: JpegFrame, pointTransform: number): ComponentPlane[] {
  const max = (1 << frame.precision) - 1;
  return frame.components.map((component) => {
    const stride = component.blocksPerLineForMcu;
    const rows = component.blocksPerColumnForMcu;
    const data = new Uint16Array(stride * rows);
    for (let i = 0; i < data.length; i++) {
      data[i] = clamp(component.coefficients[i] * (1 << pointTransform), max);
    }
    return { stride, rows, h: component.h, v: component.v, data };
  });
}

export interface ColorConversionOptions {
  /** Force (true) or suppress (false) the YCbCr/YCCK transform */
  colorTransform?: boolean;
  /** Adobe APP14 transform flag when present */
  adobeTransform?: number;
  /** Component identifiers from the frame header */
  componentIds: number[];
}

function shouldTransform(componentCount: number, options: ColorConversionOptions): boolean {
  if (options.colorTransform !== undefined) {
    return options.colorTransform;
  }
  if (options.adobeTransform !== undefined) {
    return options.adobeTransform !== 0;
  }
  if (componentCount === 3) {
    // Components labelled 'R', 'G', 'B' carry RGB directly.
    const [r, g, b] = options.componentIds;
    return !(r === 0x52 && g === 0x47 && b === 0x42);
  }
  return false;
}

/**
 * Upsample every plane to the frame size and convert to the output layout
 */
export function assemblePixels(
  frame: JpegFrame,
  planes: ComponentPlane[],
  options: ColorConversionOptions,
  logger: Logger
): PixelData {
  const { width, height, hMax, vMax } = frame;
  const max = (1 << frame.precision) - 1;
  const center = 1 << (frame.precision - 1);
  const pixelCount = width * height;

  let used = planes;
  if (planes.length === 2 || planes.length > 4) {
    logger.warn({ components: planes.length }, 'Unsupported component count, decoding the first component as grey');
    used = planes.slice(0, 1);
  }
  const channels = used.length === 1 ? 1 : 3;
  const samples = new Uint16Array(pixelCount * channels);

  const xMaps = used.map((plane) => {
    const map = new Int32Array(width);
    for (let x = 0; x < width; x++) map[x] = Math.floor((x * plane.h) / hMax);
    return map;
  });

  const transform = shouldTransform(used.length, options);
  const values = new Float64Array(used.length);

  for (let y = 0; y < height; y++) {
    const rowOffsets = used.map((plane) => Math.floor((y * plane.v) / vMax) * plane.stride);
    for (let x = 0; x < width; x++) {
      for (let c = 0; c < used.length; c++) {
        values[c] = used[c].data[rowOffsets[c] + xMaps[c][x]];
      }
      const out = (y * width + x) * channels;

      if (channels === 1) {
        samples[out] = values[0];
        continue;
      }

      let r = values[0];
      let g = values[1];
      let b = values[2];
      if (transform) {
        const luma = values[0];
        const cb = values[1] - center;
        const cr = values[2] - center;
        r = luma + 1.402 * cr;
        g = luma - 0.344136 * cb - 0.714136 * cr;
        b = luma + 1.772 * cb;
      }

      if (used.length === 4) {
        const k = values[3];
        if (options.adobeTransform !== undefined) {
          // Adobe writes inverted CMYK.
          r = (clamp(r, max) * k) / max;
          g = (clamp(g, max) * k) / max;
          b = (clamp(b, max) * k) / max;
        } else {
          r = ((max - clamp(r, max)) * (max - k)) / max;
          g = ((max - clamp(g, max)) * (max - k)) / max;
          b = ((max - clamp(b, max)) * (max - k)) / max;
        }
      }

      samples[out] = clamp(Math.round(r), max);
      samples[out + 1] = clamp(Math.round(g), max);
      samples[out + 2] = clamp(Math.round(b), max);
    }
  }

  if (frame.precision > 8) {
    const data = new Uint16Array(samples.length);
    for (let i = 0; i < samples.length; i++) data[i] = scaleSample(samples[i], max, 0xffff);
    return { format: channels === 1 ? 'l16' : 'rgb16', data };
  }
  const data = new Uint8Array(samples.length);
  for (let i = 0; i < samples.length; i++) data[i] = scaleSample(samples[i], max, 0xff);
  return { format: channels === 1 ? 'l8' : 'rgb8', data };
}
