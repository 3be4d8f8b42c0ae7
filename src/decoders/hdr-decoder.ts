/**
 * Radiance HDR (RGBE) decoder
 *
 * A text header of `KEY=value` lines ends at a blank line, followed by a
 * resolution line and the scanlines. Each pixel is three 8-bit mantissas
 * sharing one exponent byte. Output is linear float RGB.
 */

import type { ByteSource } from '../byte-source.js';
import { DecodeError, UnsupportedFormatError } from '../errors.js';
import { Image } from '../image.js';
import { BaseDecoder } from './base-decoder.js';
import type { DecoderOptions, DecoderPlugin } from './types.js';

export const HDR_SIGNATURES = ['#?RADIANCE', '#?RGBE'];

export type HdrEncoding = 'rgbe' | 'xyze';

const FORMATS: Record<string, HdrEncoding> = {
  '32-bit_rle_rgbe': 'rgbe',
  '32-bit_rle_xyze': 'xyze'
};

const RESOLUTION = /^([-+])([XY])\s+(\d+)\s+([-+])([XY])\s+(\d+)$/;

// Scanlines outside this range cannot use the per-channel encoding.
const MIN_RLE_LENGTH = 8;
const MAX_RLE_LENGTH = 0x7fff;

// CIE XYZ to linear sRGB
const XYZ_TO_RGB = [
  [3.2404542, -1.5371385, -0.4985314],
  [-0.969266, 1.8760108, 0.041556],
  [0.0556434, -0.2040259, 1.0572252]
] as const;

export interface HdrInfo {
  format: 'hdr';
  width: number;
  height: number;
  /** Text after `#?` on the first line */
  programType: string;
  encoding: HdrEncoding;
  gamma?: number;
  /** Product of every EXPOSURE line */
  exposure?: number;
  pixelAspectRatio?: number;
  colorCorrection?: [number, number, number];
  /** CIE x, y of red, green, blue and white */
  primaries?: number[];
  software?: string;
  /** Axes of the resolution line, e.g. `-Y +X` for top-down rows */
  orientation: string;
  comments: string[];
}

function createHdrInfo(): HdrInfo {
  return {
    format: 'hdr',
    width: 0,
    height: 0,
    programType: '',
    encoding: 'rgbe',
    orientation: '-Y +X',
    comments: []
  };
}

interface Resolution {
  majorAxis: 'X' | 'Y';
  majorSign: string;
  minorSign: string;
  scanlineCount: number;
  scanlineLength: number;
}

/**
 * Expand an RGBE pixel to linear floats. A zero exponent is black.
 */
export function rgbeToFloat(r: number, g: number, b: number, e: number): [number, number, number] {
  if (e === 0) {
    return [0, 0, 0];
  }
  const scale = 2 ** (e - 136);
  return [r * scale, g * scale, b * scale];
}

export class HdrDecoder extends BaseDecoder<HdrInfo> {
  readonly format = 'hdr' as const;
  private resolution?: Resolution;

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, createHdrInfo(), options, 'hdr');
  }

  private readLine(): string {
    let line = '';
    for (;;) {
      const byte = this.reader.readU8();
      if (byte === 0x0a) {
        return line.endsWith('\r') ? line.slice(0, -1) : line;
      }
      line += String.fromCharCode(byte);
    }
  }

  private parseFloat(key: string, text: string): number | undefined {
    const value = Number.parseFloat(text);
    if (Number.isNaN(value)) {
      this.logger.warn({ key, text }, 'Failed to parse float');
      return undefined;
    }
    return value;
  }

  protected parseHeader(): void {
    const info = this.info;
    const magic = this.readLine().trim();
    if (!HDR_SIGNATURES.some((signature) => magic.startsWith(signature))) {
      throw new UnsupportedFormatError(`Invalid HDR signature "${magic.slice(0, 16)}"`);
    }
    info.programType = magic.slice(2);

    for (let line = this.readLine(); line.trim() !== ''; line = this.readLine()) {
      if (line.startsWith('#')) {
        info.comments.push(line.slice(1).trim());
        continue;
      }
      const eq = line.indexOf('=');
      if (eq < 0) {
        throw new DecodeError(`Invalid HDR header line "${line}"`);
      }
      this.applyField(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
    }

    const line = this.readLine().trim();
    const match = RESOLUTION.exec(line);
    if (!match || match[2] === match[5]) {
      throw new DecodeError(`Invalid HDR resolution line "${line}"`);
    }
    const [, majorSign, majorAxis, majorCount, minorSign, minorAxis, minorCount] = match;
    const resolution: Resolution = {
      majorAxis: majorAxis === 'X' ? 'X' : 'Y',
      majorSign,
      minorSign,
      scanlineCount: Number.parseInt(majorCount, 10),
      scanlineLength: Number.parseInt(minorCount, 10)
    };
    this.resolution = resolution;
    info.orientation = `${majorSign}${majorAxis} ${minorSign}${minorAxis}`;
    if (resolution.majorAxis === 'Y') {
      info.height = resolution.scanlineCount;
      info.width = resolution.scanlineLength;
    } else {
      info.width = resolution.scanlineCount;
      info.height = resolution.scanlineLength;
    }
    this.checkDimensions(info.width, info.height);
  }

  private applyField(key: string, value: string): void {
    const info = this.info;
    switch (key) {
      case 'FORMAT': {
        const encoding = FORMATS[value];
        if (encoding) {
          info.encoding = encoding;
        } else {
          this.logger.warn({ format: value }, 'Unknown HDR format, reading as RGBE');
        }
        break;
      }
      case 'EXPOSURE': {
        const exposure = this.parseFloat(key, value);
        if (exposure !== undefined) {
          info.exposure = (info.exposure ?? 1) * exposure;
        }
        break;
      }
      case 'GAMMA':
        info.gamma = this.parseFloat(key, value);
        break;
      case 'PIXASPECT':
        info.pixelAspectRatio = this.parseFloat(key, value);
        break;
      case 'COLORCORR': {
        const parts = value.split(/\s+/).map((part) => this.parseFloat(key, part) ?? 1);
        info.colorCorrection = [parts[0] ?? 1, parts[1] ?? 1, parts[2] ?? 1];
        break;
      }
      case 'PRIMARIES': {
        const parts = value.split(/\s+/).map((part) => this.parseFloat(key, part) ?? 0);
        if (parts.length !== 8) {
          this.logger.warn({ count: parts.length }, 'Expected 8 primaries');
        }
        info.primaries = Array.from({ length: 8 }, (_, i) => parts[i] ?? 0);
        break;
      }
      case 'SOFTWARE':
        info.software = value;
        break;
      default:
        this.logger.debug({ key, value }, 'Ignoring HDR header field');
    }
  }

  protected decodePixels(): Image {
    const resolution = this.resolution;
    if (!resolution) {
      throw new DecodeError('Missing HDR resolution');
    }
    const { width, height, encoding } = this.info;
    const { scanlineCount, scanlineLength } = resolution;
    const data = new Float32Array(width * height * 3);

    for (let s = 0; s < scanlineCount; s++) {
      const scanline = this.readScanline(scanlineLength);
      for (let p = 0; p < scanlineLength; p++) {
        const [x, y] = this.position(resolution, s, p);
        const o = p * 4;
        let rgb = rgbeToFloat(scanline[o], scanline[o + 1], scanline[o + 2], scanline[o + 3]);
        if (encoding === 'xyze') {
          rgb = xyzToRgb(rgb);
        }
        data.set(rgb, (y * width + x) * 3);
      }
    }
    return new Image(width, height, { format: 'rgb32f', data });
  }

  /** Image coordinates of position `p` on scanline `s` */
  private position(resolution: Resolution, s: number, p: number): [number, number] {
    const { width, height } = this.info;
    if (resolution.majorAxis === 'Y') {
      const y = resolution.majorSign === '-' ? s : height - 1 - s;
      const x = resolution.minorSign === '+' ? p : width - 1 - p;
      return [x, y];
    }
    const x = resolution.majorSign === '+' ? s : width - 1 - s;
    const y = resolution.minorSign === '-' ? p : height - 1 - p;
    return [x, y];
  }

  private readScanline(length: number): Uint8Array {
    if (length < MIN_RLE_LENGTH || length > MAX_RLE_LENGTH) {
      return this.readFlatScanline(length);
    }
    const head = this.reader.peekBytes(4);
    if (head.length < 4 || head[0] !== 2 || head[1] !== 2 || (head[2] & 0x80) !== 0) {
      return this.readFlatScanline(length);
    }
    this.reader.skip(4);
    const declared = (head[2] << 8) | head[3];
    if (declared !== length) {
      throw new DecodeError(`Scanline length ${declared} does not match image width ${length}`);
    }

    // Channels are stored one after another, each run-length encoded.
    const reader = this.reader;
    const scanline = new Uint8Array(length * 4);
    for (let channel = 0; channel < 4; channel++) {
      let x = 0;
      while (x < length) {
        const count = reader.readU8();
        if (count > 128) {
          const run = count - 128;
          if (x + run > length) {
            throw new DecodeError(`Run of ${run} overflows scanline at ${x}`);
          }
          const value = reader.readU8();
          for (let i = 0; i < run; i++) {
            scanline[(x + i) * 4 + channel] = value;
          }
          x += run;
        } else {
          if (count === 0 || x + count > length) {
            throw new DecodeError(`Invalid literal count ${count} at ${x}`);
          }
          const values = reader.readBytes(count);
          for (let i = 0; i < count; i++) {
            scanline[(x + i) * 4 + channel] = values[i];
          }
          x += count;
        }
      }
    }
    return scanline;
  }

  /**
   * Uncompressed pixels, where a 1,1,1,n pixel repeats the previous pixel
   * n times. Consecutive repeat pixels shift their counts up by 8 bits.
   */
  private readFlatScanline(length: number): Uint8Array {
    const scanline = new Uint8Array(length * 4);
    let shift = 0;
    let x = 0;
    while (x < length) {
      const pixel = this.reader.readBytes(4);
      if (pixel[0] === 1 && pixel[1] === 1 && pixel[2] === 1) {
        if (x === 0) {
          throw new DecodeError('Repeat without a previous pixel');
        }
        const count = pixel[3] * 2 ** shift;
        if (x + count > length) {
          throw new DecodeError(`Repeat of ${count} overflows scanline at ${x}`);
        }
        const previous = scanline.slice((x - 1) * 4, x * 4);
        for (let i = 0; i < count; i++) {
          scanline.set(previous, (x + i) * 4);
        }
        x += count;
        shift += 8;
      } else {
        scanline.set(pixel, x * 4);
        x++;
        shift = 0;
      }
    }
    return scanline;
  }
}

function xyzToRgb(xyz: [number, number, number]): [number, number, number] {
  const [x, y, z] = xyz;
  const [r, g, b] = XYZ_TO_RGB.map((row) => Math.max(0, row[0] * x + row[1] * y + row[2] * z));
  return [r, g, b];
}

export const hdrDecoder: DecoderPlugin = {
  format: 'hdr',
  create: (source, options) => new HdrDecoder(source, options)
};
