/**
 * Simple fixed-layout encoders for decoded images
 */

import { writeFile } from 'node:fs/promises';
import { IoError, describeError } from './errors.js';
import type { Image } from './image.js';
import { stringToBytes, writeUInt16LE, writeUInt32LE } from './utils.js';

export type OutputFormat = 'ppm' | 'pam' | 'bmp';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['ppm', 'pam', 'bmp'];

function withHeader(header: string, body: Uint8Array): Uint8Array {
  const headerBytes = stringToBytes(header);
  const output = new Uint8Array(headerBytes.length + body.length);
  output.set(headerBytes, 0);
  output.set(body, headerBytes.length);
  return output;
}

/**
 * Binary PPM (P6), 8 bits per sample; alpha is dropped
 */
export function encodePpm(image: Image): Uint8Array {
  return withHeader(`P6\n${image.width} ${image.height}\n255\n`, image.asRgb8());
}

/**
 * PAM (P7) with tuple type RGB_ALPHA, 8 bits per sample
 */
export function encodePam(image: Image): Uint8Array {
  const header =
    `P7\nWIDTH ${image.width}\nHEIGHT ${image.height}\nDEPTH 4\nMAXVAL 255\nTUPLTYPE RGB_ALPHA\nENDHDR\n`;
  return withHeader(header, image.asRgba8());
}

const BMP_FILE_HEADER_SIZE = 14;
const BMP_INFO_HEADER_SIZE = 40;

/**
 * 24-bit uncompressed BMP, rows stored bottom-up and padded to 4 bytes
 */
export function encodeBmp(image: Image): Uint8Array {
  const { width, height } = image;
  const rgb = image.asRgb8();
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelOffset = BMP_FILE_HEADER_SIZE + BMP_INFO_HEADER_SIZE;
  const output = new Uint8Array(pixelOffset + rowSize * height);

  output[0] = 0x42; // B
  output[1] = 0x4d; // M
  writeUInt32LE(output, output.length, 2);
  writeUInt32LE(output, pixelOffset, 10);

  writeUInt32LE(output, BMP_INFO_HEADER_SIZE, 14);
  writeUInt32LE(output, width, 18);
  writeUInt32LE(output, height, 22);
  writeUInt16LE(output, 1, 26);
  writeUInt16LE(output, 24, 28);
  writeUInt32LE(output, rowSize * height, 34);
  // 2835 pixels per metre is 72 DPI.
  writeUInt32LE(output, 2835, 38);
  writeUInt32LE(output, 2835, 42);

  for (let y = 0; y < height; y++) {
    const rowStart = pixelOffset + (height - 1 - y) * rowSize;
    for (let x = 0; x < width; x++) {
      const src = (y * width + x) * 3;
      const dst = rowStart + x * 3;
      output[dst] = rgb[src + 2];
      output[dst + 1] = rgb[src + 1];
      output[dst + 2] = rgb[src];
    }
  }

  return output;
}

export function encodeImage(image: Image, format: OutputFormat): Uint8Array {
  switch (format) {
    case 'ppm':
      return encodePpm(image);
    case 'pam':
      return encodePam(image);
    case 'bmp':
      return encodeBmp(image);
  }
}

/**
 * Encode `image` and write it to `path`
 */
export async function writeImage(path: string, image: Image, format: OutputFormat): Promise<void> {
  try {
    await writeFile(path, encodeImage(image, format));
  } catch (err) {
    throw new IoError(`Failed to write ${path}: ${describeError(err)}`, { cause: err });
  }
}
