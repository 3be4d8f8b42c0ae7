import type { ByteSource } from '../byte-source.js';
import { UnsupportedFormatError } from '../errors.js';
import { PNG_SIGNATURE, bytesToString } from '../utils.js';
import { HDR_SIGNATURES } from './hdr-decoder.js';
import type { ImageFormat, KnownImageFormat } from './types.js';

/** Bytes examined by the signature checks */
export const MAGIC_LENGTH = 32;

const DETECT_HEADER = 48;
const HARD_GUESS_FOOTER = 12;

const BMP_SIGNATURES = ['BM', 'BA', 'CI', 'CP', 'IC', 'PT'];
const AVIF_BRANDS = ['avif', 'avis'];

const TGA_HEADER_SIZE = 18;
const TGA_IMAGE_TYPES = [1, 2, 3, 9, 10, 11];
const TGA_PIXEL_DEPTHS = [8, 15, 16, 24, 32];

function startsWith(bytes: Uint8Array, prefix: ArrayLike<number>): boolean {
  if (bytes.length < prefix.length) {
    return false;
  }
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) {
      return false;
    }
  }
  return true;
}

function isAvif(bytes: Uint8Array): boolean {
  if (bytes.length < 12 || bytesToString(bytes, 4, 4) !== 'ftyp') {
    return false;
  }
  if (AVIF_BRANDS.includes(bytesToString(bytes, 8, 4))) {
    return true;
  }
  // Compatible brands follow the major brand and minor version.
  for (let i = 16; i + 4 <= Math.min(bytes.length, MAGIC_LENGTH); i += 4) {
    if (AVIF_BRANDS.includes(bytesToString(bytes, i, 4))) {
      return true;
    }
  }
  return false;
}

/**
 * TGA has no signature, so its header fields are checked for plausible
 * values instead.
 */
function isTga(bytes: Uint8Array): boolean {
  if (bytes.length < TGA_HEADER_SIZE) {
    return false;
  }
  const colorMapType = bytes[1];
  const imageType = bytes[2];
  const width = bytes[12] | (bytes[13] << 8);
  const height = bytes[14] | (bytes[15] << 8);
  const pixelDepth = bytes[16];
  const descriptor = bytes[17];
  if (colorMapType > 1 || !TGA_IMAGE_TYPES.includes(imageType)) {
    return false;
  }
  if ((imageType & 0x07) === 1 && colorMapType !== 1) {
    return false;
  }
  return width > 0 && height > 0 && TGA_PIXEL_DEPTHS.includes(pixelDepth) && (descriptor & 0xc0) === 0;
}

/**
 * Detect image format from byte signature (magic bytes)
 *
 * Checks run in the order JPEG, PNG, GIF, Netpbm, BMP, HDR, WebP, AVIF and
 * finally the TGA header heuristic.
 *
 * @param bytes - Leading bytes of the file
 * @returns Detected image format or 'unknown'
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat {
  if (bytes.length < 2) {
    return 'unknown';
  }

  if (bytes[0] === 0xff && bytes[1] === 0xd8) {
    return 'jpeg';
  }

  if (startsWith(bytes, PNG_SIGNATURE)) {
    return 'png';
  }

  const ascii = bytesToString(bytes, 0, Math.min(bytes.length, 12));
  if (ascii.startsWith('GIF87a') || ascii.startsWith('GIF89a')) {
    return 'gif';
  }

  if (bytes[0] === 0x50 && bytes[1] >= 0x31 && bytes[1] <= 0x37) {
    return 'netpbm';
  }

  if (BMP_SIGNATURES.includes(ascii.slice(0, 2))) {
    return 'bmp';
  }

  if (HDR_SIGNATURES.some((signature) => ascii.startsWith(signature))) {
    return 'hdr';
  }

  if (ascii.startsWith('RIFF') && ascii.slice(8, 12) === 'WEBP') {
    return 'webp';
  }

  if (isAvif(bytes)) {
    return 'avif';
  }

  if (isTga(bytes)) {
    return 'tga';
  }

  return 'unknown';
}

/**
 * Fallback for files without a recognisable signature: a JPEG end-of-image
 * marker at the very end.
 *
 * @param footer - Up to the last 12 bytes
 */
export function guessFormatHarder(footer: Uint8Array): ImageFormat {
  if (footer.length >= 2 && footer[footer.length - 2] === 0xff && footer[footer.length - 1] === 0xd9) {
    return 'jpeg';
  }
  return 'unknown';
}

/**
 * Detect the format of a seekable source. The cursor is rewound to the
 * start afterwards.
 */
export function detectSourceFormat(source: ByteSource): ImageFormat {
  source.seek(0);
  const header = source.read(DETECT_HEADER);
  let format = detectImageFormat(header);
  if (format === 'unknown') {
    source.seek(Math.max(0, source.length - HARD_GUESS_FOOTER));
    const footer = source.read(HARD_GUESS_FOOTER);
    format = guessFormatHarder(footer);
  }
  source.seek(0);
  return format;
}

/**
 * Validate that a format is supported
 *
 * @throws UnsupportedFormatError if format is unknown
 */
export function validateFormat(format: ImageFormat): asserts format is KnownImageFormat {
  if (format === 'unknown') {
    throw new UnsupportedFormatError(
      'Unknown or unsupported image format. Supported formats: JPEG, PNG, GIF, BMP, Netpbm, TGA, HDR, WebP, AVIF'
    );
  }
}
