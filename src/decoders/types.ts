import type { Logger } from 'pino';
import type { ByteSource } from '../byte-source.js';
import type { Image } from '../image.js';
import type { JpegInfo } from '../jpeg-types.js';
import type { PngInfo } from '../types.js';
import type { BmpInfo } from './bmp-decoder.js';
import type { GifInfo } from './gif-decoder.js';
import type { HdrInfo } from './hdr-decoder.js';
import type { NetpbmInfo } from './netpbm-decoder.js';
import type { AvifInfo, WebpInfo } from './stub-decoders.js';
import type { TgaInfo } from './tga-decoder.js';

/**
 * Image format types supported by the library
 */
export type ImageFormat =
  | 'jpeg'
  | 'png'
  | 'gif'
  | 'bmp'
  | 'netpbm'
  | 'tga'
  | 'hdr'
  | 'webp'
  | 'avif'
  | 'unknown';

export type KnownImageFormat = Exclude<ImageFormat, 'unknown'>;

/**
 * Per-format structural metadata, discriminated by `format`
 */
export type ImageInfo =
  | JpegInfo
  | PngInfo
  | GifInfo
  | BmpInfo
  | NetpbmInfo
  | TgaInfo
  | HdrInfo
  | WebpInfo
  | AvifInfo;

/**
 * Universal image decoder interface
 *
 * - readHeader() parses the header and metadata without decoding pixels
 * - decode() performs the full parse and reconstruction
 * - getImageInfo() returns a snapshot of the metadata gathered so far
 */
export interface ImageDecoder<I extends ImageInfo = ImageInfo> {
  readonly format: KnownImageFormat;

  readHeader(): I;

  decode(): Promise<Image>;

  getImageInfo(): I;
}

/**
 * PNG decoder configuration
 */
export interface PngDecoderOptions {
  /** Verify chunk CRCs (default: true) */
  verifyCrc?: boolean;
}

/**
 * JPEG decoder configuration
 */
export interface JpegDecoderOptions {
  /** Force or suppress the YCbCr/YCCK colour transform; default follows the file */
  colorTransform?: boolean;
}

/**
 * Options for creating image decoders
 */
export interface DecoderOptions {
  /** Logger for diagnostics; defaults to a child of the library logger */
  logger?: Logger;
  /** Largest accepted width * height (default: 1 << 26) */
  maxPixels?: number;
  /** PNG-specific decoding options */
  png?: PngDecoderOptions;
  /** JPEG-specific decoding options */
  jpeg?: JpegDecoderOptions;
  /**
   * Explicit decoder plugins to use. If omitted, the registered defaults are used.
   */
  decoders?: DecoderPlugin[];
}

/**
 * Type for image input sources
 */
export type ImageInput = string | Uint8Array | ArrayBuffer | ByteSource;

/**
 * Plugin interface for registering decoder implementations.
 */
export interface DecoderPlugin {
  /** Image format handled by this plugin */
  format: KnownImageFormat;
  /**
   * Bind a decoder to the source without reading it.
   */
  create(source: ByteSource, options?: DecoderOptions): ImageDecoder;
}
