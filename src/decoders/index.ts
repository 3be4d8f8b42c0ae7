/**
 * Image Decoders
 *
 * One decoder per format behind a shared contract, plus content-based
 * format detection and the factory that ties them together.
 */

// Core types
export type {
  DecoderOptions,
  DecoderPlugin,
  ImageDecoder,
  ImageFormat,
  ImageInfo,
  ImageInput,
  JpegDecoderOptions,
  KnownImageFormat,
  PngDecoderOptions
} from './types.js';

export { BaseDecoder, DEFAULT_MAX_PIXELS } from './base-decoder.js';

// Format detection
export { detectImageFormat, detectSourceFormat, guessFormatHarder, validateFormat } from './format-detection.js';

// Registry
export { clearDefaultDecoderPlugins, getDefaultDecoderPlugins, setDefaultDecoderPlugins } from './plugin-registry.js';

// Per-format decoders
export { JpegDecoder, jpegDecoder } from './jpeg-decoder.js';
export { PngDecoder, pngDecoder } from './png-decoder.js';
export { GifDecoder, gifDecoder, interlacedRows } from './gif-decoder.js';
export type { GifApplicationExtension, GifDisposalMethod, GifFrameInfo, GifInfo, GifPlainTextExtension } from './gif-decoder.js';
export { BmpCompression, BmpDecoder, bmpDecoder } from './bmp-decoder.js';
export type { BmpColorEntry, BmpDibHeader, BmpFileHeader, BmpInfo } from './bmp-decoder.js';
export { NetpbmDecoder, netpbmDecoder } from './netpbm-decoder.js';
export type { NetpbmInfo, NetpbmVariant, TupleType } from './netpbm-decoder.js';
export { TGA_FOOTER_SIGNATURE, TgaDecoder, TgaImageType, tgaDecoder } from './tga-decoder.js';
export type { TgaColorEntry, TgaFooter, TgaHeader, TgaInfo } from './tga-decoder.js';
export { HDR_SIGNATURES, HdrDecoder, hdrDecoder, rgbeToFloat } from './hdr-decoder.js';
export type { HdrEncoding, HdrInfo } from './hdr-decoder.js';
export { AvifDecoder, WebpDecoder, avifDecoder, webpDecoder } from './stub-decoders.js';
export type { AvifInfo, WebpEncoding, WebpInfo } from './stub-decoders.js';

// Factory functions (main API)
export { createDecoder, findPlugin, toByteSource } from './decoder-factory.js';
