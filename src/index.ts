/**
 * Multi-format image decoding
 *
 * Identifies the format of a byte stream, parses its container and
 * reconstructs the pixels, together with a per-format metadata report.
 * Formats: JPEG (baseline, extended, progressive, lossless, arithmetic),
 * PNG and APNG, GIF, BMP and Netpbm. WebP and AVIF report header metadata
 * only.
 *
 * @example
 * import { Vexel } from 'vexel';
 *
 * const vexel = await Vexel.open('photo.jpg');
 * const image = await vexel.decode();
 * const rgb = image.asRgb8();
 */

// Main API
export { Vexel } from './vexel.js';
export { Image, convertPixels, formatHasAlpha, getChannelCount } from './image.js';
export type { FrameBlend, FrameDisposal, ImageFrame, PixelData, PixelFormat } from './image.js';

// Decoders
export * from './decoders/index.js';

// Errors
export {
  DecodeError,
  InvalidDimensionsError,
  IoError,
  NotImplementedError,
  OutOfBoundsError,
  UnsupportedFormatError,
  VexelError
} from './errors.js';

// Low-level building blocks
export { MemorySource, readSource } from './byte-source.js';
export type { ByteSource, SeekOrigin } from './byte-source.js';
export { BitReader } from './bit-reader.js';
export type { BitOrder, BitReaderOptions } from './bit-reader.js';
export { createEnumMarkerCodec } from './marker.js';
export type { MarkerCodec } from './marker.js';
export { JpegMarker, jpegMarkerCodec } from './jpeg-markers.js';
export { checkRange, getKeySafe, getRangeSafe, getSafe, getSubarraySafe } from './safe-access.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

// Format internals exposed for tooling and tests
export { buildHuffmanTable } from './jpeg-huffman.js';
export { dequantizeBlock, idctBlock, quantizeBlock } from './jpeg-idct.js';
export { ArithmeticDecoder } from './jpeg-arithmetic.js';
export type { JpegInfo } from './jpeg-types.js';
export { PngParser, parsePngChunks, parsePngHeader } from './png-parser.js';
export { FilterType, filterScanline, getBytesPerPixel, unfilterScanline } from './png-filter.js';
export { decodeLzw } from './gif-lzw.js';
export { ColorType } from './types.js';
export type { PngChunk, PngHeader, PngInfo } from './types.js';

// Writers
export { encodeBmp, encodeImage, encodePam, encodePpm, writeImage } from './writer.js';
export type { OutputFormat } from './writer.js';
