import type { Logger } from 'pino';
import { BitReader } from '../bit-reader.js';
import type { BitReaderOptions } from '../bit-reader.js';
import type { ByteSource } from '../byte-source.js';
import { InvalidDimensionsError } from '../errors.js';
import type { Image } from '../image.js';
import { createLogger } from '../logger.js';
import type { DecoderOptions, ImageDecoder, ImageInfo, KnownImageFormat } from './types.js';

export const DEFAULT_MAX_PIXELS = 1 << 26;

/**
 * Shared decoder lifecycle: header parsing happens once, decoding happens
 * once and its result is reused, and the info record is only ever handed
 * out as a copy.
 */
export abstract class BaseDecoder<I extends ImageInfo> implements ImageDecoder<I> {
  abstract readonly format: KnownImageFormat;

  protected readonly reader: BitReader;
  protected readonly logger: Logger;
  protected readonly options: DecoderOptions;
  protected info: I;
  private headerRead = false;
  private image?: Image;

  protected constructor(
    source: ByteSource,
    info: I,
    options: DecoderOptions,
    loggerName: string,
    readerOptions?: BitReaderOptions
  ) {
    this.reader = new BitReader(source, readerOptions);
    this.info = info;
    this.options = options;
    this.logger = options.logger ?? createLogger(loggerName);
  }

  readHeader(): I {
    if (!this.headerRead) {
      this.parseHeader();
      this.headerRead = true;
    }
    return this.getImageInfo();
  }

  async decode(): Promise<Image> {
    if (!this.image) {
      this.readHeader();
      this.image = this.decodePixels();
    }
    return this.image;
  }

  getImageInfo(): I {
    return structuredClone(this.info);
  }

  /** Parse everything up to the pixel data */
  protected abstract parseHeader(): void;

  /** Decode pixel data; runs after parseHeader */
  protected abstract decodePixels(): Image;

  protected checkDimensions(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new InvalidDimensionsError(width, height);
    }
    const limit = this.options.maxPixels ?? DEFAULT_MAX_PIXELS;
    if (width * height > limit) {
      throw new InvalidDimensionsError(width, height, `exceeds limit of ${limit} pixels`);
    }
  }
}
