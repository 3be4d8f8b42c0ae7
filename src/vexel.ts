import { createDecoder } from './decoders/decoder-factory.js';
import type { DecoderOptions, ImageDecoder, ImageInfo, ImageInput, KnownImageFormat } from './decoders/types.js';
import type { Image } from './image.js';

/**
 * Single entry point over every supported format
 *
 * @example
 * const vexel = await Vexel.open('photo.gif');
 * const image = await vexel.decode();
 * console.log(vexel.format, image.width, image.height);
 */
export class Vexel {
  private readonly decoder: ImageDecoder;

  private constructor(decoder: ImageDecoder) {
    this.decoder = decoder;
  }

  /**
   * Detect the format of `input` and read its header. Pixels are not
   * decoded until decode() is called.
   */
  static async open(input: ImageInput, options: DecoderOptions = {}): Promise<Vexel> {
    return new Vexel(await createDecoder(input, options));
  }

  get format(): KnownImageFormat {
    return this.decoder.format;
  }

  decode(): Promise<Image> {
    return this.decoder.decode();
  }

  /** Metadata gathered so far; complete once decode() has resolved */
  getImageInfo(): ImageInfo {
    return this.decoder.getImageInfo();
  }
}
