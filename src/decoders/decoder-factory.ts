/**
 * Decoder Factory
 *
 * Detects the image format from content and binds the matching decoder.
 */

import { MemorySource, readSource } from '../byte-source.js';
import type { ByteSource } from '../byte-source.js';
import { UnsupportedFormatError } from '../errors.js';
import { detectSourceFormat, validateFormat } from './format-detection.js';
import { getDefaultDecoderPlugins } from './plugin-registry.js';
import type { DecoderOptions, DecoderPlugin, ImageDecoder, ImageInput, KnownImageFormat } from './types.js';

/**
 * Turn any supported input into a seekable source. File paths are read
 * into memory.
 */
export async function toByteSource(input: ImageInput): Promise<ByteSource> {
  if (typeof input === 'string') {
    return readSource(input);
  }
  if (input instanceof Uint8Array || input instanceof ArrayBuffer) {
    return new MemorySource(input);
  }
  return input;
}

/**
 * Find the plugin registered for `format`
 *
 * @throws UnsupportedFormatError when no plugin handles it
 */
export function findPlugin(format: KnownImageFormat, plugins: readonly DecoderPlugin[]): DecoderPlugin {
  const plugin = plugins.find((candidate) => candidate.format === format);
  if (!plugin) {
    throw new UnsupportedFormatError(
      `No decoder registered for format "${format}". Provide a matching plugin via options.decoders.`
    );
  }
  return plugin;
}

/**
 * Create appropriate decoder for any image input
 *
 * The format is detected from content, the matching plugin creates a
 * decoder and its header is read before returning.
 *
 * @param input - File path, bytes, or a seekable source
 * @param options - Decoder options; `options.decoders` overrides the registry
 *
 * @example
 * const decoder = await createDecoder('photo.jpg');
 * console.log(decoder.readHeader().format);
 * const image = await decoder.decode();
 */
export async function createDecoder(input: ImageInput, options: DecoderOptions = {}): Promise<ImageDecoder> {
  const source = await toByteSource(input);
  const format = detectSourceFormat(source);
  validateFormat(format);

  const plugins = options.decoders && options.decoders.length > 0 ? options.decoders : getDefaultDecoderPlugins();
  const decoder = findPlugin(format, plugins).create(source, options);
  decoder.readHeader();
  return decoder;
}
