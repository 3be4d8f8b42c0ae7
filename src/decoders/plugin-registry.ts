import type { DecoderPlugin } from './types.js';
import { bmpDecoder } from './bmp-decoder.js';
import { gifDecoder } from './gif-decoder.js';
import { hdrDecoder } from './hdr-decoder.js';
import { jpegDecoder } from './jpeg-decoder.js';
import { netpbmDecoder } from './netpbm-decoder.js';
import { pngDecoder } from './png-decoder.js';
import { avifDecoder, webpDecoder } from './stub-decoders.js';
import { tgaDecoder } from './tga-decoder.js';

const BUILT_IN_PLUGINS: readonly DecoderPlugin[] = [
  jpegDecoder,
  pngDecoder,
  gifDecoder,
  bmpDecoder,
  netpbmDecoder,
  tgaDecoder,
  hdrDecoder,
  webpDecoder,
  avifDecoder
];

let defaultPlugins: DecoderPlugin[] | null = null;

function ensureDefaultPlugins(): DecoderPlugin[] {
  if (!defaultPlugins || defaultPlugins.length === 0) {
    defaultPlugins = [...BUILT_IN_PLUGINS];
  }
  return defaultPlugins;
}

export function setDefaultDecoderPlugins(plugins: DecoderPlugin[]): void {
  defaultPlugins = [...plugins];
}

export function getDefaultDecoderPlugins(): DecoderPlugin[] {
  return ensureDefaultPlugins();
}

export function clearDefaultDecoderPlugins(): void {
  defaultPlugins = null;
}
