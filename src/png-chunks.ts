/**
 * Parsers for PNG ancillary and APNG chunk payloads
 */

import { BitReader } from './bit-reader.js';
import { DecodeError } from './errors.js';
import { inflateChunks } from './png-decompress.js';
import { ColorType } from './types.js';
import type {
  AnimationControl,
  Chromaticities,
  IccProfile,
  ImageTime,
  PhysicalDimensions,
  PngBackground,
  PngFrameControl,
  PngText,
  PngTransparency,
  RenderingIntent,
  SuggestedPalette,
  SuggestedPaletteEntry
} from './types.js';
import { bytesToString } from './utils.js';

const RENDERING_INTENTS: readonly RenderingIntent[] = [
  'perceptual',
  'relative-colorimetric',
  'saturation',
  'absolute-colorimetric'
];

const utf8 = new TextDecoder('utf-8');

/**
 * Split a NUL-terminated Latin-1 string off the front of `data`
 */
function readNullTerminated(data: Uint8Array, start: number): { value: string; next: number } {
  const end = data.indexOf(0, start);
  if (end < 0) {
    throw new DecodeError('Missing NUL terminator');
  }
  return { value: bytesToString(data, start, end - start), next: end + 1 };
}

function inflateText(data: Uint8Array, method: number): Uint8Array {
  if (method !== 0) {
    throw new DecodeError(`Unknown compression method ${method}`);
  }
  return inflateChunks([data]);
}

export function parsePalette(data: Uint8Array): [number, number, number][] {
  if (data.length === 0 || data.length % 3 !== 0 || data.length > 768) {
    throw new DecodeError(`Invalid PLTE chunk length ${data.length}`);
  }
  const palette: [number, number, number][] = [];
  for (let i = 0; i < data.length; i += 3) {
    palette.push([data[i], data[i + 1], data[i + 2]]);
  }
  return palette;
}

export function parseTransparency(data: Uint8Array, colorType: number, paletteSize: number): PngTransparency {
  const reader = BitReader.fromBytes(data);
  switch (colorType) {
    case ColorType.GRAYSCALE:
      return { type: 'gray', gray: reader.readU16() };
    case ColorType.RGB:
      return { type: 'rgb', red: reader.readU16(), green: reader.readU16(), blue: reader.readU16() };
    case ColorType.PALETTE:
      if (data.length > paletteSize) {
        throw new DecodeError(`tRNS has ${data.length} entries for a palette of ${paletteSize}`);
      }
      return { type: 'palette', alpha: Array.from(data) };
    default:
      throw new DecodeError(`tRNS is not allowed for color type ${colorType}`);
  }
}

export function parseBackground(data: Uint8Array, colorType: number): PngBackground {
  const reader = BitReader.fromBytes(data);
  switch (colorType) {
    case ColorType.PALETTE:
      return { type: 'palette', index: reader.readU8() };
    case ColorType.GRAYSCALE:
    case ColorType.GRAYSCALE_ALPHA:
      return { type: 'gray', gray: reader.readU16() };
    default:
      return { type: 'rgb', red: reader.readU16(), green: reader.readU16(), blue: reader.readU16() };
  }
}

export function parseGamma(data: Uint8Array): number {
  return BitReader.fromBytes(data).readU32() / 100000;
}

export function parseChromaticities(data: Uint8Array): Chromaticities {
  const reader = BitReader.fromBytes(data);
  const next = (): number => reader.readU32() / 100000;
  return {
    whitePointX: next(),
    whitePointY: next(),
    redX: next(),
    redY: next(),
    greenX: next(),
    greenY: next(),
    blueX: next(),
    blueY: next()
  };
}

export function parseRenderingIntent(data: Uint8Array): RenderingIntent {
  const value = BitReader.fromBytes(data).readU8();
  const intent = RENDERING_INTENTS[value];
  if (intent === undefined) {
    throw new DecodeError(`Invalid rendering intent ${value}`);
  }
  return intent;
}

export function parseIccProfile(data: Uint8Array): IccProfile {
  const { value: name, next } = readNullTerminated(data, 0);
  if (next >= data.length) {
    throw new DecodeError('iCCP chunk has no compression method');
  }
  return { name, profile: inflateText(data.subarray(next + 1), data[next]) };
}

export function parsePhysicalDimensions(data: Uint8Array): PhysicalDimensions {
  const reader = BitReader.fromBytes(data);
  return {
    pixelsPerUnitX: reader.readU32(),
    pixelsPerUnitY: reader.readU32(),
    unit: reader.readU8() === 1 ? 'meter' : 'unknown'
  };
}

export function parseSignificantBits(data: Uint8Array): number[] {
  return Array.from(data);
}

export function parseHistogram(data: Uint8Array): number[] {
  const reader = BitReader.fromBytes(data);
  const histogram: number[] = [];
  while (reader.bytesLeft() >= 2) {
    histogram.push(reader.readU16());
  }
  return histogram;
}

export function parseTime(data: Uint8Array): ImageTime {
  const reader = BitReader.fromBytes(data);
  return {
    year: reader.readU16(),
    month: reader.readU8(),
    day: reader.readU8(),
    hour: reader.readU8(),
    minute: reader.readU8(),
    second: reader.readU8()
  };
}

export function parseSuggestedPalette(data: Uint8Array): SuggestedPalette {
  const { value: name, next } = readNullTerminated(data, 0);
  const reader = BitReader.fromBytes(data.subarray(next));
  const sampleDepth = reader.readU8();
  if (sampleDepth !== 8 && sampleDepth !== 16) {
    throw new DecodeError(`Invalid sPLT sample depth ${sampleDepth}`);
  }
  const read = (): number => (sampleDepth === 8 ? reader.readU8() : reader.readU16());
  const entrySize = sampleDepth === 8 ? 6 : 10;
  const entries: SuggestedPaletteEntry[] = [];
  while (reader.bytesLeft() >= entrySize) {
    entries.push({ red: read(), green: read(), blue: read(), alpha: read(), frequency: reader.readU16() });
  }
  return { name, sampleDepth, entries };
}

export function parseText(data: Uint8Array): PngText {
  const { value: keyword, next } = readNullTerminated(data, 0);
  return { type: 'tEXt', keyword, text: bytesToString(data, next) };
}

export function parseCompressedText(data: Uint8Array): PngText {
  const { value: keyword, next } = readNullTerminated(data, 0);
  if (next >= data.length) {
    throw new DecodeError('zTXt chunk has no compression method');
  }
  const text = inflateText(data.subarray(next + 1), data[next]);
  return { type: 'zTXt', keyword, text: bytesToString(text) };
}

export function parseInternationalText(data: Uint8Array): PngText {
  const keyword = readNullTerminated(data, 0);
  if (keyword.next + 2 > data.length) {
    throw new DecodeError('iTXt chunk is truncated');
  }
  const compressed = data[keyword.next] === 1;
  const method = data[keyword.next + 1];
  const languageTag = readNullTerminated(data, keyword.next + 2);
  const translated = readNullTerminated(data, languageTag.next);
  const body = data.subarray(translated.next);
  return {
    type: 'iTXt',
    keyword: keyword.value,
    languageTag: languageTag.value,
    translatedKeyword: utf8.decode(data.subarray(languageTag.next, translated.next - 1)),
    text: utf8.decode(compressed ? inflateText(body, method) : body)
  };
}

export function parseAnimationControl(data: Uint8Array): AnimationControl {
  const reader = BitReader.fromBytes(data);
  return { numFrames: reader.readU32(), numPlays: reader.readU32() };
}

export function parseFrameControl(data: Uint8Array): PngFrameControl {
  const reader = BitReader.fromBytes(data);
  return {
    sequenceNumber: reader.readU32(),
    width: reader.readU32(),
    height: reader.readU32(),
    xOffset: reader.readU32(),
    yOffset: reader.readU32(),
    delayNum: reader.readU16(),
    delayDen: reader.readU16(),
    disposeOp: reader.readU8(),
    blendOp: reader.readU8(),
    dataLength: 0
  };
}
