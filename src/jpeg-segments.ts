/**
 * Parsers for length-prefixed JPEG marker segments
 */

import { BitReader } from './bit-reader.js';
import { DecodeError } from './errors.js';
import { ZIGZAG_TO_NATURAL } from './jpeg-idct.js';
import type {
  ArithmeticConditioning,
  ColorComponentInfo,
  ExifHeader,
  ExifIfdEntry,
  HuffmanTableSpec,
  JfifHeader,
  QuantizationTable,
  ScanComponentInfo,
} from './jpeg-types.js';
import { checkRange, getSubarraySafe } from './safe-access.js';
import { bytesToString } from './utils.js';

/**
 * Read the 16-bit length and return the payload that follows it
 */
export function readSegmentPayload(reader: BitReader): Uint8Array {
  const length = reader.readU16();
  if (length < 2) {
    throw new DecodeError(`Invalid segment length ${length}`);
  }
  return reader.readBytes(length - 2);
}

export function parseDqt(payload: Uint8Array): QuantizationTable[] {
  const reader = BitReader.fromBytes(payload);
  const tables: QuantizationTable[] = [];
  while (reader.bytesLeft() > 0) {
    const pqTq = reader.readU8();
    const precision = pqTq >> 4;
    const id = pqTq & 15;
    if (precision > 1 || id > 3) {
      throw new DecodeError(`Invalid DQT table precision ${precision} / id ${id}`);
    }
    const table = new Array<number>(64);
    for (let k = 0; k < 64; k++) {
      table[ZIGZAG_TO_NATURAL[k]] = precision === 0 ? reader.readU8() : reader.readU16();
    }
    tables.push({ id, precision, length: 1 + 64 * (precision + 1), table });
  }
  return tables;
}

export function parseDht(payload: Uint8Array): HuffmanTableSpec[] {
  const reader = BitReader.fromBytes(payload);
  const tables: HuffmanTableSpec[] = [];
  while (reader.bytesLeft() > 0) {
    const tcTh = reader.readU8();
    const tableClass = tcTh >> 4;
    const id = tcTh & 15;
    if (tableClass > 1 || id > 3) {
      throw new DecodeError(`Invalid DHT table class ${tableClass} / id ${id}`);
    }
    const codeLengths = Array.from(reader.readBytes(16));
    const total = codeLengths.reduce((sum, count) => sum + count, 0);
    const values = Array.from(reader.readBytes(total));
    tables.push({ tableClass, id, codeLengths, values });
  }
  return tables;
}

export function parseDac(payload: Uint8Array): ArithmeticConditioning[] {
  const reader = BitReader.fromBytes(payload);
  const entries: ArithmeticConditioning[] = [];
  while (reader.bytesLeft() > 0) {
    const tcTb = reader.readU8();
    const value = reader.readU8();
    const tableClass = tcTb >> 4;
    const id = tcTb & 15;
    if (tableClass > 1 || id > 3) {
      throw new DecodeError(`Invalid DAC table class ${tableClass} / id ${id}`);
    }
    if (tableClass === 0 && (value & 15) > (value >> 4)) {
      throw new DecodeError(`Invalid DAC DC conditioning L=${value & 15} U=${value >> 4}`);
    }
    if (tableClass === 1 && (value < 1 || value > 63)) {
      throw new DecodeError(`Invalid DAC AC conditioning Kx=${value}`);
    }
    entries.push({ tableClass, id, value });
  }
  return entries;
}

export interface FrameHeader {
  precision: number;
  height: number;
  width: number;
  components: ColorComponentInfo[];
}

export function parseSof(payload: Uint8Array): FrameHeader {
  const reader = BitReader.fromBytes(payload);
  const precision = reader.readU8();
  const height = reader.readU16();
  const width = reader.readU16();
  const count = reader.readU8();
  const components: ColorComponentInfo[] = [];
  for (let i = 0; i < count; i++) {
    const id = reader.readU8();
    const hv = reader.readU8();
    const quantizationTableId = reader.readU8();
    const horizontalSampling = hv >> 4;
    const verticalSampling = hv & 15;
    if (horizontalSampling < 1 || horizontalSampling > 4 || verticalSampling < 1 || verticalSampling > 4) {
      throw new DecodeError(`Invalid sampling factors ${horizontalSampling}x${verticalSampling} for component ${id}`);
    }
    if (quantizationTableId > 3) {
      throw new DecodeError(`Invalid quantization table selector ${quantizationTableId} for component ${id}`);
    }
    components.push({
      id,
      horizontalSampling,
      verticalSampling,
      quantizationTableId,
      dcTableSelector: 0,
      acTableSelector: 0,
    });
  }
  return { precision, height, width, components };
}

export interface ScanHeader {
  components: ScanComponentInfo[];
  startSpectral: number;
  endSpectral: number;
  successiveHigh: number;
  successiveLow: number;
}

export function parseSos(payload: Uint8Array): ScanHeader {
  const reader = BitReader.fromBytes(payload);
  const count = reader.readU8();
  if (count < 1 || count > 4) {
    throw new DecodeError(`Invalid scan component count ${count}`);
  }
  const components: ScanComponentInfo[] = [];
  for (let i = 0; i < count; i++) {
    const componentId = reader.readU8();
    const tables = reader.readU8();
    components.push({ componentId, dcTableSelector: tables >> 4, acTableSelector: tables & 15 });
  }
  const startSpectral = reader.readU8();
  const endSpectral = reader.readU8();
  const approximation = reader.readU8();
  return {
    components,
    startSpectral,
    endSpectral,
    successiveHigh: approximation >> 4,
    successiveLow: approximation & 15,
  };
}

export function parseDri(payload: Uint8Array): number {
  return BitReader.fromBytes(payload).readU16();
}

/**
 * Leading NUL-terminated identifier of an APPn payload
 */
export function readIdentifier(payload: Uint8Array): string {
  const end = payload.indexOf(0);
  return bytesToString(payload, 0, end < 0 ? payload.length : end);
}

export function parseJfif(payload: Uint8Array): JfifHeader {
  const reader = BitReader.fromBytes(payload);
  const identifier = readIdentifier(payload);
  reader.skip(identifier.length + 1);
  const versionMajor = reader.readU8();
  const versionMinor = reader.readU8();
  const densityUnits = reader.readU8();
  const xDensity = reader.readU16();
  const yDensity = reader.readU16();
  const thumbnailWidth = reader.readU8();
  const thumbnailHeight = reader.readU8();
  const start = reader.tell();
  const thumbnail = getSubarraySafe(payload, start, start + 3 * thumbnailWidth * thumbnailHeight).slice();
  return {
    identifier,
    versionMajor,
    versionMinor,
    densityUnits,
    xDensity,
    yDensity,
    thumbnailWidth,
    thumbnailHeight,
    thumbnail,
  };
}

/**
 * EXIF APP1: TIFF header and the entries of IFD0
 */
export function parseExif(payload: Uint8Array): ExifHeader {
  const identifier = readIdentifier(payload);
  // "Exif" is followed by two NUL bytes before the TIFF header.
  const tiffStart = 6;
  checkRange(payload.length, tiffStart, tiffStart + 8);
  const tiff = payload.subarray(tiffStart);
  const order = bytesToString(tiff, 0, 2);
  if (order !== 'II' && order !== 'MM') {
    throw new DecodeError(`Invalid EXIF byte order "${order}"`);
  }
  const view = new DataView(tiff.buffer, tiff.byteOffset, tiff.byteLength);
  const little = order === 'II';
  const magic = view.getUint16(2, little);
  if (magic !== 42) {
    throw new DecodeError(`Invalid TIFF magic ${magic} in EXIF header`);
  }
  const firstIfdOffset = view.getUint32(4, little);

  const ifdEntries: ExifIfdEntry[] = [];
  if (firstIfdOffset !== 0) {
    checkRange(tiff.length, firstIfdOffset, firstIfdOffset + 2);
    const count = view.getUint16(firstIfdOffset, little);
    const entriesStart = firstIfdOffset + 2;
    checkRange(tiff.length, entriesStart, entriesStart + count * 12);
    for (let i = 0; i < count; i++) {
      const at = entriesStart + i * 12;
      ifdEntries.push({
        tag: view.getUint16(at, little),
        format: view.getUint16(at + 2, little),
        components: view.getUint32(at + 4, little),
        valueOffset: view.getUint32(at + 8, little),
      });
    }
  }

  return { identifier, byteOrder: order, firstIfdOffset, ifdEntries };
}

/**
 * Adobe APP14 colour transform flag, or undefined for other APP14 payloads
 */
export function parseAdobe(payload: Uint8Array): number | undefined {
  if (payload.length < 12 || bytesToString(payload, 0, 5) !== 'Adobe') {
    return undefined;
  }
  return payload[11];
}

export function parseComment(payload: Uint8Array): string {
  return new TextDecoder('utf-8').decode(payload);
}
