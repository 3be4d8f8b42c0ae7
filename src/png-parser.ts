import { BitReader } from './bit-reader.js';
import { DecodeError, UnsupportedFormatError } from './errors.js';
import type { PngChunk, PngHeader } from './types.js';
import { crc32, bytesToString, isPngSignature, readUInt32BE, stringToBytes } from './utils.js';

const MAX_CHUNK_LENGTH = 0x7fffffff;

/**
 * Walks the chunk stream of a PNG file
 */
export class PngParser {
  private readonly reader: BitReader;

  constructor(reader: BitReader) {
    this.reader = reader;
    if (!isPngSignature(reader.peekBytes(8))) {
      throw new UnsupportedFormatError('Invalid PNG signature');
    }
    reader.skip(8);
  }

  /**
   * Read the next chunk, or null once the data is exhausted
   */
  readChunk(): PngChunk | null {
    if (this.reader.bytesLeft() === 0) {
      return null;
    }

    const length = this.reader.readU32();
    if (length > MAX_CHUNK_LENGTH) {
      throw new DecodeError(`Chunk length ${length} exceeds 2^31-1`);
    }
    const type = bytesToString(this.reader.readBytes(4));
    const data = this.reader.readBytes(length);
    const crc = this.reader.readU32();

    return { length, type, data, crc };
  }

  /**
   * Read all chunks from the PNG file
   */
  readAllChunks(): PngChunk[] {
    const chunks: PngChunk[] = [];
    let chunk: PngChunk | null;

    while ((chunk = this.readChunk()) !== null) {
      chunks.push(chunk);
    }

    return chunks;
  }

  /**
   * CRC over chunk type and data
   */
  static computeCrc(chunk: Pick<PngChunk, 'type' | 'data'>): number {
    const typeCrc = crc32(stringToBytes(chunk.type));
    return crc32(chunk.data, 0, chunk.data.length, typeCrc);
  }

  static hasValidCrc(chunk: PngChunk): boolean {
    return PngParser.computeCrc(chunk) === chunk.crc;
  }

  /** Ancillary chunks have bit 5 set in the first type byte (lowercase) */
  static isCritical(type: string): boolean {
    return (type.charCodeAt(0) & 0x20) === 0;
  }

  /**
   * Parse IHDR chunk to get image header information
   */
  static parseHeader(chunk: PngChunk): PngHeader {
    if (chunk.type !== 'IHDR') {
      throw new DecodeError('Not an IHDR chunk');
    }

    if (chunk.data.length !== 13) {
      throw new DecodeError('Invalid IHDR chunk length');
    }

    return {
      width: readUInt32BE(chunk.data, 0),
      height: readUInt32BE(chunk.data, 4),
      bitDepth: chunk.data[8],
      colorType: chunk.data[9],
      compressionMethod: chunk.data[10],
      filterMethod: chunk.data[11],
      interlaceMethod: chunk.data[12]
    };
  }
}

/**
 * Parse PNG file and return all chunks
 */
export function parsePngChunks(data: Uint8Array): PngChunk[] {
  return new PngParser(BitReader.fromBytes(data)).readAllChunks();
}

/**
 * Parse PNG file and return header information
 */
export function parsePngHeader(data: Uint8Array): PngHeader {
  const first = new PngParser(BitReader.fromBytes(data)).readChunk();
  if (!first || first.type !== 'IHDR') {
    throw new DecodeError('First chunk must be IHDR');
  }
  return PngParser.parseHeader(first);
}
