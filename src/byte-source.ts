import { readFile } from 'node:fs/promises';
import { IoError, describeError } from './errors.js';

export type SeekOrigin = 'start' | 'current' | 'end';

/**
 * Seekable byte source consumed by BitReader
 */
export interface ByteSource {
  /** Total number of bytes available */
  readonly length: number;
  /** Current cursor position */
  tell(): number;
  /** Move the cursor; returns the new absolute position */
  seek(offset: number, origin?: SeekOrigin): number;
  /** Next byte, or -1 at end of stream */
  readByte(): number;
  /** Up to `count` bytes; shorter only at end of stream */
  read(count: number): Uint8Array;
}

/**
 * In-memory source over a byte array
 */
export class MemorySource implements ByteSource {
  private readonly data: Uint8Array;
  private position = 0;

  constructor(data: Uint8Array | ArrayBuffer) {
    this.data = data instanceof Uint8Array ? data : new Uint8Array(data);
  }

  get length(): number {
    return this.data.length;
  }

  /** Underlying bytes (shared, not copied) */
  get bytes(): Uint8Array {
    return this.data;
  }

  tell(): number {
    return this.position;
  }

  seek(offset: number, origin: SeekOrigin = 'start'): number {
    const base = origin === 'start' ? 0 : origin === 'current' ? this.position : this.data.length;
    const target = base + offset;
    if (!Number.isInteger(target) || target < 0) {
      throw new IoError(`Invalid seek to ${target}`);
    }
    // Seeking past the end is allowed; reads there report end of stream.
    this.position = target;
    return target;
  }

  readByte(): number {
    if (this.position >= this.data.length) {
      return -1;
    }
    return this.data[this.position++];
  }

  read(count: number): Uint8Array {
    const start = Math.min(this.position, this.data.length);
    const end = Math.min(start + Math.max(0, count), this.data.length);
    this.position = end;
    return this.data.subarray(start, end);
  }
}

/**
 * Load a file into a MemorySource
 */
export async function readSource(path: string): Promise<MemorySource> {
  try {
    return new MemorySource(await readFile(path));
  } catch (err) {
    throw new IoError(`Failed to read ${path}: ${describeError(err)}`, { cause: err });
  }
}
