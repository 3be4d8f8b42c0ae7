/**
 * GIF assembly for tests, with a literal-only LZW encoder
 */

import { interlacedRows } from '../decoders/gif-decoder.js';
import { stringToBytes } from '../utils.js';

type Rgb = readonly [number, number, number];

/**
 * LSB-first code packer
 */
class CodeWriter {
  private readonly bytes: number[] = [];
  private buffer = 0;
  private bits = 0;

  write(code: number, size: number): void {
    this.buffer |= code << this.bits;
    this.bits += size;
    while (this.bits >= 8) {
      this.bytes.push(this.buffer & 0xff);
      this.buffer >>>= 8;
      this.bits -= 8;
    }
  }

  finish(): Uint8Array {
    if (this.bits > 0) {
      this.bytes.push(this.buffer & 0xff);
    }
    return Uint8Array.from(this.bytes);
  }
}

/**
 * Encode indices as one literal code each. The dictionary grows in step
 * with a decoder's, and a clear code is sent before it fills up.
 */
export function encodeLzw(indices: ArrayLike<number>, minCodeSize: number): Uint8Array {
  const clearCode = 1 << minCodeSize;
  const endCode = clearCode + 1;
  const writer = new CodeWriter();
  let codeSize = minCodeSize + 1;
  let nextCode = endCode + 1;
  let first = true;

  writer.write(clearCode, codeSize);
  for (let i = 0; i < indices.length; i++) {
    writer.write(indices[i], codeSize);
    if (first) {
      first = false;
      continue;
    }
    nextCode++;
    if (nextCode === 1 << codeSize && codeSize < 12) {
      codeSize++;
    }
    if (nextCode >= 4000) {
      writer.write(clearCode, codeSize);
      codeSize = minCodeSize + 1;
      nextCode = endCode + 1;
      first = true;
    }
  }
  writer.write(endCode, codeSize);
  return writer.finish();
}

/**
 * Frame data split into sub-blocks of at most 255 bytes, zero-terminated
 */
export function toSubBlocks(data: Uint8Array): number[] {
  const out: number[] = [];
  for (let offset = 0; offset < data.length; offset += 255) {
    const block = data.subarray(offset, offset + 255);
    out.push(block.length, ...block);
  }
  out.push(0);
  return out;
}

function tableBits(palette: readonly Rgb[]): number {
  let bits = 1;
  while (1 << bits < palette.length) {
    bits++;
  }
  return bits;
}

function colorTable(palette: readonly Rgb[]): number[] {
  const size = 1 << tableBits(palette);
  const out: number[] = [];
  for (let i = 0; i < size; i++) {
    const entry = palette[i] ?? [0, 0, 0];
    out.push(entry[0], entry[1], entry[2]);
  }
  return out;
}

export interface GifFrameFixture {
  left?: number;
  top?: number;
  width: number;
  height: number;
  /** Colour indices in display order */
  indices: ArrayLike<number>;
  localPalette?: readonly Rgb[];
  interlaced?: boolean;
  transparentIndex?: number;
  /** Delay in hundredths of a second; set to add a graphic control extension */
  delayCs?: number;
  disposal?: number;
  /** Override the LZW minimum code size */
  minCodeSize?: number;
  /** Raw image data bytes to use instead of encoding `indices` */
  data?: Uint8Array;
}

export interface GifFixture {
  width: number;
  height: number;
  version?: '87a' | '89a';
  globalPalette?: readonly Rgb[];
  backgroundIndex?: number;
  loopCount?: number;
  comment?: string;
  frames: GifFrameFixture[];
  trailer?: boolean;
}

export function buildGif(fixture: GifFixture): Uint8Array {
  const out: number[] = [...stringToBytes(`GIF${fixture.version ?? '89a'}`)];
  const u16 = (value: number): void => {
    out.push(value & 0xff, (value >> 8) & 0xff);
  };

  u16(fixture.width);
  u16(fixture.height);
  const global = fixture.globalPalette;
  out.push(global ? 0x80 | 0x70 | (tableBits(global) - 1) : 0x70);
  out.push(fixture.backgroundIndex ?? 0, 0);
  if (global) {
    out.push(...colorTable(global));
  }

  if (fixture.loopCount !== undefined) {
    out.push(0x21, 0xff, 11, ...stringToBytes('NETSCAPE2.0'), 3, 1);
    u16(fixture.loopCount);
    out.push(0);
  }
  if (fixture.comment !== undefined) {
    out.push(0x21, 0xfe, ...toSubBlocks(stringToBytes(fixture.comment)));
  }

  for (const frame of fixture.frames) {
    if (frame.delayCs !== undefined || frame.transparentIndex !== undefined || frame.disposal !== undefined) {
      const transparent = frame.transparentIndex !== undefined;
      out.push(0x21, 0xf9, 4, ((frame.disposal ?? 0) << 2) | (transparent ? 1 : 0));
      u16(frame.delayCs ?? 0);
      out.push(frame.transparentIndex ?? 0, 0);
    }

    out.push(0x2c);
    u16(frame.left ?? 0);
    u16(frame.top ?? 0);
    u16(frame.width);
    u16(frame.height);
    const local = frame.localPalette;
    out.push((local ? 0x80 | (tableBits(local) - 1) : 0) | (frame.interlaced ? 0x40 : 0));
    if (local) {
      out.push(...colorTable(local));
    }

    const palette = local ?? global ?? [];
    const minCodeSize = frame.minCodeSize ?? Math.max(2, tableBits(palette));
    let indices: ArrayLike<number> = frame.indices;
    if (frame.interlaced) {
      const ordered: number[] = [];
      for (const y of interlacedRows(frame.height)) {
        for (let x = 0; x < frame.width; x++) {
          ordered.push(frame.indices[y * frame.width + x]);
        }
      }
      indices = ordered;
    }
    out.push(minCodeSize, ...toSubBlocks(frame.data ?? encodeLzw(indices, minCodeSize)));
  }

  if (fixture.trailer !== false) {
    out.push(0x3b);
  }
  return Uint8Array.from(out);
}
