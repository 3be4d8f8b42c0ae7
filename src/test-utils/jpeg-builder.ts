/**
 * Hand-assembled JPEG segments for tests, plus an arithmetic encoder that
 * mirrors ArithmeticDecoder (ITU T.81 D.1)
 */

import { QE_TABLE } from '../jpeg-arithmetic.js';
import { JpegMarker } from '../jpeg-markers.js';
import { stringToBytes } from '../utils.js';

export function segment(marker: JpegMarker, payload: ArrayLike<number> = []): Uint8Array {
  const length = payload.length + 2;
  const out = new Uint8Array(payload.length + 4);
  out[0] = 0xff;
  out[1] = marker & 0xff;
  out[2] = length >> 8;
  out[3] = length & 0xff;
  out.set(Array.from(payload), 4);
  return out;
}

export function marker(code: JpegMarker): Uint8Array {
  return new Uint8Array([0xff, code & 0xff]);
}

/** 8-bit DQT with 64 entries in zig-zag order */
export function dqt(id: number, values: ArrayLike<number>): Uint8Array {
  return segment(JpegMarker.DQT, [id, ...Array.from(values)]);
}

/** DQT table of all ones */
export function unitDqt(id = 0): Uint8Array {
  return dqt(id, new Array<number>(64).fill(1));
}

/**
 * DHT for one table
 *
 * @param counts - Codes of each length 1..16 (shorter arrays are zero-padded)
 */
export function dht(tableClass: number, id: number, counts: readonly number[], values: readonly number[]): Uint8Array {
  const lengths = Array.from({ length: 16 }, (_, i) => counts[i] ?? 0);
  return segment(JpegMarker.DHT, [(tableClass << 4) | id, ...lengths, ...values]);
}

export interface SofComponent {
  id: number;
  h?: number;
  v?: number;
  tq?: number;
}

export function sof(
  code: JpegMarker,
  width: number,
  height: number,
  components: readonly SofComponent[],
  precision = 8
): Uint8Array {
  const payload = [precision, height >> 8, height & 0xff, width >> 8, width & 0xff, components.length];
  for (const component of components) {
    payload.push(component.id, ((component.h ?? 1) << 4) | (component.v ?? 1), component.tq ?? 0);
  }
  return segment(code, payload);
}

export interface SosComponent {
  id: number;
  td?: number;
  ta?: number;
}

export function sos(components: readonly SosComponent[], ss = 0, se = 63, ah = 0, al = 0): Uint8Array {
  const payload = [components.length];
  for (const component of components) {
    payload.push(component.id, ((component.td ?? 0) << 4) | (component.ta ?? 0));
  }
  payload.push(ss, se, (ah << 4) | al);
  return segment(JpegMarker.SOS, payload);
}

export function dri(interval: number): Uint8Array {
  return segment(JpegMarker.DRI, [interval >> 8, interval & 0xff]);
}

export function com(text: string): Uint8Array {
  return segment(JpegMarker.COM, stringToBytes(text));
}

/** JFIF 1.02 APP0, 72x72 dpi, no thumbnail */
export function jfifApp0(): Uint8Array {
  return segment(JpegMarker.APP0, [...stringToBytes('JFIF\0'), 1, 2, 1, 0, 72, 0, 72, 0, 0]);
}

export function adobeApp14(transform: number): Uint8Array {
  return segment(JpegMarker.APP14, [...stringToBytes('Adobe'), 0, 100, 0, 0, 0, 0, transform]);
}

/**
 * Concatenate parts between SOI and (optionally) EOI
 */
export function buildJpeg(parts: readonly Uint8Array[], withEoi = true): Uint8Array {
  const all = [marker(JpegMarker.SOI), ...parts, ...(withEoi ? [marker(JpegMarker.EOI)] : [])];
  const out = new Uint8Array(all.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of all) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Baseline 8x8 greyscale JPEG whose only coefficient is DC = 80 with an
 * all-ones quantization table, so every sample decodes to 128 + 80 / 8.
 *
 * The DC table has a single one-bit code for category 7 and the AC table a
 * single one-bit code for EOB: 0 1010000 0, padded with ones.
 */
export const FLAT_GREY_VALUE = 138;

export function flatGreyJpeg(options: { withEoi?: boolean; comment?: string } = {}): Uint8Array {
  const parts = [
    jfifApp0(),
    unitDqt(),
    sof(JpegMarker.SOF0, 8, 8, [{ id: 1 }]),
    dht(0, 0, [1], [7]),
    dht(1, 0, [1], [0x00]),
    ...(options.comment !== undefined ? [com(options.comment)] : []),
    sos([{ id: 1 }]),
    new Uint8Array([0x50, 0x7f])
  ];
  return buildJpeg(parts, options.withEoi ?? true);
}

/**
 * Binary arithmetic encoder, the counterpart of ArithmeticDecoder
 */
export class ArithmeticEncoder {
  private c = 0;
  private a = 0x10000;
  private ct = 11;
  private sc = 0;
  private zc = 0;
  private buffer = -1;
  private readonly out: number[] = [];

  private emit(byte: number): void {
    this.out.push(byte);
    if (byte === 0xff) {
      this.out.push(0x00);
    }
  }

  private flushZeros(): void {
    for (; this.zc > 0; this.zc--) {
      this.out.push(0x00);
    }
  }

  encode(stats: Uint8Array, index: number, value: number): void {
    const state = stats[index];
    const entry = QE_TABLE[state & 0x7f];
    const qe = entry.qe;
    const mps = state & 0x80;

    this.a -= qe;
    if (value !== state >> 7) {
      if (this.a >= qe) {
        this.c += this.a;
        this.a = qe;
      }
      stats[index] = (entry.switchMps ? mps ^ 0x80 : mps) | entry.nextLps;
    } else {
      if (this.a >= 0x8000) {
        return;
      }
      if (this.a < qe) {
        this.c += this.a;
        this.a = qe;
      }
      stats[index] = mps | entry.nextMps;
    }

    do {
      this.a *= 2;
      this.c *= 2;
      if (--this.ct === 0) {
        const temp = this.c >>> 19;
        if (temp > 0xff) {
          if (this.buffer >= 0) {
            this.flushZeros();
            this.emit(this.buffer + 1);
          }
          this.zc += this.sc;
          this.sc = 0;
          this.buffer = temp & 0xff;
        } else if (temp === 0xff) {
          this.sc++;
        } else {
          if (this.buffer === 0) {
            this.zc++;
          } else if (this.buffer >= 0) {
            this.flushZeros();
            this.emit(this.buffer);
          }
          if (this.sc > 0) {
            this.flushZeros();
            for (; this.sc > 0; this.sc--) {
              this.emit(0xff);
            }
          }
          this.buffer = temp & 0xff;
        }
        this.c &= 0x7ffff;
        this.ct += 8;
      }
    } while (this.a < 0x8000);
  }

  /** Flush the coder; the result is byte-stuffed entropy data */
  finish(): Uint8Array {
    const temp = (this.a - 1 + this.c) & 0xffff0000;
    this.c = temp < this.c ? temp + 0x8000 : temp;
    this.c *= 2 ** this.ct;

    if (this.c >= 0x8000000) {
      if (this.buffer >= 0) {
        this.flushZeros();
        this.emit(this.buffer + 1);
      }
      this.zc += this.sc;
      this.sc = 0;
    } else {
      if (this.buffer === 0) {
        this.zc++;
      } else if (this.buffer >= 0) {
        this.flushZeros();
        this.emit(this.buffer);
      }
      if (this.sc > 0) {
        this.flushZeros();
        for (; this.sc > 0; this.sc--) {
          this.emit(0xff);
        }
      }
    }

    if (this.c % 0x8000000 >= 0x800) {
      this.flushZeros();
      const high = Math.floor(this.c / 2 ** 19) & 0xff;
      this.emit(high);
      if (Math.floor(this.c / 2 ** 11) & 0xff) {
        this.emit(Math.floor(this.c / 2 ** 11) & 0xff);
      }
    }
    return Uint8Array.from(this.out);
  }
}

/**
 * Statistics for one component coded with DC/AC conditioning table 0
 */
export class ArithmeticBlockEncoder {
  private readonly dcStats = new Uint8Array(64);
  private readonly acStats = new Uint8Array(256);
  private readonly fixedBin = new Uint8Array([113]);
  private dcContext = 0;
  private lastDc = 0;

  constructor(
    private readonly encoder: ArithmeticEncoder,
    private readonly dcL = 0,
    private readonly dcU = 1,
    private readonly kx = 5
  ) {}

  /** Encode the magnitude category and bits of v - 1 (F.1.4.1, F.1.4.4) */
  private encodeMagnitude(stats: Uint8Array, st: number, v: number, large: number, isAc: boolean): number {
    let m = 0;
    const value = v - 1;
    if (value) {
      this.encoder.encode(stats, st, 1);
      m = 1;
      let v2 = value;
      if (isAc) {
        v2 >>= 1;
        if (v2) {
          this.encoder.encode(stats, st, 1);
          m <<= 1;
          st = large;
          while ((v2 >>= 1)) {
            this.encoder.encode(stats, st, 1);
            m <<= 1;
            st++;
          }
        }
      } else {
        st = large;
        while ((v2 >>= 1)) {
          this.encoder.encode(stats, st, 1);
          m <<= 1;
          st++;
        }
      }
    }
    this.encoder.encode(stats, st, 0);
    const category = m;
    st += 14;
    while ((m >>= 1)) {
      this.encoder.encode(stats, st, m & value ? 1 : 0);
    }
    return category;
  }

  /**
   * Encode one block given in zig-zag order
   */
  encodeBlock(block: ArrayLike<number>): void {
    const dcStats = this.dcStats;
    let st = this.dcContext;
    let v = block[0] - this.lastDc;
    if (v === 0) {
      this.encoder.encode(dcStats, st, 0);
      this.dcContext = 0;
    } else {
      this.lastDc = block[0];
      this.encoder.encode(dcStats, st, 1);
      if (v > 0) {
        this.encoder.encode(dcStats, st + 1, 0);
        st += 2;
        this.dcContext = 4;
      } else {
        v = -v;
        this.encoder.encode(dcStats, st + 1, 1);
        st += 3;
        this.dcContext = 8;
      }
      const m = this.encodeMagnitude(dcStats, st, v, 20, false);
      if (m < (1 << this.dcL) >> 1) {
        this.dcContext = 0;
      } else if (m > (1 << this.dcU) >> 1) {
        this.dcContext += 8;
      }
    }

    const acStats = this.acStats;
    let last = 63;
    while (last > 0 && block[last] === 0) {
      last--;
    }
    let k = 1;
    for (; k <= last; k++) {
      st = 3 * (k - 1);
      this.encoder.encode(acStats, st, 0);
      while (block[k] === 0) {
        this.encoder.encode(acStats, st + 1, 0);
        st += 3;
        k++;
      }
      this.encoder.encode(acStats, st + 1, 1);
      let value = block[k];
      if (value > 0) {
        this.encoder.encode(this.fixedBin, 0, 0);
      } else {
        value = -value;
        this.encoder.encode(this.fixedBin, 0, 1);
      }
      this.encodeMagnitude(acStats, st + 2, value, k <= this.kx ? 189 : 217, true);
    }
    if (k <= 63) {
      this.encoder.encode(acStats, 3 * (k - 1), 1);
    }
  }
}
