/**
 * Adaptive binary arithmetic decoding for sequential JPEG (ITU T.81 Annex D, F.2.4)
 */

import { readFileSync } from 'node:fs';
import type { BitReader } from './bit-reader.js';
import { DecodeError } from './errors.js';
import { ZIGZAG_TO_NATURAL } from './jpeg-idct.js';
import type { FrameComponent } from './jpeg-types.js';

interface QeEntry {
  qe: number;
  nextLps: number;
  nextMps: number;
  switchMps: boolean;
}

function loadQeTable(): QeEntry[] {
  const url = new URL('../data/jpeg-arithmetic-qe.json', import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, 'utf8'));
  if (!Array.isArray(parsed)) {
    throw new DecodeError('Arithmetic probability table is not an array');
  }
  return parsed.map((entry: unknown, index): QeEntry => {
    if (
      typeof entry !== 'object' ||
      entry === null ||
      !('qe' in entry) ||
      !('nextLps' in entry) ||
      !('nextMps' in entry) ||
      !('switchMps' in entry) ||
      typeof entry.qe !== 'number' ||
      typeof entry.nextLps !== 'number' ||
      typeof entry.nextMps !== 'number' ||
      typeof entry.switchMps !== 'boolean'
    ) {
      throw new DecodeError(`Malformed arithmetic probability entry ${index}`);
    }
    return { qe: entry.qe, nextLps: entry.nextLps, nextMps: entry.nextMps, switchMps: entry.switchMps };
  });
}

/** Table D.2 plus the fixed 0.5 probability state at index 113 */
export const QE_TABLE: readonly QeEntry[] = loadQeTable();

/** Statistics index of the fixed-probability bin used for AC signs */
export const FIXED_BIN_STATE = 113;

/**
 * Decoder for one entropy-coded segment. Statistics bins are bytes holding
 * the MPS sense in bit 7 and the Table D.2 index in bits 0-6.
 */
export class ArithmeticDecoder {
  private readonly reader: BitReader;
  private c = 0;
  private a = 0;
  private ct = -16;
  private end = Number.POSITIVE_INFINITY;

  constructor(reader: BitReader) {
    this.reader = reader;
  }

  /** Restart decoding at the reader's current position, stopping input at `end` */
  reset(end: number = Number.POSITIVE_INFINITY): void {
    this.c = 0;
    this.a = 0;
    this.ct = -16;
    this.end = end;
  }

  private nextByte(): number {
    // Past the end of the segment the decoder is fed zeros.
    return this.reader.tell() < this.end && this.reader.bytesLeft() > 0 ? this.reader.readU8() : 0;
  }

  decode(stats: Uint8Array, index: number): number {
    // Renormalisation and byte input (D.2.6)
    while (this.a < 0x8000) {
      this.ct--;
      if (this.ct < 0) {
        this.c = this.c * 256 + this.nextByte();
        this.ct += 8;
        if (this.ct < 0) {
          this.ct++;
          if (this.ct === 0) {
            // Two initial bytes loaded; A becomes 0x10000 after the shift below.
            this.a = 0x8000;
          }
        }
      }
      this.a *= 2;
    }

    let state = stats[index];
    const entry = QE_TABLE[state & 0x7f];
    const qe = entry.qe;
    const mps = state & 0x80;
    const afterMps = mps | entry.nextMps;
    const afterLps = (entry.switchMps ? mps ^ 0x80 : mps) | entry.nextLps;

    this.a -= qe;
    const scaled = this.a * 2 ** this.ct;
    if (this.c >= scaled) {
      this.c -= scaled;
      if (this.a < qe) {
        this.a = qe;
        stats[index] = afterMps;
      } else {
        this.a = qe;
        stats[index] = afterLps;
        state ^= 0x80;
      }
    } else if (this.a < 0x8000) {
      if (this.a < qe) {
        stats[index] = afterLps;
        state ^= 0x80;
      } else {
        stats[index] = afterMps;
      }
    }

    return state >> 7;
  }
}

/**
 * Per-table conditioning from DAC segments (defaults L=0, U=1, Kx=5)
 */
export interface ArithmeticConditioningTables {
  dcL: Uint8Array;
  dcU: Uint8Array;
  acK: Uint8Array;
}

export function createConditioningTables(): ArithmeticConditioningTables {
  return {
    dcL: new Uint8Array(4),
    dcU: new Uint8Array(4).fill(1),
    acK: new Uint8Array(4).fill(5),
  };
}

/**
 * Per-scan arithmetic decoding state
 */
export class ArithmeticScanState {
  readonly dcStats: Uint8Array[];
  readonly acStats: Uint8Array[];
  readonly fixedBin = new Uint8Array([FIXED_BIN_STATE]);
  readonly dcContext: Int32Array;
  private readonly conditioning: ArithmeticConditioningTables;

  constructor(componentCount: number, conditioning: ArithmeticConditioningTables) {
    this.dcStats = Array.from({ length: 4 }, () => new Uint8Array(64));
    this.acStats = Array.from({ length: 4 }, () => new Uint8Array(256));
    this.dcContext = new Int32Array(componentCount);
    this.conditioning = conditioning;
  }

  restart(): void {
    for (const stats of this.dcStats) stats.fill(0);
    for (const stats of this.acStats) stats.fill(0);
    this.dcContext.fill(0);
    this.fixedBin[0] = FIXED_BIN_STATE;
  }

  /**
   * Decode one sequential-mode block (F.2.4.1, F.2.4.2) into natural order
   */
  decodeBlock(
    decoder: ArithmeticDecoder,
    component: FrameComponent,
    slot: number,
    dcTable: number,
    acTable: number,
    blockOffset: number
  ): void {
    const coefficients = component.coefficients;

    // DC coefficient
    const dcStats = this.dcStats[dcTable];
    let st = this.dcContext[slot];
    if (decoder.decode(dcStats, st) === 0) {
      this.dcContext[slot] = 0;
    } else {
      const sign = decoder.decode(dcStats, st + 1);
      st += 2 + sign;
      let m = decoder.decode(dcStats, st);
      if (m !== 0) {
        st = 20;
        while (decoder.decode(dcStats, st)) {
          m <<= 1;
          if (m === 0x8000) {
            throw new DecodeError('Corrupt arithmetic-coded DC magnitude');
          }
          st++;
        }
      }
      if (m < (1 << this.conditioning.dcL[dcTable]) >> 1) {
        this.dcContext[slot] = 0;
      } else if (m > (1 << this.conditioning.dcU[dcTable]) >> 1) {
        this.dcContext[slot] = 12 + sign * 4;
      } else {
        this.dcContext[slot] = 4 + sign * 4;
      }
      let v = m;
      st += 14;
      while ((m >>= 1)) {
        if (decoder.decode(dcStats, st)) v |= m;
      }
      v += 1;
      component.pred += sign ? -v : v;
    }
    coefficients[blockOffset] = component.pred;

    // AC coefficients
    const acStats = this.acStats[acTable];
    const kx = this.conditioning.acK[acTable];
    for (let k = 1; k <= 63; k++) {
      st = 3 * (k - 1);
      if (decoder.decode(acStats, st)) {
        break; // EOB
      }
      while (decoder.decode(acStats, st + 1) === 0) {
        st += 3;
        k++;
        if (k > 63) {
          throw new DecodeError('Corrupt arithmetic-coded AC run');
        }
      }
      const sign = decoder.decode(this.fixedBin, 0);
      st += 2;
      let m = decoder.decode(acStats, st);
      if (m !== 0) {
        if (decoder.decode(acStats, st)) {
          m <<= 1;
          st = k <= kx ? 189 : 217;
          while (decoder.decode(acStats, st)) {
            m <<= 1;
            if (m === 0x8000) {
              throw new DecodeError('Corrupt arithmetic-coded AC magnitude');
            }
            st++;
          }
        }
      }
      let v = m;
      st += 14;
      while ((m >>= 1)) {
        if (decoder.decode(acStats, st)) v |= m;
      }
      v += 1;
      coefficients[blockOffset + ZIGZAG_TO_NATURAL[k]] = sign ? -v : v;
    }
  }
}
