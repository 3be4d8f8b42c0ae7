/**
 * Entropy-coded scan handling: data collection, restart intervals and
 * Huffman coefficient decoding for sequential and progressive scans
 * (ITU T.81 F.2.2, G.1.2).
 */

import type { Logger } from 'pino';
import { BitReader } from './bit-reader.js';
import { DecodeError, IoError } from './errors.js';
import { decodeHuffman, receiveExtend } from './jpeg-huffman.js';
import type { HuffmanTable } from './jpeg-huffman.js';
import { ZIGZAG_TO_NATURAL } from './jpeg-idct.js';
import { isRestartMarker } from './jpeg-markers.js';
import type { FrameComponent, JpegFrame, ScanData, ScanParameters } from './jpeg-types.js';

/**
 * Read entropy-coded bytes following an SOS header. Stuffed 0xFF00 pairs
 * collapse to 0xFF, fill bytes are dropped and RSTn boundaries recorded.
 * The reader is left on the marker that ends the scan.
 */
export function collectScanData(reader: BitReader): ScanData {
  reader.clearBuffer();
  const bytes = new Uint8Array(reader.bytesLeft());
  const restarts: number[] = [];
  let length = 0;

  while (reader.bytesLeft() > 0) {
    const byte = reader.readU8();
    if (byte !== 0xff) {
      bytes[length++] = byte;
      continue;
    }

    let next = -1;
    while (reader.bytesLeft() > 0) {
      next = reader.readU8();
      if (next !== 0xff) break;
    }
    if (next === 0x00) {
      bytes[length++] = 0xff;
    } else if (next >= 0 && isRestartMarker(0xff00 | next)) {
      restarts.push(length);
    } else if (next > 0) {
      reader.seek(-2, 'current');
      break;
    }
  }

  return { bytes: bytes.slice(0, length), restarts };
}

/**
 * Block decoder plugged into runScan
 */
export interface ScanBlockDecoder {
  /** Called at the start of every restart interval; `end` is the interval's end offset */
  restart(end: number): void;
  decodeBlock(component: FrameComponent, slot: number, blockOffset: number): void;
}

/**
 * Walk the MCUs (or single-component blocks) of a scan, honouring the
 * restart interval. At every interval the reader is byte-aligned and moved
 * to the interval's first byte. Exhausted data ends the interval early and
 * leaves its remaining blocks untouched.
 */
export function runScan(
  frame: JpegFrame,
  scan: ScanParameters,
  data: ScanData,
  reader: BitReader,
  restartInterval: number,
  blocks: ScanBlockDecoder,
  logger: Logger
): void {
  const components = scan.components;
  const single = components.length === 1;
  const first = components[0];
  const totalUnits = single
    ? first.blocksPerLine * first.blocksPerColumn
    : frame.mcusPerLine * frame.mcusPerColumn;
  const interval = restartInterval > 0 ? restartInterval : totalUnits;
  const intervalStarts = [0, ...data.restarts];

  let unit = 0;
  for (let segment = 0; unit < totalUnits; segment++) {
    if (segment >= intervalStarts.length) {
      logger.warn({ unit, totalUnits }, 'Scan ended before all restart intervals were seen');
      return;
    }
    reader.seek(intervalStarts[segment]);
    for (const component of components) {
      component.pred = 0;
    }
    blocks.restart(intervalStarts[segment + 1] ?? data.bytes.length);

    const end = Math.min(unit + interval, totalUnits);
    try {
      for (; unit < end; unit++) {
        if (single) {
          const row = Math.floor(unit / first.blocksPerLine);
          const col = unit % first.blocksPerLine;
          blocks.decodeBlock(first, 0, (row * first.blocksPerLineForMcu + col) * 64);
          continue;
        }
        const mcuRow = Math.floor(unit / frame.mcusPerLine);
        const mcuCol = unit % frame.mcusPerLine;
        for (let slot = 0; slot < components.length; slot++) {
          const component = components[slot];
          for (let v = 0; v < component.v; v++) {
            const row = mcuRow * component.v + v;
            for (let h = 0; h < component.h; h++) {
              const col = mcuCol * component.h + h;
              blocks.decodeBlock(component, slot, (row * component.blocksPerLineForMcu + col) * 64);
            }
          }
        }
      }
    } catch (err) {
      if (!(err instanceof IoError)) {
        throw err;
      }
      logger.warn({ unit, segment }, 'Entropy-coded data exhausted');
      unit = end;
    }
  }
}

/**
 * Huffman block decoding for every DCT scan type
 */
export class HuffmanScanDecoder implements ScanBlockDecoder {
  private readonly reader: BitReader;
  private readonly scan: ScanParameters;
  private readonly dcTables: (HuffmanTable | undefined)[];
  private readonly acTables: (HuffmanTable | undefined)[];
  private readonly progressive: boolean;
  private eobrun = 0;

  constructor(
    reader: BitReader,
    scan: ScanParameters,
    dcTables: (HuffmanTable | undefined)[],
    acTables: (HuffmanTable | undefined)[],
    progressive: boolean
  ) {
    this.reader = reader;
    this.scan = scan;
    this.dcTables = dcTables;
    this.acTables = acTables;
    this.progressive = progressive;
  }

  restart(): void {
    this.eobrun = 0;
  }

  private table(tables: (HuffmanTable | undefined)[], slot: number, kind: 'DC' | 'AC'): HuffmanTable {
    const table = tables[slot];
    if (!table) {
      const selector = kind === 'DC' ? this.scan.dcSelectors[slot] : this.scan.acSelectors[slot];
      throw new DecodeError(`Scan references undefined ${kind} Huffman table ${selector}`);
    }
    return table;
  }

  decodeBlock(component: FrameComponent, slot: number, offset: number): void {
    if (!this.progressive) {
      this.decodeSequential(component, slot, offset);
    } else if (this.scan.ss === 0) {
      if (this.scan.ah === 0) {
        this.decodeDcFirst(component, slot, offset);
      } else {
        this.decodeDcRefine(component, offset);
      }
    } else if (this.scan.ah === 0) {
      this.decodeAcFirst(component, slot, offset);
    } else {
      this.decodeAcRefine(component, slot, offset);
    }
  }

  private decodeSequential(component: FrameComponent, slot: number, offset: number): void {
    const reader = this.reader;
    const coefficients = component.coefficients;
    const dcTable = this.table(this.dcTables, slot, 'DC');
    const acTable = this.table(this.acTables, slot, 'AC');

    const t = decodeHuffman(reader, dcTable);
    component.pred += receiveExtend(reader, t);
    coefficients[offset] = component.pred;

    let k = 1;
    while (k < 64) {
      const rs = decodeHuffman(reader, acTable);
      const s = rs & 15;
      const r = rs >> 4;
      if (s === 0) {
        if (r < 15) break;
        k += 16;
        continue;
      }
      k += r;
      if (k > 63) break;
      coefficients[offset + ZIGZAG_TO_NATURAL[k]] = receiveExtend(reader, s);
      k++;
    }
  }

  private decodeDcFirst(component: FrameComponent, slot: number, offset: number): void {
    const t = decodeHuffman(this.reader, this.table(this.dcTables, slot, 'DC'));
    component.pred += receiveExtend(this.reader, t);
    component.coefficients[offset] = component.pred * (1 << this.scan.al);
  }

  private decodeDcRefine(component: FrameComponent, offset: number): void {
    if (this.reader.readBit()) {
      component.coefficients[offset] |= 1 << this.scan.al;
    }
  }

  private decodeAcFirst(component: FrameComponent, slot: number, offset: number): void {
    if (this.eobrun > 0) {
      this.eobrun--;
      return;
    }
    const reader = this.reader;
    const acTable = this.table(this.acTables, slot, 'AC');
    const coefficients = component.coefficients;
    const { se, al } = this.scan;

    let k = this.scan.ss;
    while (k <= se) {
      const rs = decodeHuffman(reader, acTable);
      const s = rs & 15;
      const r = rs >> 4;
      if (s === 0) {
        if (r < 15) {
          this.eobrun = (1 << r) - 1 + reader.readBits(r);
          break;
        }
        k += 16;
        continue;
      }
      k += r;
      if (k > 63) break;
      coefficients[offset + ZIGZAG_TO_NATURAL[k]] = receiveExtend(reader, s) * (1 << al);
      k++;
    }
  }

  private refineNonZero(coefficients: Int32Array, position: number, p1: number): void {
    if (this.reader.readBit() && (coefficients[position] & p1) === 0) {
      coefficients[position] += coefficients[position] >= 0 ? p1 : -p1;
    }
  }

  private decodeAcRefine(component: FrameComponent, slot: number, offset: number): void {
    const reader = this.reader;
    const coefficients = component.coefficients;
    const { se } = this.scan;
    const p1 = 1 << this.scan.al;
    let k = this.scan.ss;

    if (this.eobrun === 0) {
      const acTable = this.table(this.acTables, slot, 'AC');
      for (; k <= se; k++) {
        const rs = decodeHuffman(reader, acTable);
        let r = rs >> 4;
        let value = 0;
        if ((rs & 15) !== 0) {
          value = reader.readBit() ? p1 : -p1;
        } else if (r !== 15) {
          this.eobrun = 1 << r;
          if (r > 0) {
            this.eobrun += reader.readBits(r);
          }
          break;
        }

        // Skip r zero-history coefficients, refining nonzero ones on the way.
        while (k <= se) {
          const position = offset + ZIGZAG_TO_NATURAL[k];
          if (coefficients[position] !== 0) {
            this.refineNonZero(coefficients, position, p1);
          } else {
            if (r === 0) break;
            r--;
          }
          k++;
        }
        if (value !== 0 && k <= se) {
          coefficients[offset + ZIGZAG_TO_NATURAL[k]] = value;
        }
      }
    }

    if (this.eobrun > 0) {
      for (; k <= se; k++) {
        const position = offset + ZIGZAG_TO_NATURAL[k];
        if (coefficients[position] !== 0) {
          this.refineNonZero(coefficients, position, p1);
        }
      }
      this.eobrun--;
    }
  }
}
