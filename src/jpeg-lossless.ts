/**
 * Huffman-coded lossless JPEG (ITU T.81 Annex H)
 *
 * Component `coefficients` hold one reconstructed sample per entry over the
 * MCU-padded sample grid.
 */

import type { Logger } from 'pino';
import { BitReader } from './bit-reader.js';
import { DecodeError, IoError } from './errors.js';
import { decodeHuffman, receiveExtend } from './jpeg-huffman.js';
import type { HuffmanTable } from './jpeg-huffman.js';
import type { FrameComponent, JpegFrame, ScanData, ScanParameters } from './jpeg-types.js';

/**
 * Prediction from left (a), above (b) and above-left (c) neighbours
 * (Table H.1)
 */
export function predictSample(selection: number, a: number, b: number, c: number): number {
  switch (selection) {
    case 1:
      return a;
    case 2:
      return b;
    case 3:
      return c;
    case 4:
      return a + b - c;
    case 5:
      return a + ((b - c) >> 1);
    case 6:
      return b + ((a - c) >> 1);
    case 7:
      return (a + b) >> 1;
    default:
      throw new DecodeError(`Invalid lossless predictor ${selection}`);
  }
}

interface LosslessComponentState {
  component: FrameComponent;
  table: HuffmanTable;
  /** Sample row that starts the current restart interval */
  firstRow: number;
}

export function decodeLosslessScan(
  frame: JpegFrame,
  scan: ScanParameters,
  data: ScanData,
  restartInterval: number,
  dcTables: (HuffmanTable | undefined)[],
  logger: Logger
): void {
  const selection = scan.ss;
  const pointTransform = scan.al;
  if (selection < 1 || selection > 7) {
    throw new DecodeError(`Invalid lossless predictor ${selection}`);
  }
  const initial = 1 << (frame.precision - pointTransform - 1);
  const mask = 0xffff;
  const reader = BitReader.fromBytes(data.bytes);

  const states: LosslessComponentState[] = scan.components.map((component, slot) => {
    const table = dcTables[slot];
    if (!table) {
      throw new DecodeError(`Scan references undefined DC Huffman table ${scan.dcSelectors[slot]}`);
    }
    return { component, table, firstRow: 0 };
  });

  const decodeSample = (state: LosslessComponentState, x: number, y: number): void => {
    const { component } = state;
    const stride = component.blocksPerLineForMcu;
    const samples = component.coefficients;
    const index = y * stride + x;

    let prediction: number;
    if (y === state.firstRow) {
      prediction = x === 0 ? initial : samples[index - 1];
    } else if (x === 0) {
      prediction = samples[index - stride];
    } else {
      prediction = predictSample(selection, samples[index - 1], samples[index - stride], samples[index - stride - 1]);
    }

    const diff = receiveExtend(reader, decodeHuffman(reader, state.table));
    samples[index] = (prediction + diff) & mask;
  };

  const single = states.length === 1;
  const first = states[0].component;
  const totalUnits = single ? first.blocksPerLine * first.blocksPerColumn : frame.mcusPerLine * frame.mcusPerColumn;
  const interval = restartInterval > 0 ? restartInterval : totalUnits;
  const intervalStarts = [0, ...data.restarts];

  let unit = 0;
  for (let segment = 0; unit < totalUnits; segment++) {
    if (segment >= intervalStarts.length) {
      logger.warn({ unit, totalUnits }, 'Scan ended before all restart intervals were seen');
      return;
    }
    reader.seek(intervalStarts[segment]);
    for (const state of states) {
      state.firstRow = single
        ? Math.floor(unit / first.blocksPerLine)
        : Math.floor(unit / frame.mcusPerLine) * state.component.v;
    }

    const end = Math.min(unit + interval, totalUnits);
    try {
      for (; unit < end; unit++) {
        if (single) {
          decodeSample(states[0], unit % first.blocksPerLine, Math.floor(unit / first.blocksPerLine));
          continue;
        }
        const mcuRow = Math.floor(unit / frame.mcusPerLine);
        const mcuCol = unit % frame.mcusPerLine;
        for (const state of states) {
          const { h, v } = state.component;
          for (let dy = 0; dy < v; dy++) {
            for (let dx = 0; dx < h; dx++) {
              decodeSample(state, mcuCol * h + dx, mcuRow * v + dy);
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
