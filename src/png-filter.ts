import { DecodeError } from './errors.js';
import { getSamplesPerPixel } from './utils.js';

/**
 * Per-row filter selector stored before each scanline
 */
export enum FilterType {
  None = 0,
  Sub = 1,
  Up = 2,
  Average = 3,
  Paeth = 4
}

function paeth(left: number, up: number, upLeft: number): number {
  const estimate = left + up - upLeft;
  const dLeft = Math.abs(estimate - left);
  const dUp = Math.abs(estimate - up);
  const dUpLeft = Math.abs(estimate - upLeft);
  if (dLeft <= dUp && dLeft <= dUpLeft) return left;
  return dUp <= dUpLeft ? up : upLeft;
}

type Predictor = (left: number, up: number, upLeft: number) => number;

const PREDICTORS: readonly Predictor[] = [
  () => 0,
  (left) => left,
  (_left, up) => up,
  (left, up) => (left + up) >> 1,
  paeth,
];

function predictorFor(filterType: number): Predictor {
  const predictor = PREDICTORS[filterType];
  if (predictor === undefined) {
    throw new DecodeError(`Unknown filter type: ${filterType}`);
  }
  return predictor;
}

/**
 * Reverse one row's filter. Neighbours come from the reconstructed output,
 * so `previousLine` must already be unfiltered (null for the first row).
 */
export function unfilterScanline(
  filterType: FilterType,
  scanline: Uint8Array,
  previousLine: Uint8Array | null,
  bytesPerPixel: number
): Uint8Array {
  const predict = predictorFor(filterType);
  const result = new Uint8Array(scanline.length);
  for (let i = 0; i < scanline.length; i++) {
    const back = i - bytesPerPixel;
    const left = back >= 0 ? result[back] : 0;
    const up = previousLine ? previousLine[i] : 0;
    const upLeft = previousLine && back >= 0 ? previousLine[back] : 0;
    result[i] = (scanline[i] + predict(left, up, upLeft)) & 0xff;
  }
  return result;
}

/**
 * Apply one filter type to a raw row; the inverse of unfilterScanline
 */
export function filterScanline(
  filterType: FilterType,
  scanline: Uint8Array,
  previousLine: Uint8Array | null,
  bytesPerPixel: number
): Uint8Array {
  const predict = predictorFor(filterType);
  const result = new Uint8Array(scanline.length);
  for (let i = 0; i < scanline.length; i++) {
    const back = i - bytesPerPixel;
    const left = back >= 0 ? scanline[back] : 0;
    const up = previousLine ? previousLine[i] : 0;
    const upLeft = previousLine && back >= 0 ? previousLine[back] : 0;
    result[i] = (scanline[i] - predict(left, up, upLeft)) & 0xff;
  }
  return result;
}

/**
 * Calculate bytes per pixel from PNG header information
 */
export function getBytesPerPixel(bitDepth: number, colorType: number): number {
  return Math.ceil((getSamplesPerPixel(colorType) * bitDepth) / 8);
}
