/**
 * JPEG metadata records and internal frame state
 */

export type JpegMode = 'baseline' | 'extended-sequential' | 'progressive' | 'lossless';
export type JpegCodingMethod = 'huffman' | 'arithmetic';

/**
 * DQT table; `table` is in natural (row-major) order
 */
export interface QuantizationTable {
  id: number;
  /** 0 = 8-bit entries, 1 = 16-bit entries */
  precision: number;
  length: number;
  table: number[];
}

export interface HuffmanTableSpec {
  /** 0 = DC, 1 = AC */
  tableClass: number;
  id: number;
  /** Number of codes of each length 1..16 */
  codeLengths: number[];
  values: number[];
}

/**
 * DAC conditioning entry. For DC tables `value` packs U (high nibble) and
 * L (low nibble); for AC tables it is Kx.
 */
export interface ArithmeticConditioning {
  tableClass: number;
  id: number;
  value: number;
}

export interface ColorComponentInfo {
  id: number;
  horizontalSampling: number;
  verticalSampling: number;
  quantizationTableId: number;
  dcTableSelector: number;
  acTableSelector: number;
}

export interface ScanComponentInfo {
  componentId: number;
  dcTableSelector: number;
  acTableSelector: number;
}

export interface ScanInfo {
  components: ScanComponentInfo[];
  startSpectral: number;
  endSpectral: number;
  successiveHigh: number;
  successiveLow: number;
  /** Entropy-coded bytes after removing stuffing and restart markers */
  dataLength: number;
}

export interface JfifHeader {
  identifier: string;
  versionMajor: number;
  versionMinor: number;
  densityUnits: number;
  xDensity: number;
  yDensity: number;
  thumbnailWidth: number;
  thumbnailHeight: number;
  thumbnail: Uint8Array;
}

export interface ExifIfdEntry {
  tag: number;
  format: number;
  components: number;
  valueOffset: number;
}

export interface ExifHeader {
  identifier: string;
  byteOrder: 'II' | 'MM';
  firstIfdOffset: number;
  ifdEntries: ExifIfdEntry[];
}

export interface JpegInfo {
  format: 'jpeg';
  width: number;
  height: number;
  /** Sample precision in bits */
  colorDepth: number;
  numberOfComponents: number;
  mode?: JpegMode;
  codingMethod?: JpegCodingMethod;
  jfifHeader?: JfifHeader;
  exifHeader?: ExifHeader;
  /** Adobe APP14 transform flag (0 none, 1 YCbCr, 2 YCCK) */
  adobeTransform?: number;
  quantizationTables: QuantizationTable[];
  huffmanTables: HuffmanTableSpec[];
  arithmeticTables: ArithmeticConditioning[];
  scans: ScanInfo[];
  colorComponents: ColorComponentInfo[];
  restartInterval: number;
  comments: string[];
}

export function createJpegInfo(): JpegInfo {
  return {
    format: 'jpeg',
    width: 0,
    height: 0,
    colorDepth: 0,
    numberOfComponents: 0,
    quantizationTables: [],
    huffmanTables: [],
    arithmeticTables: [],
    scans: [],
    colorComponents: [],
    restartInterval: 0,
    comments: [],
  };
}

/**
 * Frame component with its coefficient store. Blocks are laid out row-major
 * over the MCU-padded grid, 64 natural-order coefficients each.
 */
export interface FrameComponent {
  id: number;
  index: number;
  h: number;
  v: number;
  quantizationTableId: number;
  blocksPerLine: number;
  blocksPerColumn: number;
  blocksPerLineForMcu: number;
  blocksPerColumnForMcu: number;
  coefficients: Int32Array;
  /** DC predictor, reset at each restart interval */
  pred: number;
}

export interface JpegFrame {
  mode: JpegMode;
  coding: JpegCodingMethod;
  precision: number;
  width: number;
  height: number;
  components: FrameComponent[];
  hMax: number;
  vMax: number;
  mcusPerLine: number;
  mcusPerColumn: number;
}

export interface ScanParameters {
  components: FrameComponent[];
  dcSelectors: number[];
  acSelectors: number[];
  ss: number;
  se: number;
  ah: number;
  al: number;
}

/**
 * Entropy-coded data of one scan with byte stuffing removed
 */
export interface ScanData {
  bytes: Uint8Array;
  /** Offsets in `bytes` where each restart interval after the first begins */
  restarts: number[];
}
