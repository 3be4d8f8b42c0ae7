/**
 * PNG chunk structure
 */
export interface PngChunk {
  length: number;
  type: string;
  data: Uint8Array;
  crc: number;
}

/**
 * PNG image header (IHDR) information
 */
export interface PngHeader {
  width: number;
  height: number;
  bitDepth: number;
  colorType: number;
  compressionMethod: number;
  filterMethod: number;
  interlaceMethod: number;
}

/**
 * PNG color types
 */
export enum ColorType {
  GRAYSCALE = 0,
  RGB = 2,
  PALETTE = 3,
  GRAYSCALE_ALPHA = 4,
  RGBA = 6
}

/**
 * tRNS contents; which variant applies depends on the color type
 */
export type PngTransparency =
  | { type: 'gray'; gray: number }
  | { type: 'rgb'; red: number; green: number; blue: number }
  | { type: 'palette'; alpha: number[] };

export type PngBackground =
  | { type: 'gray'; gray: number }
  | { type: 'rgb'; red: number; green: number; blue: number }
  | { type: 'palette'; index: number };

export type RenderingIntent = 'perceptual' | 'relative-colorimetric' | 'saturation' | 'absolute-colorimetric';

export interface Chromaticities {
  whitePointX: number;
  whitePointY: number;
  redX: number;
  redY: number;
  greenX: number;
  greenY: number;
  blueX: number;
  blueY: number;
}

export interface IccProfile {
  name: string;
  /** Inflated profile bytes */
  profile: Uint8Array;
}

export interface PhysicalDimensions {
  pixelsPerUnitX: number;
  pixelsPerUnitY: number;
  unit: 'unknown' | 'meter';
}

export interface SuggestedPaletteEntry {
  red: number;
  green: number;
  blue: number;
  alpha: number;
  frequency: number;
}

export interface SuggestedPalette {
  name: string;
  sampleDepth: number;
  entries: SuggestedPaletteEntry[];
}

export interface ImageTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export type PngText =
  | { type: 'tEXt'; keyword: string; text: string }
  | { type: 'zTXt'; keyword: string; text: string }
  | { type: 'iTXt'; keyword: string; languageTag: string; translatedKeyword: string; text: string };

export interface AnimationControl {
  numFrames: number;
  numPlays: number;
}

/**
 * fcTL record of one APNG frame
 */
export interface PngFrameControl {
  sequenceNumber: number;
  width: number;
  height: number;
  xOffset: number;
  yOffset: number;
  delayNum: number;
  delayDen: number;
  disposeOp: number;
  blendOp: number;
  /** Compressed bytes collected from IDAT or fdAT */
  dataLength: number;
}

export interface PngInfo {
  format: 'png';
  width: number;
  height: number;
  bitDepth: number;
  colorType: number;
  compressionMethod: number;
  filterMethod: number;
  interlaced: boolean;
  palette?: [number, number, number][];
  transparency?: PngTransparency;
  background?: PngBackground;
  gamma?: number;
  chromaticities?: Chromaticities;
  renderingIntent?: RenderingIntent;
  iccProfile?: IccProfile;
  physicalDimensions?: PhysicalDimensions;
  /** sBIT values in channel order */
  significantBits?: number[];
  histogram?: number[];
  modificationTime?: ImageTime;
  suggestedPalettes: SuggestedPalette[];
  textChunks: PngText[];
  animationControl?: AnimationControl;
  frames: PngFrameControl[];
}

export function createPngInfo(): PngInfo {
  return {
    format: 'png',
    width: 0,
    height: 0,
    bitDepth: 0,
    colorType: 0,
    compressionMethod: 0,
    filterMethod: 0,
    interlaced: false,
    suggestedPalettes: [],
    textChunks: [],
    frames: []
  };
}
