/**
 * JPEG segment markers (ITU T.81 Table B.1)
 */

import { createEnumMarkerCodec } from './marker.js';

export enum JpegMarker {
  TEM = 0xff01,

  SOF0 = 0xffc0, // Baseline DCT
  SOF1 = 0xffc1, // Extended sequential DCT
  SOF2 = 0xffc2, // Progressive DCT
  SOF3 = 0xffc3, // Lossless
  DHT = 0xffc4,
  SOF5 = 0xffc5,
  SOF6 = 0xffc6,
  SOF7 = 0xffc7,
  JPG = 0xffc8,
  SOF9 = 0xffc9, // Extended sequential, arithmetic
  SOF10 = 0xffca, // Progressive, arithmetic
  SOF11 = 0xffcb, // Lossless, arithmetic
  DAC = 0xffcc,
  SOF13 = 0xffcd,
  SOF14 = 0xffce,
  SOF15 = 0xffcf,

  RST0 = 0xffd0,
  RST1 = 0xffd1,
  RST2 = 0xffd2,
  RST3 = 0xffd3,
  RST4 = 0xffd4,
  RST5 = 0xffd5,
  RST6 = 0xffd6,
  RST7 = 0xffd7,

  SOI = 0xffd8,
  EOI = 0xffd9,
  SOS = 0xffda,
  DQT = 0xffdb,
  DNL = 0xffdc,
  DRI = 0xffdd,
  DHP = 0xffde,
  EXP = 0xffdf,

  APP0 = 0xffe0,
  APP1 = 0xffe1,
  APP2 = 0xffe2,
  APP3 = 0xffe3,
  APP4 = 0xffe4,
  APP5 = 0xffe5,
  APP6 = 0xffe6,
  APP7 = 0xffe7,
  APP8 = 0xffe8,
  APP9 = 0xffe9,
  APP10 = 0xffea,
  APP11 = 0xffeb,
  APP12 = 0xffec,
  APP13 = 0xffed,
  APP14 = 0xffee,
  APP15 = 0xffef,

  JPG0 = 0xfff0,
  JPG1 = 0xfff1,
  JPG2 = 0xfff2,
  JPG3 = 0xfff3,
  JPG4 = 0xfff4,
  JPG5 = 0xfff5,
  JPG6 = 0xfff6,
  SOF55 = 0xfff7, // JPEG-LS
  LSE = 0xfff8,
  JPG9 = 0xfff9,
  JPG10 = 0xfffa,
  JPG11 = 0xfffb,
  JPG12 = 0xfffc,
  JPG13 = 0xfffd,
  COM = 0xfffe,
}

export const JPEG_MARKERS: readonly JpegMarker[] = Object.values(JpegMarker).filter(
  (value): value is JpegMarker => typeof value === 'number'
);

export const jpegMarkerCodec = createEnumMarkerCodec(JPEG_MARKERS);

export function markerName(marker: JpegMarker): string {
  return JpegMarker[marker];
}

export function isRestartMarker(code: number): boolean {
  return code >= JpegMarker.RST0 && code <= JpegMarker.RST7;
}

export function isAppMarker(marker: JpegMarker): boolean {
  return marker >= JpegMarker.APP0 && marker <= JpegMarker.APP15;
}

/**
 * Start-of-frame markers; DHT, JPG and DAC share the 0xFFCx range
 */
export function isFrameMarker(marker: JpegMarker): boolean {
  return (
    marker >= JpegMarker.SOF0 &&
    marker <= JpegMarker.SOF15 &&
    marker !== JpegMarker.DHT &&
    marker !== JpegMarker.JPG &&
    marker !== JpegMarker.DAC
  );
}

/** Markers that carry no length-prefixed payload */
export function isStandaloneMarker(marker: JpegMarker): boolean {
  return (
    marker === JpegMarker.SOI ||
    marker === JpegMarker.EOI ||
    marker === JpegMarker.TEM ||
    isRestartMarker(marker)
  );
}
