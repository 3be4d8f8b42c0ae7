/**
 * JPEG decoder (ITU T.81)
 *
 * Handles baseline, extended sequential (Huffman or arithmetic), progressive
 * and lossless frames. Hierarchical frames, progressive or lossless
 * arithmetic coding and JPEG-LS are rejected as unsupported.
 *
 * readHeader walks the marker segments up to the first SOS and leaves the
 * reader on it; decode picks up from there.
 */

import { BitReader } from '../bit-reader.js';
import type { ByteSource } from '../byte-source.js';
import { DecodeError, IoError, OutOfBoundsError, UnsupportedFormatError } from '../errors.js';
import { Image } from '../image.js';
import {
  ArithmeticDecoder,
  ArithmeticScanState,
  createConditioningTables
} from '../jpeg-arithmetic.js';
import { assemblePixels, losslessPlanes, reconstructDctPlanes } from '../jpeg-color.js';
import { buildHuffmanTable } from '../jpeg-huffman.js';
import type { HuffmanTable } from '../jpeg-huffman.js';
import { decodeLosslessScan } from '../jpeg-lossless.js';
import { JPEG_MARKERS, JpegMarker, isFrameMarker, isRestartMarker, jpegMarkerCodec, markerName } from '../jpeg-markers.js';
import { collectScanData, HuffmanScanDecoder, runScan } from '../jpeg-scan.js';
import type { ScanBlockDecoder } from '../jpeg-scan.js';
import {
  parseAdobe,
  parseComment,
  parseDac,
  parseDht,
  parseDqt,
  parseDri,
  parseExif,
  parseJfif,
  parseSof,
  parseSos,
  readIdentifier,
  readSegmentPayload
} from '../jpeg-segments.js';
import type { FrameHeader, ScanHeader } from '../jpeg-segments.js';
import { createJpegInfo } from '../jpeg-types.js';
import type { FrameComponent, JpegCodingMethod, JpegFrame, JpegInfo, JpegMode, ScanParameters } from '../jpeg-types.js';
import { BaseDecoder } from './base-decoder.js';
import type { DecoderOptions, DecoderPlugin } from './types.js';

interface FrameKind {
  mode: JpegMode;
  coding: JpegCodingMethod;
}

const FRAME_KINDS: ReadonlyMap<JpegMarker, FrameKind> = new Map([
  [JpegMarker.SOF0, { mode: 'baseline', coding: 'huffman' }],
  [JpegMarker.SOF1, { mode: 'extended-sequential', coding: 'huffman' }],
  [JpegMarker.SOF2, { mode: 'progressive', coding: 'huffman' }],
  [JpegMarker.SOF3, { mode: 'lossless', coding: 'huffman' }],
  [JpegMarker.SOF9, { mode: 'extended-sequential', coding: 'arithmetic' }]
]);

const UNSUPPORTED_FRAMES: ReadonlyMap<JpegMarker, string> = new Map([
  [JpegMarker.SOF5, 'Differential sequential (hierarchical) JPEG'],
  [JpegMarker.SOF6, 'Differential progressive (hierarchical) JPEG'],
  [JpegMarker.SOF7, 'Differential lossless (hierarchical) JPEG'],
  [JpegMarker.SOF10, 'Progressive arithmetic-coded JPEG'],
  [JpegMarker.SOF11, 'Lossless arithmetic-coded JPEG'],
  [JpegMarker.SOF13, 'Differential sequential arithmetic-coded JPEG'],
  [JpegMarker.SOF14, 'Differential progressive arithmetic-coded JPEG'],
  [JpegMarker.SOF15, 'Differential lossless arithmetic-coded JPEG'],
  [JpegMarker.SOF55, 'JPEG-LS']
]);

function isValidPrecision(mode: JpegMode, precision: number): boolean {
  switch (mode) {
    case 'baseline':
      return precision === 8;
    case 'extended-sequential':
    case 'progressive':
      return precision === 8 || precision === 12;
    case 'lossless':
      return precision >= 2 && precision <= 16;
  }
}

export class JpegDecoder extends BaseDecoder<JpegInfo> {
  readonly format = 'jpeg' as const;

  private frame?: JpegFrame;
  private readonly quantizationTables = new Map<number, number[]>();
  private readonly dcTables: (HuffmanTable | undefined)[] = [];
  private readonly acTables: (HuffmanTable | undefined)[] = [];
  private readonly conditioning = createConditioningTables();
  private restartInterval = 0;
  private pointTransform = 0;
  private scansDecoded = 0;
  private ended = false;

  constructor(source: ByteSource, options: DecoderOptions = {}) {
    super(source, createJpegInfo(), options, 'jpeg');
  }

  protected parseHeader(): void {
    const soi = this.reader.peekBytes(2);
    if (soi.length < 2 || soi[0] !== 0xff || soi[1] !== 0xd8) {
      this.logger.warn('Stream does not start with an SOI marker');
    }
    this.processSegments(true);
    if (!this.frame) {
      throw new DecodeError('No frame header (SOF) found');
    }
  }

  protected decodePixels(): Image {
    this.processSegments(false);
    const frame = this.requireFrame();
    if (this.scansDecoded === 0) {
      throw new DecodeError('No scan data found');
    }

    const planes =
      frame.mode === 'lossless'
        ? losslessPlanes(frame, this.pointTransform)
        : reconstructDctPlanes(frame, this.quantizationTables);
    const pixels = assemblePixels(
      frame,
      planes,
      {
        colorTransform: this.options.jpeg?.colorTransform,
        adobeTransform: this.info.adobeTransform,
        componentIds: frame.components.map((component) => component.id)
      },
      this.logger
    );
    return new Image(frame.width, frame.height, pixels);
  }

  private requireFrame(): JpegFrame {
    if (!this.frame) {
      throw new DecodeError('No frame header (SOF) found');
    }
    return this.frame;
  }

  /**
   * Consume segments until EOI or end of data. With `stopAtScan` the reader
   * is rewound onto the first SOS marker instead of decoding it.
   */
  private processSegments(stopAtScan: boolean): void {
    while (!this.ended) {
      const marker = this.reader.nextMarker(JPEG_MARKERS, jpegMarkerCodec);
      if (marker === undefined) {
        if (!stopAtScan) {
          this.logger.warn('Missing EOI marker');
        }
        this.ended = true;
        return;
      }
      if (marker === JpegMarker.SOS && stopAtScan) {
        this.reader.seek(-2, 'current');
        return;
      }
      this.handleMarker(marker);
    }
  }

  private handleMarker(marker: JpegMarker): void {
    if (marker === JpegMarker.SOI || marker === JpegMarker.TEM) {
      return;
    }
    if (marker === JpegMarker.EOI) {
      this.ended = true;
      return;
    }
    if (isRestartMarker(marker)) {
      this.logger.debug({ marker: markerName(marker) }, 'Stray restart marker');
      return;
    }
    if (marker === JpegMarker.SOS) {
      this.decodeScan();
      return;
    }

    const payload = readSegmentPayload(this.reader);
    try {
      this.applySegment(marker, payload);
    } catch (err) {
      if (err instanceof IoError || err instanceof OutOfBoundsError) {
        throw new DecodeError(`Malformed ${markerName(marker)} segment`, { cause: err });
      }
      throw err;
    }
  }

  private applySegment(marker: JpegMarker, payload: Uint8Array): void {
    const unsupported = UNSUPPORTED_FRAMES.get(marker);
    if (unsupported) {
      throw new UnsupportedFormatError(`${unsupported} is not supported`);
    }
    const kind = FRAME_KINDS.get(marker);
    if (kind) {
      this.startFrame(kind, parseSof(payload));
      return;
    }
    if (isFrameMarker(marker)) {
      throw new UnsupportedFormatError(`Unsupported frame type ${markerName(marker)}`);
    }

    switch (marker) {
      case JpegMarker.DQT:
        for (const table of parseDqt(payload)) {
          this.quantizationTables.set(table.id, table.table);
          this.info.quantizationTables.push(table);
        }
        return;
      case JpegMarker.DHT:
        for (const spec of parseDht(payload)) {
          const table = buildHuffmanTable(spec.codeLengths, spec.values);
          if (spec.tableClass === 0) {
            this.dcTables[spec.id] = table;
          } else {
            this.acTables[spec.id] = table;
          }
          this.info.huffmanTables.push(spec);
        }
        return;
      case JpegMarker.DAC:
        for (const entry of parseDac(payload)) {
          if (entry.tableClass === 0) {
            this.conditioning.dcL[entry.id] = entry.value & 15;
            this.conditioning.dcU[entry.id] = entry.value >> 4;
          } else {
            this.conditioning.acK[entry.id] = entry.value;
          }
          this.info.arithmeticTables.push(entry);
        }
        return;
      case JpegMarker.DRI:
        this.restartInterval = parseDri(payload);
        this.info.restartInterval = this.restartInterval;
        return;
      case JpegMarker.APP0:
        if (readIdentifier(payload) === 'JFIF') {
          this.info.jfifHeader = parseJfif(payload);
        }
        return;
      case JpegMarker.APP1:
        if (readIdentifier(payload) === 'Exif') {
          this.info.exifHeader = parseExif(payload);
        }
        return;
      case JpegMarker.APP14: {
        const transform = parseAdobe(payload);
        if (transform !== undefined) {
          this.info.adobeTransform = transform;
        }
        return;
      }
      case JpegMarker.COM:
        this.info.comments.push(parseComment(payload));
        return;
      default:
        this.logger.debug({ marker: markerName(marker), length: payload.length }, 'Skipping segment');
    }
  }

  private startFrame(kind: FrameKind, header: FrameHeader): void {
    if (this.frame) {
      this.logger.warn('Ignoring additional frame header');
      return;
    }
    const { precision, width, height, components } = header;
    this.checkDimensions(width, height);
    if (!isValidPrecision(kind.mode, precision)) {
      throw new DecodeError(`Invalid sample precision ${precision} for ${kind.mode} JPEG`);
    }
    if (components.length === 0) {
      throw new DecodeError('Frame header declares no components');
    }

    const lossless = kind.mode === 'lossless';
    const hMax = Math.max(...components.map((component) => component.horizontalSampling));
    const vMax = Math.max(...components.map((component) => component.verticalSampling));
    const unit = lossless ? 1 : 8;
    const mcusPerLine = Math.ceil(width / (unit * hMax));
    const mcusPerColumn = Math.ceil(height / (unit * vMax));

    const frameComponents: FrameComponent[] = components.map((component, index) => {
      const h = component.horizontalSampling;
      const v = component.verticalSampling;
      const blocksPerLineForMcu = mcusPerLine * h;
      const blocksPerColumnForMcu = mcusPerColumn * v;
      return {
        id: component.id,
        index,
        h,
        v,
        quantizationTableId: component.quantizationTableId,
        blocksPerLine: Math.ceil(Math.ceil((width * h) / hMax) / unit),
        blocksPerColumn: Math.ceil(Math.ceil((height * v) / vMax) / unit),
        blocksPerLineForMcu,
        blocksPerColumnForMcu,
        coefficients: new Int32Array(blocksPerLineForMcu * blocksPerColumnForMcu * unit * unit),
        pred: 0
      };
    });

    this.frame = {
      mode: kind.mode,
      coding: kind.coding,
      precision,
      width,
      height,
      components: frameComponents,
      hMax,
      vMax,
      mcusPerLine,
      mcusPerColumn
    };

    Object.assign(this.info, {
      width,
      height,
      colorDepth: precision,
      numberOfComponents: components.length,
      mode: kind.mode,
      codingMethod: kind.coding,
      colorComponents: components
    });
    this.logger.debug({ mode: kind.mode, coding: kind.coding, width, height, precision }, 'Frame header');
  }

  private readScanHeader(): ScanHeader {
    const payload = readSegmentPayload(this.reader);
    try {
      return parseSos(payload);
    } catch (err) {
      if (err instanceof IoError || err instanceof OutOfBoundsError) {
        throw new DecodeError('Malformed SOS segment', { cause: err });
      }
      throw err;
    }
  }

  private scanParameters(frame: JpegFrame, header: ScanHeader): ScanParameters {
    const components = header.components.map((entry) => {
      const component = frame.components.find((candidate) => candidate.id === entry.componentId);
      if (!component) {
        throw new DecodeError(`Scan references unknown component ${entry.componentId}`);
      }
      const info = this.info.colorComponents[component.index];
      info.dcTableSelector = entry.dcTableSelector;
      info.acTableSelector = entry.acTableSelector;
      return component;
    });

    const scan: ScanParameters = {
      components,
      dcSelectors: header.components.map((entry) => entry.dcTableSelector),
      acSelectors: header.components.map((entry) => entry.acTableSelector),
      ss: header.startSpectral,
      se: header.endSpectral,
      ah: header.successiveHigh,
      al: header.successiveLow
    };

    if (frame.mode === 'progressive') {
      if (scan.ss > scan.se || scan.se > 63) {
        throw new DecodeError(`Invalid spectral selection ${scan.ss}..${scan.se}`);
      }
      if (scan.ss === 0 && scan.se !== 0) {
        throw new DecodeError('Progressive DC scan includes AC coefficients');
      }
      if (scan.ss > 0 && components.length !== 1) {
        throw new DecodeError('Progressive AC scan must contain a single component');
      }
    }
    return scan;
  }

  private decodeScan(): void {
    const frame = this.frame;
    if (!frame) {
      throw new DecodeError('Scan encountered before frame header');
    }
    const header = this.readScanHeader();
    const scan = this.scanParameters(frame, header);
    const data = collectScanData(this.reader);

    this.info.scans.push({
      components: header.components,
      startSpectral: scan.ss,
      endSpectral: scan.se,
      successiveHigh: scan.ah,
      successiveLow: scan.al,
      dataLength: data.bytes.length
    });

    const dcTables = scan.dcSelectors.map((selector) => this.dcTables[selector]);
    const acTables = scan.acSelectors.map((selector) => this.acTables[selector]);

    if (frame.mode === 'lossless') {
      this.pointTransform = scan.al;
      decodeLosslessScan(frame, scan, data, this.restartInterval, dcTables, this.logger);
    } else {
      const reader = BitReader.fromBytes(data.bytes);
      const blocks =
        frame.coding === 'arithmetic'
          ? this.arithmeticBlocks(reader, scan)
          : new HuffmanScanDecoder(reader, scan, dcTables, acTables, frame.mode === 'progressive');
      runScan(frame, scan, data, reader, this.restartInterval, blocks, this.logger);
    }
    this.scansDecoded++;
  }

  private arithmeticBlocks(reader: BitReader, scan: ScanParameters): ScanBlockDecoder {
    for (const selector of [...scan.dcSelectors, ...scan.acSelectors]) {
      if (selector > 3) {
        throw new DecodeError(`Invalid arithmetic conditioning table selector ${selector}`);
      }
    }
    const decoder = new ArithmeticDecoder(reader);
    const state = new ArithmeticScanState(scan.components.length, this.conditioning);
    return {
      restart(end: number): void {
        decoder.reset(end);
        state.restart();
      },
      decodeBlock(component: FrameComponent, slot: number, blockOffset: number): void {
        state.decodeBlock(decoder, component, slot, scan.dcSelectors[slot], scan.acSelectors[slot], blockOffset);
      }
    };
  }
}

export const jpegDecoder: DecoderPlugin = {
  format: 'jpeg',
  create: (source, options) => new JpegDecoder(source, options)
};
