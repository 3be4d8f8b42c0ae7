/**
 * Batch decoding over a list of files. Each file succeeds or fails on its
 * own; one failure never stops the rest.
 */

import { readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { DecoderOptions, ImageInfo, KnownImageFormat } from '../decoders/types.js';
import { describeError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { Vexel } from '../vexel.js';
import { writeImage } from '../writer.js';
import type { OutputFormat } from '../writer.js';

export interface BatchOptions {
  /** Directory for converted output; nothing is written when omitted */
  outputDir?: string;
  /** Output encoding (default: ppm) */
  outputFormat?: OutputFormat;
  decoder?: DecoderOptions;
  logger?: Logger;
}

export interface BatchSuccess {
  ok: true;
  path: string;
  format: KnownImageFormat;
  width: number;
  height: number;
  frames: number;
  output?: string;
}

export interface BatchFailure {
  ok: false;
  path: string;
  error: string;
}

export type BatchResult = BatchSuccess | BatchFailure;

export interface InfoResult {
  path: string;
  info?: ImageInfo;
  error?: string;
}

/**
 * Expand inputs to a flat file list. Directories contribute their direct
 * children, sorted by name; anything else is kept as given so that a
 * missing path is reported by the decode step.
 */
export async function collectInputFiles(inputs: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  for (const input of inputs) {
    const stats = await stat(input).catch(() => undefined);
    if (!stats?.isDirectory()) {
      files.push(input);
      continue;
    }
    const entries = await readdir(input, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
    for (const name of names) {
      files.push(join(input, name));
    }
  }
  return files;
}

export function outputPathFor(input: string, outputDir: string, format: OutputFormat): string {
  return join(outputDir, `${basename(input, extname(input))}.${format}`);
}

export async function decodeFile(path: string, options: BatchOptions = {}): Promise<BatchResult> {
  const logger = options.logger ?? createLogger('batch');
  try {
    const vexel = await Vexel.open(path, options.decoder);
    const image = await vexel.decode();
    const result: BatchSuccess = {
      ok: true,
      path,
      format: vexel.format,
      width: image.width,
      height: image.height,
      frames: image.frames.length
    };
    if (options.outputDir !== undefined) {
      const format = options.outputFormat ?? 'ppm';
      result.output = outputPathFor(path, options.outputDir, format);
      await writeImage(result.output, image, format);
    }
    logger.debug({ path, format: result.format }, 'Decoded');
    return result;
  } catch (err) {
    logger.error({ path, err }, 'Failed to decode');
    return { ok: false, path, error: describeError(err) };
  }
}

/**
 * Decode each file in turn
 */
export async function decodeBatch(paths: readonly string[], options: BatchOptions = {}): Promise<BatchResult[]> {
  const results: BatchResult[] = [];
  for (const path of paths) {
    results.push(await decodeFile(path, options));
  }
  return results;
}

/**
 * Read each file's metadata. The image is decoded as well, since some
 * formats only fill in their info while decoding; a failed decode still
 * reports the info gathered up to that point.
 */
export async function collectInfo(paths: readonly string[], options: BatchOptions = {}): Promise<InfoResult[]> {
  const logger = options.logger ?? createLogger('batch');
  const results: InfoResult[] = [];
  for (const path of paths) {
    let vexel: Vexel;
    try {
      vexel = await Vexel.open(path, options.decoder);
    } catch (err) {
      logger.error({ path, err }, 'Failed to open');
      results.push({ path, error: describeError(err) });
      continue;
    }
    try {
      await vexel.decode();
      results.push({ path, info: vexel.getImageInfo() });
    } catch (err) {
      logger.warn({ path, err }, 'Decode failed, reporting header info only');
      results.push({ path, info: vexel.getImageInfo(), error: describeError(err) });
    }
  }
  return results;
}

/**
 * JSON rendering of an info record with byte arrays summarised by length
 */
export function formatInfo(info: ImageInfo): string {
  return JSON.stringify(
    info,
    (_key: string, value: unknown): unknown => (ArrayBuffer.isView(value) ? `<${value.byteLength} bytes>` : value),
    2
  );
}
