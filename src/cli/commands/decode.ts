import { mkdir } from 'node:fs/promises';
import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { OUTPUT_FORMATS } from '../../writer.js';
import type { OutputFormat } from '../../writer.js';
import { collectInputFiles, decodeBatch } from '../batch.js';
import type { BatchResult } from '../batch.js';

interface DecodeCommandOptions {
  format: OutputFormat;
  output?: string;
  void?: boolean;
}

function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (!format) {
    throw new InvalidArgumentError(`Expected one of ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return format;
}

export function printBatchResult(result: BatchResult): void {
  if (!result.ok) {
    console.error(`${chalk.red('✗')} ${result.path} ${chalk.gray(result.error)}`);
    return;
  }
  const frames = result.frames > 0 ? chalk.gray(` ${result.frames} frames`) : '';
  const output = result.output ? ` ${chalk.gray('->')} ${result.output}` : '';
  console.log(`${chalk.green('✓')} ${result.path} ${chalk.cyan(result.format)} ${result.width}x${result.height}${frames}${output}`);
}

export function registerDecodeCommand(program: Command): void {
  program
    .command('decode')
    .description('Decode images, optionally converting them to PPM, PAM or BMP')
    .argument('<inputs...>', 'Image files or directories')
    .option('-f, --format <format>', 'Output format: ppm, pam or bmp', parseOutputFormat, 'ppm')
    .option('-o, --output <dir>', 'Write converted images to this directory', 'output')
    .option('--void', 'Decode only, write nothing')
    .action(async (inputs: string[], opts: DecodeCommandOptions) => {
      const files = await collectInputFiles(inputs);
      const outputDir = opts.void ? undefined : opts.output;
      if (outputDir !== undefined) {
        await mkdir(outputDir, { recursive: true });
      }

      const results = await decodeBatch(files, { outputDir, outputFormat: opts.format });
      results.forEach(printBatchResult);

      const failed = results.filter((result) => !result.ok).length;
      const summary = `${results.length - failed} decoded, ${failed} failed`;
      console.log(failed > 0 ? chalk.yellow(summary) : chalk.gray(summary));
      if (failed > 0) {
        process.exitCode = 1;
      }
    });
}
