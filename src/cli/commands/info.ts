import type { Command } from 'commander';
import chalk from 'chalk';
import { collectInfo, collectInputFiles, formatInfo } from '../batch.js';

export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Print the structural metadata of each image as JSON')
    .argument('<inputs...>', 'Image files or directories')
    .action(async (inputs: string[]) => {
      const results = await collectInfo(await collectInputFiles(inputs));
      let failed = 0;
      for (const result of results) {
        console.log(chalk.bold(result.path));
        if (result.info) {
          console.log(formatInfo(result.info));
        }
        if (result.error !== undefined) {
          failed++;
          console.error(chalk.red(`  ${result.error}`));
        }
      }
      if (failed > 0) {
        process.exitCode = 1;
      }
    });
}
