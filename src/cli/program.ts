import { Command } from 'commander';
import { registerCommands } from './commands/index.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('vexel')
    .description('Decode JPEG, PNG, GIF, BMP and Netpbm images and inspect their metadata')
    .version('0.1.0');

  registerCommands(program);
  return program;
}
