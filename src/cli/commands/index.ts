import type { Command } from 'commander';
import { registerDecodeCommand } from './decode.js';
import { registerInfoCommand } from './info.js';

export function registerCommands(program: Command): void {
  registerDecodeCommand(program);
  registerInfoCommand(program);
}
