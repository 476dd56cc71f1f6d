#!/usr/bin/env node
// pin-actions CLI

import { Command } from 'commander';
import { registerPinCommand } from './commands/pin.js';
import { registerCheckCommand } from './commands/check.js';

const program = new Command();

program
  .name('pin-actions')
  .description('Pin GitHub Actions to specific commit SHAs for improved security')
  .version('0.1.0');

// Register all commands
registerPinCommand(program);
registerCheckCommand(program);

await program.parseAsync();
