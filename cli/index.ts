#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { registerCommands } from './commands/index.js';

const program = new Command();

program
  .name('byteglyph')
  .description('Visualize file data as a PNG; intended for memory dumps')
  .version('0.1.0')
  .helpOption('--help', 'Display help for command');

registerCommands(program);

program.parse();
