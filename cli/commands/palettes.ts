import type { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_PALETTE, PALETTE_NAMES, PALETTES } from '../../src/lib/palettes/index.js';

export function registerPalettesCommand(program: Command): void {
  program
    .command('palettes')
    .description('List palette types for colorization')
    .action(() => {
      console.log(chalk.bold.cyan('\n  Palettes\n'));
      for (const name of PALETTE_NAMES) {
        const palette = PALETTES[name];
        const label = name === DEFAULT_PALETTE ? `${name} (default)` : name;
        const bytes = `${palette.bytesPerPixel} byte${palette.bytesPerPixel === 1 ? '' : 's'}`;
        const safety = palette.zoomSafe ? '' : chalk.yellow(' [not zoom safe]');
        console.log(`  ${chalk.bold(label.padEnd(16))} ${bytes.padEnd(8)} ${palette.description}${safety}`);
      }
      console.log();
    });
}
