import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { ByteglyphError } from '../../src/lib/errors.js';
import { DEFAULT_PALETTE, PALETTE_NAMES, getPalette } from '../../src/lib/palettes/index.js';
import { RENDER_DEFAULTS } from '../../src/lib/render/driver.js';
import { renderFileToPng } from '../../src/lib/render/file.js';
import { DEFAULT_TITLE } from '../../src/lib/render/png-sink.js';

export const DEFAULT_OUTPUT = 'byteglyph.png';

interface RenderCommandOptions {
  autoHeight: boolean;
  mask: boolean;
  height?: number;
  skip?: number;
  output?: string;
  palette?: string;
  seek?: number;
  width?: number;
  zoom?: number;
  title?: string;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return Number(value);
}

export function parseOffset(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number(value);
}

export function registerRenderCommand(program: Command): void {
  program
    .command('render', { isDefault: true })
    .description('Render a binary file as a PNG, one pixel per byte (or group of bytes)')
    .argument('<file>', 'Input file')
    .helpOption('--help', 'Display help for command')
    .allowExcessArguments(false)
    .option('-H, --no-auto-height', "Don't autoscale height")
    .option('-M, --no-mask', "Don't mask least significant bit")
    .option('-h, --height <rows>', `Maximum height, or the exact height with -H (default ${RENDER_DEFAULTS.height})`, parseCount)
    .option('-k, --skip <factor>', 'Skip factor; eg, 3 shows 1 sample out of 3', parseCount)
    .option('-o, --output <path>', `Output PNG file (default ${DEFAULT_OUTPUT})`)
    .addOption(
      new Option('-p, --palette <name>', `Palette type for colorization (default ${DEFAULT_PALETTE})`)
        .choices(PALETTE_NAMES),
    )
    .option('-s, --seek <bytes>', 'Byte offset of the input file to begin reading', parseOffset)
    .option('-w, --width <pixels>', `Image width (default ${RENDER_DEFAULTS.width})`, parseCount)
    .option('-z, --zoom <factor>', 'Averages multiple samples; eg, 16 averages 16 as 1', parseCount)
    .option('-t, --title <text>', `PNG Title text (default ${DEFAULT_TITLE})`)
    .action((file: string, opts: RenderCommandOptions, cmd: Command) => {
      const defaults = loadConfig().defaults;
      const fromCli = (name: string) => cmd.getOptionValueSource(name) === 'cli';

      const output = opts.output ?? defaults.output ?? DEFAULT_OUTPUT;
      const palette = getPalette(opts.palette ?? defaults.palette ?? DEFAULT_PALETTE);
      const zoom = opts.zoom ?? defaults.zoom ?? RENDER_DEFAULTS.zoom;

      if (zoom > 1 && !palette.zoomSafe) {
        console.log(chalk.yellow(`Palette ${palette.id} is not zoom safe; averaged colors can mislead.`));
      }

      const spinner = ora();
      try {
        const { stats } = renderFileToPng(
          {
            input: file,
            output,
            width: opts.width ?? defaults.width ?? RENDER_DEFAULTS.width,
            height: opts.height ?? defaults.height ?? RENDER_DEFAULTS.height,
            zoom,
            skip: opts.skip ?? defaults.skip ?? RENDER_DEFAULTS.skip,
            seek: opts.seek ?? defaults.seek ?? RENDER_DEFAULTS.seek,
            mask: fromCli('mask') ? opts.mask : defaults.mask ?? RENDER_DEFAULTS.mask,
            autoHeight: fromCli('autoHeight') ? opts.autoHeight : defaults.autoHeight ?? RENDER_DEFAULTS.autoHeight,
            palette,
            title: opts.title ?? defaults.title,
          },
          {
            onPlan: (plan) => {
              if (plan.truncated) {
                console.log(chalk.yellow(
                  `Truncating height: showing ${plan.shownBytes} of ${plan.totalBytes} bytes. Use -h to allow larger heights.`,
                ));
              }
              console.log(`Output image: height:${plan.height}, width:${plan.width}`);
              spinner.start(`Writing ${output}...`);
            },
          },
        );
        spinner.succeed(`Wrote ${output} (${stats.rows} rows from ${stats.bytesRead} bytes)`);
      } catch (err) {
        if (spinner.isSpinning) spinner.fail(`Failed writing ${output}`);
        if (err instanceof ByteglyphError) {
          cmd.error(chalk.red(err.message), { exitCode: err.exitCode });
        }
        throw err;
      }
    });
}
