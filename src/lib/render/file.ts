import { requireNonNegativeInteger, planRender, renderImage, type RenderPlan, type RenderStats } from './driver.js';
import { DEFAULT_TITLE, PngFileSink } from './png-sink.js';
import { FileByteSource } from './source.js';
import type { Palette } from '../palettes/index.js';

export interface RenderFileOptions {
  input: string;
  output: string;
  width: number;
  /** Maximum height when `autoHeight` is on, the exact height otherwise */
  height: number;
  zoom: number;
  skip: number;
  seek: number;
  mask: boolean;
  autoHeight: boolean;
  palette: Palette;
  title?: string;
}

export interface RenderFileHooks {
  /** Called once the height is settled, before the output file is created. */
  onPlan?(plan: RenderPlan): void;
}

export interface RenderFileResult {
  plan: RenderPlan;
  stats: RenderStats;
}

/** Renders `input` from `seek` onwards into a PNG at `output`. */
export function renderFileToPng(options: RenderFileOptions, hooks: RenderFileHooks = {}): RenderFileResult {
  requireNonNegativeInteger('seek', options.seek);
  const source = FileByteSource.open(options.input, options.seek);
  try {
    const plan = planRender({
      width: options.width,
      height: options.height,
      zoom: options.zoom,
      skip: options.skip,
      palette: options.palette,
      autoHeight: options.autoHeight,
      availableBytes: source.remaining,
    });
    hooks.onPlan?.(plan);

    const sink = PngFileSink.create(options.output, plan.width, plan.height, options.title ?? DEFAULT_TITLE);
    const stats = renderImage(source, sink, {
      width: plan.width,
      height: plan.height,
      zoom: options.zoom,
      skip: options.skip,
      mask: options.mask,
      palette: options.palette,
    });
    return { plan, stats };
  } finally {
    source.close();
  }
}
