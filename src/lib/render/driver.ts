import { UsageError } from '../errors.js';
import { createLogger } from '../logger.js';
import { createHistory, type Palette } from '../palettes/index.js';
import { assembleRow, pixelStride } from './assembler.js';
import { allocate, RasterSink, type ImageSink } from './png-sink.js';
import { BufferByteSource, type ByteSource } from './source.js';

const log = createLogger('render');

export const RENDER_DEFAULTS = {
  width: 1024,
  height: 1024 * 10,
  zoom: 1,
  skip: 1,
  seek: 0,
  mask: true,
  autoHeight: true,
};

export interface RenderOptions {
  width: number;
  height: number;
  zoom: number;
  skip: number;
  mask: boolean;
  palette: Palette;
}

export interface RenderStats {
  rows: number;
  bytesRead: number;
  /** True once a read came back short. */
  exhausted: boolean;
}

export interface PlanInput {
  width: number;
  /** Requested height, or the maximum when auto-height is on */
  height: number;
  zoom: number;
  skip: number;
  palette: Palette;
  autoHeight: boolean;
  /** Input bytes left after the seek offset */
  availableBytes: number;
}

export interface RenderPlan {
  width: number;
  height: number;
  truncated: boolean;
  shownBytes: number;
  totalBytes: number;
}

export function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function requireNonNegativeInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function validate(options: Omit<RenderOptions, 'mask' | 'palette'>): void {
  requirePositiveInteger('width', options.width);
  requirePositiveInteger('height', options.height);
  requirePositiveInteger('zoom', options.zoom);
  requirePositiveInteger('skip', options.skip);
}

/** Rows needed to show every complete sample of the input, at least one. */
export function fullHeight(
  availableBytes: number,
  options: Pick<PlanInput, 'width' | 'zoom' | 'skip' | 'palette'>,
): number {
  const pixels = Math.floor(availableBytes / pixelStride(options));
  return Math.max(1, Math.ceil(pixels / options.width));
}

/**
 * Settles the image height against the input size. A height larger than the
 * requested one is clamped and reported as truncated.
 */
export function planRender(input: PlanInput): RenderPlan {
  validate(input);
  requireNonNegativeInteger('available bytes', input.availableBytes);

  const needed = fullHeight(input.availableBytes, input);
  const plan: RenderPlan = {
    width: input.width,
    height: input.height,
    truncated: false,
    shownBytes: input.availableBytes,
    totalBytes: input.availableBytes,
  };

  if (needed > input.height) {
    plan.truncated = true;
    plan.shownBytes = input.width * input.height * pixelStride(input);
  } else if (input.autoHeight) {
    plan.height = needed;
  }
  return plan;
}

/**
 * Streams `height` rows from `source` into `sink`. Input that runs out
 * leaves the rest of the image black. Any failure aborts the sink and
 * propagates.
 */
export function renderImage(source: ByteSource, sink: ImageSink, options: RenderOptions): RenderStats {
  validate(options);
  const { width, height, palette } = options;
  const chunkLength = width * pixelStride(options);
  const stats: RenderStats = { rows: 0, bytesRead: 0, exhausted: false };

  log.debug({ width, height, palette: palette.id, zoom: options.zoom, skip: options.skip }, 'render started');

  try {
    const chunk = allocate(chunkLength, 'the input buffer');
    const row = allocate(width * 3, 'the row buffer');
    const history = createHistory();

    for (let y = 0; y < height; y++) {
      let length = 0;
      if (!stats.exhausted) {
        length = source.read(chunk, chunkLength);
        stats.bytesRead += length;
        if (length < chunkLength) stats.exhausted = true;
      }
      assembleRow(chunk, length, row, options, history);
      sink.writeRow(row);
      stats.rows++;
    }

    sink.finish();
  } catch (err) {
    log.debug({ err, rows: stats.rows }, 'render aborted');
    sink.abort();
    throw err;
  }

  log.debug(stats, 'render finished');
  return stats;
}

/** Renders an in-memory buffer, starting at `seek`, into a raster. */
export function renderBuffer(bytes: Uint8Array, options: RenderOptions, seek = 0): RasterSink {
  validate(options);
  requireNonNegativeInteger('seek', seek);
  const sink = new RasterSink(options.width, options.height);
  renderImage(new BufferByteSource(bytes, seek), sink, options);
  return sink;
}
