import type { Palette, SampleHistory } from '../palettes/index.js';

/** Clears the low bit of every channel so the source bytes can't be recovered. */
export const BYTE_MASK = 0xfe;

export interface AssembleOptions {
  width: number;
  zoom: number;
  skip: number;
  mask: boolean;
  palette: Palette;
}

/** Raw input bytes one output pixel spans, skipped bytes included. */
export function pixelStride(options: Omit<AssembleOptions, 'width' | 'mask'>): number {
  return options.palette.bytesPerPixel * options.zoom * options.skip;
}

/**
 * Fills `row` (width * 3 bytes, RGB) from the first `length` bytes of `chunk`.
 *
 * Each pixel averages `zoom` consecutive samples, then skips the next
 * `(skip - 1) * zoom` samples. Once the chunk can't supply a whole sample
 * for a pixel, that pixel and the rest of the row are black.
 *
 * `history.previous` is the first byte of the last decoded sample, so with
 * skip > 1 the skipped bytes never become the previous byte.
 *
 * Returns the number of pixels drawn from input.
 */
export function assembleRow(
  chunk: Uint8Array,
  length: number,
  row: Uint8Array,
  options: AssembleOptions,
  history: SampleHistory,
): number {
  const { width, zoom, mask, palette } = options;
  const bpp = palette.bytesPerPixel;
  const stride = pixelStride(options);

  for (let x = 0; x < width; x++) {
    const base = x * stride;
    if (base + bpp > length) {
      row.fill(0, x * 3, width * 3);
      return x;
    }

    let r = 0;
    let g = 0;
    let b = 0;
    let samples = 0;
    for (let z = 0; z < zoom; z++) {
      const offset = base + z * bpp;
      // A window cut short by end of input averages what it has.
      if (offset + bpp > length) break;
      const [sr, sg, sb] = palette.map(chunk, offset, history);
      history.previous = chunk[offset];
      r += sr;
      g += sg;
      b += sb;
      samples++;
    }

    if (samples > 1) {
      r = Math.floor(r / samples);
      g = Math.floor(g / samples);
      b = Math.floor(b / samples);
    }

    if (mask) {
      r &= BYTE_MASK;
      g &= BYTE_MASK;
      b &= BYTE_MASK;
    }

    const p = x * 3;
    row[p] = r;
    row[p + 1] = g;
    row[p + 2] = b;
  }

  return width;
}
