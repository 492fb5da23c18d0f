/** One output pixel: 8-bit R, G, B. */
export type Rgb = [r: number, g: number, b: number];

/**
 * Byte history carried across samples for the whole render.
 * Only the differential palette reads it; it starts at 0.
 */
export interface SampleHistory {
  previous: number;
}

export interface Palette {
  /** Name used on the command line and in the registry */
  id: string;

  /** One-line description for `byteglyph palettes` */
  description: string;

  /** Input bytes consumed per sample (1 to 4) */
  bytesPerPixel: 1 | 2 | 3 | 4;

  /**
   * Whether averaging neighbouring samples (zoom) keeps colours meaningful.
   * hues6 is not: its bands are not perceptually continuous.
   */
  zoomSafe: boolean;

  /** Maps the `bytesPerPixel` bytes starting at `offset` to a colour. */
  map(bytes: Uint8Array, offset: number, history: SampleHistory): Rgb;
}

export function createHistory(): SampleHistory {
  return { previous: 0 };
}
