import type { Palette, Rgb } from './types.js';

/**
 * Three contiguous ramps: red, then green, then blue.
 * Each band is monotonic, so averaged samples stay in a sensible colour.
 */
export function mapHues(value: number): Rgb {
  const v = value * 3;
  if (v < 256) return [v, 0, 0];
  if (v < 512) return [0, v % 256, 0];
  return [0, 0, v % 256];
}

/**
 * Six bands alternating a primary ramp with a ramp towards white,
 * so neighbouring values never jump across a band edge.
 */
export function mapFullHues(value: number): Rgb {
  const v = value * 6;
  const w = v % 256;
  if (v < 256) return [v, 0, 0];
  if (v < 256 * 2) return [255, w, w];
  if (v < 256 * 3) return [0, w, 0];
  if (v < 256 * 4) return [w, 255, w];
  if (v < 256 * 5) return [0, 0, w];
  return [w, w, 255];
}

/**
 * Red, green, blue, cyan, magenta, yellow.
 * Not zoom safe: averaging samples either side of a band edge
 * yields a colour that belongs to neither band. Kept as is; the
 * look of existing renders depends on it.
 */
export function mapHues6(value: number): Rgb {
  const v = value * 6;
  const w = v % 256;
  if (v < 256) return [v, 0, 0];
  if (v < 256 * 2) return [0, w, 0];
  if (v < 256 * 3) return [0, 0, w];
  if (v < 256 * 4) return [0, w, w];
  if (v < 256 * 5) return [w, 0, w];
  return [w, w, 0];
}

export const hues: Palette = {
  id: 'hues',
  description: 'map to 3 hue ranges (rgb), per byte (zoom safe)',
  bytesPerPixel: 1,
  zoomSafe: true,
  map: (bytes, offset) => mapHues(bytes[offset]),
};

export const hues6: Palette = {
  id: 'hues6',
  description: 'map to 6 hue ranges (rgbcmy), per byte',
  bytesPerPixel: 1,
  zoomSafe: false,
  map: (bytes, offset) => mapHues6(bytes[offset]),
};

export const fhues: Palette = {
  id: 'fhues',
  description: 'map to 3 full hue ranges (rgb), per byte (zoom safe)',
  bytesPerPixel: 1,
  zoomSafe: true,
  map: (bytes, offset) => mapFullHues(bytes[offset]),
};
