import type { Palette, Rgb } from './types.js';

function grayAt(index: number): (bytes: Uint8Array, offset: number) => Rgb {
  return (bytes, offset) => {
    const v = bytes[offset + index];
    return [v, v, v];
  };
}

export const gray: Palette = {
  id: 'gray',
  description: 'grayscale, per byte',
  bytesPerPixel: 1,
  zoomSafe: true,
  map: grayAt(0),
};

// Wider grays keep the most significant byte and drop the rest.

export const gray16b: Palette = {
  id: 'gray16b',
  description: 'grayscale, per short (big-endian)',
  bytesPerPixel: 2,
  zoomSafe: true,
  map: grayAt(0),
};

export const gray16l: Palette = {
  id: 'gray16l',
  description: 'grayscale, per short (little-endian)',
  bytesPerPixel: 2,
  zoomSafe: true,
  map: grayAt(1),
};

export const gray32b: Palette = {
  id: 'gray32b',
  description: 'grayscale, per long (big-endian)',
  bytesPerPixel: 4,
  zoomSafe: true,
  map: grayAt(0),
};

export const gray32l: Palette = {
  id: 'gray32l',
  description: 'grayscale, per long (little-endian)',
  bytesPerPixel: 4,
  zoomSafe: true,
  map: grayAt(3),
};
