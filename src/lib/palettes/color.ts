import type { Palette, Rgb } from './types.js';

// Bit-sliced palettes: channels come from bit positions, not from scaling.

export function mapColor8(value: number): Rgb {
  return [value & 0xe0, (value & 0x1c) << 3, (value & 0x03) << 6];
}

/** R = bits 10-15, G = bits 6-9, B = bits 0-4, each moved to the top of its byte. */
export function mapColor16(value: number): Rgb {
  return [(value & 0xfc00) >> 8, (value & 0x03c0) >> 2, (value & 0x001f) << 3];
}

/** R = bits 24-31, G = bits 13-20, B = bits 1-8. */
export function mapColor32(value: number): Rgb {
  return [value >>> 24, (value & 0x001fe000) >>> 13, (value & 0x000001fe) >>> 1];
}

export const color: Palette = {
  id: 'color',
  description: 'full colorized scale, per byte',
  bytesPerPixel: 1,
  zoomSafe: true,
  map: (bytes, offset) => mapColor8(bytes[offset]),
};

export const color16: Palette = {
  id: 'color16',
  description: 'full colorized scale, per short (16-bit)',
  bytesPerPixel: 2,
  zoomSafe: true,
  map: (bytes, offset) => mapColor16(bytes[offset] | (bytes[offset + 1] << 8)),
};

export const color32: Palette = {
  id: 'color32',
  description: 'full colorized scale, per long (32-bit)',
  bytesPerPixel: 4,
  zoomSafe: true,
  map: (bytes, offset) =>
    mapColor32(
      (bytes[offset]
        | (bytes[offset + 1] << 8)
        | (bytes[offset + 2] << 16)
        | (bytes[offset + 3] << 24)) >>> 0,
    ),
};

export const rgb: Palette = {
  id: 'rgb',
  description: 'treat 3 sequential bytes as RGB',
  bytesPerPixel: 3,
  zoomSafe: true,
  map: (bytes, offset) => [bytes[offset], bytes[offset + 1], bytes[offset + 2]],
};
