import type { Palette, Rgb } from './types.js';

const X86_OPCODES: Record<number, number> = {
  0x8b: 0xff, // movl
  0xe8: 0xcf, // call
  0x85: 0xaf, // testl
};

const ENGLISH_LETTERS: Record<number, number> = {
  0x65: 0xff, // 'e'
  0x74: 0xcf, // 't'
  0x61: 0xaf, // 'a'
};

const SMALL_INTEGERS: Record<number, number> = {
  0x01: 0xff,
  0x02: 0xcf,
  0x03: 0xaf,
};

/**
 * Grayscale with nine highlighted values: common x86 opcodes in red,
 * frequent English letters in green, the integers 1-3 in blue.
 */
export function mapX86(value: number): Rgb {
  const r = X86_OPCODES[value] ?? 0;
  const g = ENGLISH_LETTERS[value] ?? 0;
  const b = SMALL_INTEGERS[value] ?? 0;
  if (r + g + b === 0) return [value, value, value];
  return [r, g, b];
}

/** Differential, value, integral: |cur - prev|, cur, mean of the two. */
export function mapDvi(current: number, previous: number): Rgb {
  return [Math.abs(current - previous), current, (current + previous) >> 1];
}

export const dvi: Palette = {
  id: 'dvi',
  description: 'use RGB to convey differential, value, integral',
  bytesPerPixel: 1,
  zoomSafe: true,
  map: (bytes, offset, history) => mapDvi(bytes[offset], history.previous),
};

export const x86: Palette = {
  id: 'x86',
  description: 'grayscale with some (9) color indicators: '
    + "red = x86 movl, call, testl; green = 'e', 't', 'a'; blue = 0x01, 0x02, 0x03",
  bytesPerPixel: 1,
  zoomSafe: true,
  map: (bytes, offset) => mapX86(bytes[offset]),
};
