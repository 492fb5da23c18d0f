import { UsageError } from '../errors.js';
import type { Palette } from './types.js';
import { gray, gray16b, gray16l, gray32b, gray32l } from './gray.js';
import { hues, hues6, fhues } from './hues.js';
import { color, color16, color32, rgb } from './color.js';
import { dvi, x86 } from './composite.js';

export const PALETTE_NAMES = [
  'gray',
  'gray16b',
  'gray16l',
  'gray32b',
  'gray32l',
  'hues',
  'hues6',
  'fhues',
  'color',
  'color16',
  'color32',
  'rgb',
  'dvi',
  'x86',
] as const;

export type PaletteName = (typeof PALETTE_NAMES)[number];

export const DEFAULT_PALETTE: PaletteName = 'x86';

export const PALETTES: Record<PaletteName, Palette> = {
  gray,
  gray16b,
  gray16l,
  gray32b,
  gray32l,
  hues,
  hues6,
  fhues,
  color,
  color16,
  color32,
  rgb,
  dvi,
  x86,
};

export function isPaletteName(name: string): name is PaletteName {
  return PALETTE_NAMES.some((candidate) => candidate === name);
}

export function getPalette(name: string): Palette {
  if (!isPaletteName(name)) {
    throw new UsageError(`Invalid palette: ${name}. Use one of: ${PALETTE_NAMES.join(', ')}.`);
  }
  return PALETTES[name];
}

export type { Palette, Rgb, SampleHistory } from './types.js';
export { createHistory } from './types.js';
