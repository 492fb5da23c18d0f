import type { Command } from 'commander';
import { registerRenderCommand } from './render.js';
import { registerPalettesCommand } from './palettes.js';
import { registerConfigCommand } from './config.js';

export function registerCommands(program: Command): void {
  registerRenderCommand(program);
  registerPalettesCommand(program);
  registerConfigCommand(program);
}
