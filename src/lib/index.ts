export * from './errors.js';
export * from './palettes/index.js';
export * from './palettes/hues.js';
export * from './palettes/color.js';
export { mapX86, mapDvi } from './palettes/composite.js';
export * from './render/assembler.js';
export * from './render/driver.js';
export * from './render/file.js';
export * from './render/png-sink.js';
export * from './render/source.js';
export { createLogger } from './logger.js';
