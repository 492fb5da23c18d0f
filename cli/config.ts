import { readFileSync, writeFileSync, mkdirSync, existsSync, chmodSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { PALETTE_NAMES } from '../src/lib/palettes/index.js';
import { createLogger } from '../src/lib/logger.js';

const log = createLogger('config');

const positiveInt = z.number().int().positive();

export const RenderDefaultsSchema = z
  .object({
    width: positiveInt,
    height: positiveInt,
    zoom: positiveInt,
    skip: positiveInt,
    seek: z.number().int().nonnegative(),
    palette: z.enum(PALETTE_NAMES),
    mask: z.boolean(),
    autoHeight: z.boolean(),
    output: z.string().min(1),
    title: z.string().min(1),
  })
  .partial()
  .strict();

export const ConfigSchema = z.object({
  defaults: RenderDefaultsSchema.default({}),
});

export type RenderDefaults = z.infer<typeof RenderDefaultsSchema>;
export type DefaultKey = keyof RenderDefaults;
export type CLIConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_KEYS = RenderDefaultsSchema.keyof().options;

export function getConfigDir(): string {
  return process.env.BYTEGLYPH_CONFIG_DIR || join(homedir(), '.byteglyph');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

function defaultConfig(): CLIConfig {
  return { defaults: {} };
}

/** Reads the config file; a missing or invalid file yields the built-in defaults. */
export function loadConfig(): CLIConfig {
  const path = getConfigPath();
  if (!existsSync(path)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    log.warn({ err, path }, 'config file is not valid JSON, using defaults');
    return defaultConfig();
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ path, issues: parsed.error.issues }, 'config file failed validation, using defaults');
    return defaultConfig();
  }
  return parsed.data;
}

export function saveConfig(config: CLIConfig): void {
  const dir = getConfigDir();
  const path = getConfigPath();
  mkdirSync(dir, { recursive: true, mode: 0o700 });
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n', { mode: 0o600 });
  chmodSync(path, 0o600);
}

export function isDefaultKey(key: string): key is DefaultKey {
  return DEFAULT_KEYS.some((candidate) => candidate === key);
}

const NUMERIC_KEYS: readonly DefaultKey[] = ['width', 'height', 'zoom', 'skip', 'seek'];
const BOOLEAN_KEYS: readonly DefaultKey[] = ['mask', 'autoHeight'];

/**
 * Turns a command-line string into a validated default for `key`.
 * Returns the error text when the value is rejected.
 */
export function parseDefault(
  key: DefaultKey,
  raw: string,
): { ok: true; defaults: RenderDefaults } | { ok: false; error: string } {
  let value: unknown = raw;
  if (NUMERIC_KEYS.includes(key)) {
    value = /^-?\d+$/.test(raw) ? Number(raw) : raw;
  } else if (BOOLEAN_KEYS.includes(key)) {
    value = raw === 'true' ? true : raw === 'false' ? false : raw;
  }

  const parsed = RenderDefaultsSchema.safeParse({ [key]: value });
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((issue) => issue.message).join('; ') };
  }
  return { ok: true, defaults: parsed.data };
}
