import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { registerConfigCommand } from '../../commands/config.js';
import { getConfigPath, loadConfig, parseDefault } from '../../config.js';

describe('byteglyph config', () => {
  let dir: string;
  let configPath: string;
  let program: Command;
  let logSpy: ReturnType<typeof vi.spyOn>;

  function run(...args: string[]) {
    return program.parseAsync(['node', 'byteglyph', 'config', ...args]);
  }

  function saved() {
    return JSON.parse(readFileSync(configPath, 'utf-8'));
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'byteglyph-config-'));
    configPath = join(dir, 'config.json');
    vi.stubEnv('BYTEGLYPH_CONFIG_DIR', dir);

    program = new Command();
    program.exitOverride();
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} });
    registerConfigCommand(program);

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('resolves the config path from the environment', () => {
    expect(getConfigPath()).toBe(configPath);
  });

  it('sets numeric defaults', async () => {
    await run('set', 'width', '800');
    expect(saved()).toEqual({ defaults: { width: 800 } });
  });

  it('sets palette and boolean defaults', async () => {
    await run('set', 'palette', 'hues');
    await run('set', 'mask', 'false');
    await run('set', 'autoHeight', 'true');
    expect(saved()).toEqual({ defaults: { palette: 'hues', mask: false, autoHeight: true } });
  });

  it('keeps string defaults as strings', async () => {
    await run('set', 'output', '123');
    expect(saved().defaults.output).toBe('123');
  });

  it('rejects invalid values without saving', async () => {
    await expect(run('set', 'width', '0')).rejects.toMatchObject({ exitCode: 1 });
    await expect(run('set', 'palette', 'grey')).rejects.toMatchObject({ exitCode: 1 });
    await expect(run('set', 'mask', 'maybe')).rejects.toMatchObject({ exitCode: 1 });
    expect(existsSync(configPath)).toBe(false);
  });

  it('rejects unknown keys', async () => {
    await expect(run('set', 'colour', 'red')).rejects.toMatchObject({ code: 'commander.error' });
    await expect(run('unset', 'colour')).rejects.toMatchObject({ code: 'commander.error' });
  });

  it('unsets a default', async () => {
    await run('set', 'width', '800');
    await run('set', 'zoom', '4');
    await run('unset', 'width');
    expect(saved()).toEqual({ defaults: { zoom: 4 } });
  });

  it('shows the configured defaults', async () => {
    await run('set', 'skip', '2');
    logSpy.mockClear();

    await run('show');
    const lines = logSpy.mock.calls.map((call) => call.map(String).join(' '));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain(configPath);
    expect(lines[1]).toContain('skip:');
    expect(lines[1]).toContain('2');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'byteglyph-load-'));
    vi.stubEnv('BYTEGLYPH_CONFIG_DIR', dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
  });

  it('returns empty defaults when no file exists', () => {
    expect(loadConfig()).toEqual({ defaults: {} });
  });

  it('falls back to empty defaults on malformed JSON', () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'config.json'), '{ not json');
    expect(loadConfig()).toEqual({ defaults: {} });
  });

  it('falls back to empty defaults when validation fails', () => {
    writeFileSync(join(dir, 'config.json'), JSON.stringify({ defaults: { width: -3 } }));
    expect(loadConfig()).toEqual({ defaults: {} });
  });

  it('fills in a missing defaults section', () => {
    writeFileSync(join(dir, 'config.json'), JSON.stringify({}));
    expect(loadConfig()).toEqual({ defaults: {} });
  });
});

describe('parseDefault', () => {
  it('coerces values by key', () => {
    expect(parseDefault('seek', '0')).toEqual({ ok: true, defaults: { seek: 0 } });
    expect(parseDefault('autoHeight', 'false')).toEqual({ ok: true, defaults: { autoHeight: false } });
    expect(parseDefault('title', 'core')).toEqual({ ok: true, defaults: { title: 'core' } });
  });

  it('reports rejected values', () => {
    expect(parseDefault('zoom', '1.5')).toMatchObject({ ok: false });
    expect(parseDefault('seek', '-1')).toMatchObject({ ok: false });
  });
});
