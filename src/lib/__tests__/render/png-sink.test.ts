import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { decode } from 'fast-png';
import { PngFileSink, RasterSink } from '../../render/png-sink.js';
import { renderFileToPng, type RenderFileOptions } from '../../render/file.js';
import { PALETTES } from '../../palettes/index.js';
import { EncoderError, InputError, OutputError } from '../../errors.js';

function readPng(path: string) {
  return decode(readFileSync(path));
}

describe('RasterSink', () => {
  it('stores rows top to bottom', () => {
    const sink = new RasterSink(2, 2);
    sink.writeRow(Uint8Array.from([1, 2, 3, 4, 5, 6]));
    sink.writeRow(Uint8Array.from([7, 8, 9, 10, 11, 12]));
    sink.finish();

    expect(sink.rows).toBe(2);
    expect(sink.pixelAt(1, 0)).toEqual([4, 5, 6]);
    expect(sink.pixelAt(0, 1)).toEqual([7, 8, 9]);
  });

  it('rejects rows past the image height', () => {
    const sink = new RasterSink(1, 1);
    sink.writeRow(new Uint8Array(3));
    expect(() => sink.writeRow(new Uint8Array(3))).toThrow(EncoderError);
  });

  it('rejects rows of the wrong width', () => {
    const sink = new RasterSink(2, 1);
    expect(() => sink.writeRow(new Uint8Array(3))).toThrow(/expected 6/);
  });

  it('refuses to finish an incomplete image', () => {
    const sink = new RasterSink(1, 2);
    sink.writeRow(new Uint8Array(3));
    expect(() => sink.finish()).toThrow('Image finished after 1 of 2 rows');
  });
});

describe('PngFileSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'byteglyph-png-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes an 8-bit RGB png', () => {
    const path = join(dir, 'out.png');
    const sink = PngFileSink.create(path, 2, 1);
    sink.writeRow(Uint8Array.from([255, 0, 0, 0, 0, 254]));
    sink.finish();

    const png = readPng(path);
    expect(png.width).toBe(2);
    expect(png.height).toBe(1);
    expect(png.channels).toBe(3);
    expect(png.depth).toBe(8);
    expect(Array.from(png.data)).toEqual([255, 0, 0, 0, 0, 254]);
    expect(png.text.Title).toBe('byteglyph');
  });

  it('embeds the given title', () => {
    const path = join(dir, 'titled.png');
    const sink = PngFileSink.create(path, 1, 1, 'hello');
    sink.writeRow(new Uint8Array(3));
    sink.finish();

    expect(readPng(path).text).toEqual({ Title: 'hello' });
  });

  it('fails up front when the output cannot be created', () => {
    const path = join(dir, 'missing', 'out.png');
    expect(() => PngFileSink.create(path, 1, 1)).toThrow(OutputError);
  });

  it('closes the file on abort', () => {
    const path = join(dir, 'aborted.png');
    const sink = PngFileSink.create(path, 1, 2);
    sink.writeRow(new Uint8Array(3));
    sink.abort();
    sink.abort();

    expect(() => sink.finish()).toThrow(/already closed/);
  });
});

describe('renderFileToPng', () => {
  let dir: string;
  let input: string;
  let output: string;

  function options(overrides: Partial<RenderFileOptions> = {}): RenderFileOptions {
    return {
      input,
      output,
      width: 4,
      height: 10240,
      zoom: 1,
      skip: 1,
      seek: 0,
      mask: false,
      autoHeight: true,
      palette: PALETTES.gray,
      ...overrides,
    };
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'byteglyph-render-'));
    input = join(dir, 'input.bin');
    output = join(dir, 'out.png');
    writeFileSync(input, Uint8Array.from({ length: 12 }, (_, i) => i));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('renders a file with an auto-sized height', () => {
    const { plan, stats } = renderFileToPng(options());

    expect(plan.height).toBe(3);
    expect(stats).toEqual({ rows: 3, bytesRead: 12, exhausted: false });
    const png = readPng(output);
    expect(png.height).toBe(3);
    expect(Array.from(png.data)).toEqual(Array.from({ length: 12 }, (_, i) => [i, i, i]).flat());
  });

  it('sizes and reads from the seek offset', () => {
    const { plan } = renderFileToPng(options({ seek: 4 }));

    expect(plan.height).toBe(2);
    expect(plan.totalBytes).toBe(8);
    const png = readPng(output);
    expect(Array.from(png.data.slice(0, 3))).toEqual([4, 4, 4]);
  });

  it('masks the low bit when asked', () => {
    renderFileToPng(options({ mask: true, width: 12 }));
    const png = readPng(output);
    expect(Array.from(png.data).every((value) => value % 2 === 0)).toBe(true);
    expect(Array.from(png.data.slice(9, 12))).toEqual([2, 2, 2]);
  });

  it('hands the plan to the caller before writing', () => {
    const plans: number[] = [];
    renderFileToPng(options({ height: 2 }), {
      onPlan: (plan) => {
        plans.push(plan.height);
        expect(plan.truncated).toBe(true);
        expect(plan.shownBytes).toBe(8);
        expect(existsSync(output)).toBe(false);
      },
    });
    expect(plans).toEqual([2]);
  });

  it('reports a missing input before creating the output', () => {
    expect(() => renderFileToPng(options({ input: join(dir, 'nope.bin') }))).toThrow(InputError);
    expect(existsSync(output)).toBe(false);
  });
});
