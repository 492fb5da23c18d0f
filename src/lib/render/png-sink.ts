import { openSync, writeSync, closeSync } from 'fs';
import { encode } from 'fast-png';
import { EncoderError, OutputError, ResourceError, systemReason } from '../errors.js';
import type { Rgb } from '../palettes/index.js';

export const DEFAULT_TITLE = 'byteglyph';

/** Receives finished RGB rows from the render driver, top to bottom. */
export interface ImageSink {
  writeRow(row: Uint8Array): void;
  finish(): void;
  /** Releases whatever the sink holds after a failed render. */
  abort(): void;
}

export function allocate(length: number, what: string): Uint8Array {
  try {
    return new Uint8Array(length);
  } catch (err) {
    throw new ResourceError(`Out of memory for ${what}`, { cause: err });
  }
}

/** Keeps the whole image as an RGB raster in memory. */
export class RasterSink implements ImageSink {
  readonly pixels: Uint8Array;
  private rowsWritten = 0;

  constructor(readonly width: number, readonly height: number) {
    this.pixels = allocate(width * height * 3, `a ${width}x${height} image`);
  }

  get rows(): number {
    return this.rowsWritten;
  }

  writeRow(row: Uint8Array): void {
    if (this.rowsWritten >= this.height) {
      throw new EncoderError(`Row ${this.rowsWritten} is past the image height of ${this.height}`);
    }
    if (row.length !== this.width * 3) {
      throw new EncoderError(`Row has ${row.length} bytes, expected ${this.width * 3}`);
    }
    this.pixels.set(row, this.rowsWritten * this.width * 3);
    this.rowsWritten++;
  }

  finish(): void {
    if (this.rowsWritten !== this.height) {
      throw new EncoderError(`Image finished after ${this.rowsWritten} of ${this.height} rows`);
    }
  }

  abort(): void {}

  pixelAt(x: number, y: number): Rgb {
    const p = (y * this.width + x) * 3;
    return [this.pixels[p], this.pixels[p + 1], this.pixels[p + 2]];
  }
}

/**
 * Writes the rendered rows as an 8-bit RGB PNG with a Title text chunk.
 * The output file is opened on creation so an unwritable path fails
 * before any input is read.
 *
 * fast-png encodes whole images, so rows are held in a raster until
 * `finish()`: width * height * 3 bytes of memory for the image.
 */
export class PngFileSink implements ImageSink {
  private fd: number | null;

  private constructor(
    readonly path: string,
    private readonly raster: RasterSink,
    private readonly title: string,
    fd: number,
  ) {
    this.fd = fd;
  }

  static create(path: string, width: number, height: number, title = DEFAULT_TITLE): PngFileSink {
    let fd: number;
    try {
      fd = openSync(path, 'w');
    } catch (err) {
      throw new OutputError(`Could not write to ${path}: ${systemReason(err)}`, { cause: err });
    }

    try {
      return new PngFileSink(path, new RasterSink(width, height), title, fd);
    } catch (err) {
      closeSync(fd);
      throw err;
    }
  }

  writeRow(row: Uint8Array): void {
    this.raster.writeRow(row);
  }

  finish(): void {
    const fd = this.requireOpen();
    this.raster.finish();

    const image = {
      width: this.raster.width,
      height: this.raster.height,
      data: this.raster.pixels,
      depth: 8 as const,
      channels: 3,
      text: { Title: this.title },
    };

    let png: Uint8Array;
    try {
      png = encode(image);
    } catch (err) {
      throw new EncoderError(`Error during png creation: ${systemReason(err)}`, { cause: err });
    }

    try {
      let written = 0;
      while (written < png.length) {
        written += writeSync(fd, png, written, png.length - written);
      }
    } catch (err) {
      throw new OutputError(`Could not write to ${this.path}: ${systemReason(err)}`, { cause: err });
    }
    this.close();
  }

  abort(): void {
    if (this.fd !== null) this.close();
  }

  private requireOpen(): number {
    if (this.fd === null) {
      throw new EncoderError(`${this.path} is already closed`);
    }
    return this.fd;
  }

  private close(): void {
    const fd = this.requireOpen();
    this.fd = null;
    closeSync(fd);
  }
}
