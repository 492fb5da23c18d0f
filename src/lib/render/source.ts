/**
 * Sequential byte sources for the render driver.
 * A short read means the input is exhausted; the cursor never rewinds.
 */

import { openSync, fstatSync, readSync, closeSync } from 'fs';
import { InputError, systemReason } from '../errors.js';

export interface ByteSource {
  /** Reads up to `length` bytes into the start of `target`. */
  read(target: Uint8Array, length: number): number;
  close(): void;
}

export class BufferByteSource implements ByteSource {
  private position: number;

  constructor(private readonly bytes: Uint8Array, seek = 0) {
    this.position = Math.min(seek, bytes.length);
  }

  get remaining(): number {
    return this.bytes.length - this.position;
  }

  read(target: Uint8Array, length: number): number {
    const end = Math.min(this.position + length, this.bytes.length);
    const count = end - this.position;
    target.set(this.bytes.subarray(this.position, end), 0);
    this.position = end;
    return count;
  }

  close(): void {}
}

export class FileByteSource implements ByteSource {
  private position: number;

  private constructor(
    readonly path: string,
    private readonly fd: number,
    readonly size: number,
    seek: number,
  ) {
    this.position = seek;
  }

  static open(path: string, seek = 0): FileByteSource {
    let fd: number;
    try {
      fd = openSync(path, 'r');
    } catch (err) {
      throw new InputError(`Can't access infile ${path}: ${systemReason(err)}`, { cause: err });
    }

    try {
      const stat = fstatSync(fd);
      if (stat.isDirectory()) {
        throw new InputError(`Can't read ${path}: is a directory`);
      }
      return new FileByteSource(path, fd, stat.size, seek);
    } catch (err) {
      closeSync(fd);
      throw err;
    }
  }

  /** Bytes between the seek offset and the end of the file. */
  get remaining(): number {
    return Math.max(0, this.size - this.position);
  }

  read(target: Uint8Array, length: number): number {
    let total = 0;
    while (total < length) {
      let n: number;
      try {
        n = readSync(this.fd, target, total, length - total, this.position);
      } catch (err) {
        throw new InputError(`Can't read ${this.path}: ${systemReason(err)}`, { cause: err });
      }
      if (n === 0) break;
      total += n;
      this.position += n;
    }
    return total;
  }

  close(): void {
    closeSync(this.fd);
  }
}
