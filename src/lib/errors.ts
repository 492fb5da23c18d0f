/**
 * Error taxonomy shared by the library and the CLI.
 * Each class carries the process exit code the CLI should use.
 */

export class ByteglyphError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ByteglyphError';
    this.exitCode = exitCode;
  }
}

/** Bad flags, unknown palette, non-positive dimensions. */
export class UsageError extends ByteglyphError {
  constructor(message: string) {
    super(message, 1);
    this.name = 'UsageError';
  }
}

export class InputError extends ByteglyphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
    this.name = 'InputError';
  }
}

export class OutputError extends ByteglyphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
    this.name = 'OutputError';
  }
}

export class EncoderError extends ByteglyphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
    this.name = 'EncoderError';
  }
}

/** Buffers for the row or the raster could not be allocated. */
export class ResourceError extends ByteglyphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
    this.name = 'ResourceError';
  }
}

/** System reason of a failed fs call, e.g. "ENOENT: no such file or directory". */
export function systemReason(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
