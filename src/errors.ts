/**
 * Error taxonomy shared by every decoder.
 *
 * Low-level failures (I/O, bounds) surface unchanged through the format
 * decoders, so callers can branch on the class rather than the message.
 */

export class VexelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Failure of the underlying byte source, e.g. unexpected end of stream. */
export class IoError extends VexelError {}

/** Unrecognised format, or a recognised format using an unsupported feature. */
export class UnsupportedFormatError extends VexelError {}

/** Index, range or key derived from file content lies outside its container. */
export class OutOfBoundsError extends VexelError {}

export class InvalidDimensionsError extends VexelError {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number, detail?: string) {
    super(`Invalid image dimensions: ${width}x${height}${detail ? ` (${detail})` : ''}`);
    this.width = width;
    this.height = height;
  }
}

/** Format-specific structural violation. */
export class DecodeError extends VexelError {}

export class NotImplementedError extends VexelError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
