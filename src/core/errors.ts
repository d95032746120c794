// src/core/errors.ts

/**
 * Raised when a Gerber source cannot be read at all. This aborts the
 * analysis before any line is interpreted.
 */
export class GerberReadError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GerberReadError";
    this.source = source;
  }
}

/**
 * Raised when a thickness group file cannot be read, written or validated.
 */
export class ThicknessFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ThicknessFileError";
  }
}

/**
 * Negative or non-finite area/thickness reached the volume calculator.
 * Pads from the interpreter never trigger this.
 */
export class VolumeInputError extends Error {
  readonly padId: number;

  constructor(padId: number, message: string) {
    super(message);
    this.name = "VolumeInputError";
    this.padId = padId;
  }
}
