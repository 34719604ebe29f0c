/**
 * Custom error types for the sketches and their drivers.
 *
 * Per-item invalid input is not an error: the membership filter reports it
 * through AddResult.REJECTED. Only construction problems and I/O failures
 * at the driver boundary are thrown.
 */

export class SketchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SketchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidArgumentError extends SketchError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class MissingFileError extends SketchError {
  public readonly path: string;

  constructor(path: string) {
    super(`Log file not found: ${path}`);
    this.name = 'MissingFileError';
    this.path = path;
  }
}
