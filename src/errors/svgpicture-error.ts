/**
 * svgpicture typed error hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 * Every class here is fatal for the document being converted.
 */

export class SvgPictureError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SvgPictureError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed or unsupported `transform` attribute, or unreadable XML. */
export class ParseError extends SvgPictureError {
  constructor(
    message: string,
    public readonly attribute?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'PARSE_ERROR', context);
    this.name = 'ParseError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedColorFormatError extends SvgPictureError {
  constructor(
    public readonly value: string,
    context?: Record<string, unknown>
  ) {
    super(`Unsupported fill color "${value}": only #rrggbb colors are supported`, 'UNSUPPORTED_COLOR', context);
    this.name = 'UnsupportedColorFormatError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidWeightError extends SvgPictureError {
  constructor(
    public readonly value: string,
    context?: Record<string, unknown>
  ) {
    super(`Invalid font-weight "${value}"`, 'INVALID_WEIGHT', context);
    this.name = 'InvalidWeightError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RendererFailureError extends SvgPictureError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'RENDERER_FAILURE', context);
    this.name = 'RendererFailureError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MissingInputFileError extends SvgPictureError {
  constructor(
    public readonly path: string,
    context?: Record<string, unknown>
  ) {
    super(`Input file not found: ${path}`, 'MISSING_INPUT', context);
    this.name = 'MissingInputFileError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Two conversions in one batch would write the same file. */
export class OutputConflictError extends SvgPictureError {
  constructor(
    public readonly output: string,
    public readonly inputs: string[],
    context?: Record<string, unknown>
  ) {
    super(`Output ${output} would be written by several inputs: ${inputs.join(', ')}`, 'OUTPUT_CONFLICT', context);
    this.name = 'OutputConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bounding-box arithmetic produced an impossible frame. */
export class ReconciliationError extends SvgPictureError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RECONCILIATION_ERROR', context);
    this.name = 'ReconciliationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends SvgPictureError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
