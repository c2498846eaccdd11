/**
 * svgpicture errors
 *
 * Barrel export for the typed error hierarchy and error handler.
 */

export {
  SvgPictureError,
  ParseError,
  UnsupportedColorFormatError,
  InvalidWeightError,
  RendererFailureError,
  MissingInputFileError,
  OutputConflictError,
  ReconciliationError,
  ConfigurationError,
} from './svgpicture-error.js';

export { ErrorHandler } from './error-handler.js';
