/**
 * svgpicture - SVG drawings as a background image plus LaTeX text overlay
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Geometry
export { AffineTransform, compose, parseTransform, accumulateTransform } from './geometry/index.js';
export { corners, cornerPoints, boundingBoxOfPoints, containsPoint } from './geometry/index.js';
export type { Point, BoundingBox } from './geometry/index.js';

// Labels and style
export { createStyledLabel, createOpaqueLabel, WEIGHT_NORMAL, WEIGHT_BOLD } from './labels/index.js';
export type { Label, StyledLabel, OpaqueLabel, Alignment, FontStyle, RGB } from './labels/index.js';
export { StyleResolver, parseStyleString, mergeStyles, parseColor, parseFontWeight } from './style/index.js';
export type { FontTables, UnmappedStyleValue, ResolvedStyle, StyleMap } from './style/index.js';

// Extraction
export {
  DocumentExtractor,
  DPI,
  SVG_UNITS_TO_BIG_POINTS,
  documentSize,
  describeSize,
  decodeEscapes,
  parseSvg,
  serializeSvg,
} from './extractor/index.js';
export type { ExtractedDocument, DocumentSize } from './extractor/index.js';

// Reconciliation and emission
export { reconcile, selectBackgroundBox, frameFromBox } from './reconciler/index.js';
export type { BoxMap, CanonicalFrame, ReconcileInput, Reconciliation } from './reconciler/index.js';
export { emitPicture, normalizePoint, labelPayload } from './emitter/index.js';
export type { PictureInput } from './emitter/index.js';

// Rendering and conversion
export { InkscapeRenderer, parseQueryAllOutput } from './renderer/index.js';
export type { Renderer, ExportFormat, RenderedArtifact, InkscapeRendererOptions } from './renderer/index.js';
export { SvgConverter, BatchConverter } from './converter/index.js';
export type { ConverterOptions, ConvertOptions, ConversionResult, BatchJob, BatchResult } from './converter/index.js';

// Config
export { ConfigManager, OUTPUT_METHODS, isOutputMethod, defaultFontTables } from './config/index.js';
export type { SvgPictureConfig, OutputMethod } from './config/index.js';

// Errors
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
  ErrorHandler,
} from './errors/index.js';

// CLI
export { SvgPictureCLI } from './cli/cli.js';
export { OutputFormatter } from './cli/formatter.js';
export { ProgressReporter } from './cli/progress.js';
