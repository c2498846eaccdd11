/**
 * Extractor module
 *
 * SVG parsing, text-to-label extraction and the geometry-only residual.
 */

export { DocumentExtractor } from './document-extractor.js';
export type { ExtractedDocument } from './document-extractor.js';
export { DPI, SVG_UNITS_TO_BIG_POINTS, documentSize, describeSize, lengthToUserUnits } from './document-size.js';
export type { DocumentSize } from './document-size.js';
export { decodeEscapes } from './escapes.js';
export { SVG_NS, TEXTEXT_NS, XLINK_NS, parseSvg, serializeSvg } from './svg-dom.js';
