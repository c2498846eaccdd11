/**
 * Converter module
 *
 * Single-document pipeline and the concurrent batch front end.
 */

export { SvgConverter } from './converter.js';
export type { ConverterOptions, ConvertOptions, ConversionResult } from './converter.js';
export { BatchConverter } from './batch-converter.js';
export type { BatchJob, BatchResult } from './batch-converter.js';
