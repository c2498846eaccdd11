/**
 * Style module
 *
 * Cascading text-style parsing and resolution onto labels.
 */

export { parseStyleString, mergeStyles, parseColor, parseFontWeight } from './style-parser.js';
export type { StyleMap } from './style-parser.js';
export { StyleResolver } from './style-resolver.js';
export type { FontTables, UnmappedStyleValue, ResolvedStyle } from './style-resolver.js';
