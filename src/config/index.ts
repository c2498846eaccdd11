export { ConfigManager, OUTPUT_METHODS, isOutputMethod } from './config.js';
export type { SvgPictureConfig, OutputMethod } from './config.js';
export { DEFAULT_FONT_FAMILIES, DEFAULT_FONT_SIZES, defaultFontTables } from './font-tables.js';
