/**
 * Default font lookup tables.
 *
 * Inkscape writes font-family and font-size verbatim into the style
 * attribute; these map the common values onto LaTeX font selection.
 * User configuration extends or overrides them.
 */

import type { FontTables } from '../style/index.js';

export const DEFAULT_FONT_FAMILIES: Readonly<Record<string, string>> = {
  'CMU Serif': 'rm',
  'CMU Sans Serif': 'sf',
  'CMU Typewriter Text': 'tt',
  Calibri: 'rm',
};

export const DEFAULT_FONT_SIZES: Readonly<Record<string, string>> = {
  '9px': '\\scriptsize',
  '10px': '\\footnotesize',
  '11px': '\\small',
  '12px': '\\normalsize',
  '13px': '\\large',
};

export function defaultFontTables(): FontTables {
  return {
    fontFamilies: { ...DEFAULT_FONT_FAMILIES },
    fontSizes: { ...DEFAULT_FONT_SIZES },
  };
}
