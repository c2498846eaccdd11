/**
 * Style Resolver
 *
 * Applies a merged style map to a StyledLabel. Font-family and font-size
 * lookups go through tables handed in at construction; misses are
 * reported as warnings and leave the label's field unchanged.
 */

import type { Alignment, FontStyle, StyledLabel } from '../labels/index.js';
import { parseColor, parseFontWeight } from './style-parser.js';
import type { StyleMap } from './style-parser.js';

export interface FontTables {
  /** SVG font-family → LaTeX family tag (rm, sf, tt) */
  fontFamilies: Readonly<Record<string, string>>;
  /** SVG font-size → LaTeX size command */
  fontSizes: Readonly<Record<string, string>>;
}

/** Non-fatal lookup miss. */
export interface UnmappedStyleValue {
  property: 'font-family' | 'font-size';
  value: string;
  message: string;
  /** id of the text element the value came from */
  elementId?: string;
}

export interface ResolvedStyle {
  label: StyledLabel;
  warnings: UnmappedStyleValue[];
}

const FONT_STYLES: Record<string, FontStyle> = {
  normal: 'normal',
  italic: 'italic',
  oblique: 'oblique',
};

const TEXT_ANCHORS: Record<string, Alignment> = {
  start: 'left',
  middle: 'center',
  end: 'right',
};

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export class StyleResolver {
  constructor(private readonly tables: FontTables) {}

  /**
   * Return `label` with every recognized key of `style` applied.
   * Throws UnsupportedColorFormatError / InvalidWeightError.
   */
  resolve(style: StyleMap, label: StyledLabel): ResolvedStyle {
    const warnings: UnmappedStyleValue[] = [];
    const next: StyledLabel = { ...label };

    const fill = lookup(style, 'fill');
    if (fill !== undefined) next.color = parseColor(fill);

    const weight = lookup(style, 'font-weight');
    if (weight !== undefined) next.fontWeight = parseFontWeight(weight);

    const fontStyle = lookup(style, 'font-style');
    const resolvedStyle = fontStyle === undefined ? undefined : lookup(FONT_STYLES, fontStyle);
    if (resolvedStyle !== undefined) next.fontStyle = resolvedStyle;

    const anchor = lookup(style, 'text-anchor');
    const align = anchor === undefined ? undefined : lookup(TEXT_ANCHORS, anchor);
    if (align !== undefined) next.align = align;

    const family = lookup(style, 'font-family');
    if (family !== undefined) {
      const tag = lookup(this.tables.fontFamilies, family);
      if (tag === undefined) {
        warnings.push({ property: 'font-family', value: family, message: `Could not match font-family "${family}"` });
      } else {
        next.fontFamily = tag;
      }
    }

    const size = lookup(style, 'font-size');
    if (size !== undefined) {
      const command = lookup(this.tables.fontSizes, size);
      if (command === undefined) {
        warnings.push({ property: 'font-size', value: size, message: `Could not match font-size "${size}"` });
      } else {
        next.fontSize = command;
      }
    }

    return { label: next, warnings };
  }
}
