/**
 * Label types
 *
 * A label is one unit of extracted text placed in the LaTeX overlay.
 * Positions are in the document root coordinate space (SVG user units,
 * y downward) until the emitter normalizes them.
 */

import type { Point } from '../geometry/index.js';

export type Alignment = 'left' | 'center' | 'right';

export type FontStyle = 'normal' | 'italic' | 'oblique';

/** 0-255 per channel */
export type RGB = readonly [number, number, number];

export const WEIGHT_NORMAL = 500;
export const WEIGHT_BOLD = 700;

export interface StyledLabel {
  kind: 'styled';
  position: Point;
  text: string;
  color: RGB;
  /** Degrees, counter-clockwise as LaTeX's \rotatebox reads it */
  rotation: number;
  align: Alignment;
  /** LaTeX family tag: rm, sf, tt */
  fontFamily: string;
  fontWeight: number;
  fontStyle: FontStyle;
  /** LaTeX size command such as \normalsize */
  fontSize?: string;
  /** Carried through extraction, not applied when emitting. */
  scale: number;
}

/** Pre-typeset LaTeX (textext objects), only wrapped in a scale box. */
export interface OpaqueLabel {
  kind: 'opaque';
  position: Point;
  markup: string;
}

export type Label = StyledLabel | OpaqueLabel;
