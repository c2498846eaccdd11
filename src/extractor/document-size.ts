/**
 * Root `width` / `height` in SVG user units.
 *
 * Inkscape's user unit is the CSS pixel: 96 per inch.
 */

import { ParseError } from '../errors/index.js';

export const DPI = 96;

/** PostScript big points per SVG user unit (72 bp per inch) */
export const SVG_UNITS_TO_BIG_POINTS = 72 / DPI;

const PX_PER_UNIT: Record<string, number> = {
  '': 1,
  px: 1,
  in: DPI,
  mm: DPI / 25.4,
  cm: DPI / 2.54,
  pt: DPI / 72,
  pc: DPI / 6,
};

const LENGTH_RE = /^\s*([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)\s*([a-z]*)\s*$/;

export interface DocumentSize {
  /** user units (px) */
  width: number;
  height: number;
}

/** Length in user units, or undefined for relative units and keywords. */
function absoluteLength(length: string): number | undefined {
  const match = LENGTH_RE.exec(length);
  if (!match || !Object.prototype.hasOwnProperty.call(PX_PER_UNIT, match[2])) return undefined;
  return Number(match[1]) * PX_PER_UNIT[match[2]];
}

export function lengthToUserUnits(length: string): number {
  const value = absoluteLength(length);
  if (value === undefined) {
    throw new ParseError(`Unsupported length "${length}"`, length);
  }
  return value;
}

/**
 * Size of the drawing from the root element. Missing, percentage or
 * relative (`em`, `auto`, ...) lengths fall back to the viewBox extent,
 * then to 0.
 */
export function documentSize(root: Element): DocumentSize {
  const viewBox = (root.getAttribute('viewBox') ?? '')
    .split(/[\s,]+/)
    .filter((t) => t.length > 0)
    .map(Number);
  const fallback = (index: number): number =>
    viewBox.length === 4 && Number.isFinite(viewBox[index]) ? viewBox[index] : 0;

  const resolve = (length: string | null, index: number): number =>
    (length ? absoluteLength(length) : undefined) ?? fallback(index);

  return {
    width: resolve(root.getAttribute('width'), 2),
    height: resolve(root.getAttribute('height'), 3),
  };
}

/** One-line summary in px, inches and big points. */
export function describeSize(size: DocumentSize): string {
  const fmt = (n: number): string => n.toFixed(2);
  return (
    `${fmt(size.width)} x ${fmt(size.height)} px, ` +
    `${fmt(size.width / DPI)} x ${fmt(size.height / DPI)} in, ` +
    `${fmt(size.width * SVG_UNITS_TO_BIG_POINTS)} x ${fmt(size.height * SVG_UNITS_TO_BIG_POINTS)} bp`
  );
}
