/**
 * CSS `style` attribute parsing and the value decoders that can fail.
 */

import { UnsupportedColorFormatError, InvalidWeightError } from '../errors/index.js';
import { WEIGHT_BOLD, WEIGHT_NORMAL } from '../labels/index.js';
import type { RGB } from '../labels/index.js';

export type StyleMap = Readonly<Record<string, string>>;

const HEX_COLOR_RE = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;
const INTEGER_RE = /^[+-]?\d+$/;

/**
 * Split `key: value; key: value` into a map. Each clause is split on its
 * first colon; later duplicates win.
 */
export function parseStyleString(style: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const clause of style.split(';')) {
    if (clause.trim() === '') continue;
    const colon = clause.indexOf(':');
    const key = (colon === -1 ? clause : clause.slice(0, colon)).trim();
    const value = colon === -1 ? '' : clause.slice(colon + 1).trim();
    out[key] = value;
  }
  return out;
}

/** Shallow override of `parent` by `child`. */
export function mergeStyles(parent: StyleMap, child: StyleMap): Record<string, string> {
  return { ...parent, ...child };
}

export function parseColor(value: string): RGB {
  const match = HEX_COLOR_RE.exec(value);
  if (!match) {
    throw new UnsupportedColorFormatError(value);
  }
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}

export function parseFontWeight(value: string): number {
  if (value === 'bold') return WEIGHT_BOLD;
  if (value === 'normal') return WEIGHT_NORMAL;
  if (!INTEGER_RE.test(value)) {
    throw new InvalidWeightError(value);
  }
  return parseInt(value, 10);
}
