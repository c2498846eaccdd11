import type { Point } from '../geometry/index.js';
import { WEIGHT_NORMAL } from './types.js';
import type { OpaqueLabel, StyledLabel } from './types.js';

export function createStyledLabel(position: Point, text = ''): StyledLabel {
  return {
    kind: 'styled',
    position,
    text,
    color: [0, 0, 0],
    rotation: 0,
    align: 'left',
    fontFamily: 'rm',
    fontWeight: WEIGHT_NORMAL,
    fontStyle: 'normal',
    scale: 1,
  };
}

export function createOpaqueLabel(position: Point, markup: string): OpaqueLabel {
  return { kind: 'opaque', position, markup };
}
