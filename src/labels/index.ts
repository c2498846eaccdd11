export { createStyledLabel, createOpaqueLabel } from './label.js';
export { WEIGHT_NORMAL, WEIGHT_BOLD } from './types.js';
export type { Label, StyledLabel, OpaqueLabel, Alignment, FontStyle, RGB } from './types.js';
