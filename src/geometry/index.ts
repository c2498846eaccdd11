/**
 * Geometry module
 *
 * Affine transforms, `transform` attribute parsing and axis-aligned boxes.
 */

export { AffineTransform, compose } from './affine-transform.js';
export type { Point } from './affine-transform.js';
export { parseTransform, accumulateTransform } from './transform-parser.js';
export { corners, cornerPoints, boundingBoxOfPoints, containsPoint } from './bounding-box.js';
export type { BoundingBox } from './bounding-box.js';
