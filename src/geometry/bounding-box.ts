import type { Point } from './affine-transform.js';

/** Axis-aligned box in SVG user units (y grows downward). */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Extremes of a box: [xMin, xMax, yMin, yMax] */
export function corners(box: BoundingBox): [number, number, number, number] {
  return [box.x, box.x + box.width, box.y, box.y + box.height];
}

/** The four corner points of a box */
export function cornerPoints(box: BoundingBox): Point[] {
  const [xMin, xMax, yMin, yMax] = corners(box);
  return [
    { x: xMin, y: yMin },
    { x: xMax, y: yMin },
    { x: xMin, y: yMax },
    { x: xMax, y: yMax },
  ];
}

/** Smallest box containing every point, or null for an empty set */
export function boundingBoxOfPoints(points: Iterable<Point>): BoundingBox | null {
  let minX = Infinity,
    minY = Infinity,
    maxX = -Infinity,
    maxY = -Infinity;
  let seen = false;
  for (const p of points) {
    seen = true;
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  if (!seen) return null;
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Inclusive containment test */
export function containsPoint(box: BoundingBox, p: Point, eps = 0): boolean {
  const [xMin, xMax, yMin, yMax] = corners(box);
  return p.x >= xMin - eps && p.x <= xMax + eps && p.y >= yMin - eps && p.y <= yMax + eps;
}
