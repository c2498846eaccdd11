/**
 * Bounding-Box Reconciler
 *
 * Inkscape exports the background with --export-area-drawing, which crops
 * to the drawn geometry. Text removed before that render may stick out of
 * the cropped area, so the canonical frame is the union of the background
 * box and the boxes the original document reports for its text elements.
 * Text without an id has no reported box; its label anchor is added instead.
 */

import { boundingBoxOfPoints, cornerPoints, corners } from '../geometry/index.js';
import type { BoundingBox, Point } from '../geometry/index.js';
import { ReconciliationError } from '../errors/index.js';

/** Element id → box, in the renderer's listing order */
export type BoxMap = ReadonlyMap<string, BoundingBox>;

/** Frame every output coordinate is normalized against. */
export interface CanonicalFrame {
  readonly xMin: number;
  readonly xMax: number;
  readonly yMin: number;
  readonly yMax: number;
  readonly width: number;
  readonly height: number;
}

export interface ReconcileInput {
  /** Boxes queried on the original document */
  originalBoxes: BoxMap;
  /** Boxes queried on the text-stripped document */
  strippedBoxes: BoxMap;
  consumedIds: ReadonlySet<string>;
  ignoredIds: ReadonlySet<string>;
  /** Extra points the frame must cover, in root coordinates */
  anchorPoints?: readonly Point[];
  /** id of the root <svg>; without it the first stripped entry is used */
  rootId?: string;
}

export interface Reconciliation {
  frame: CanonicalFrame;
  /** Region the background artifact covers */
  pdfBox: BoundingBox;
}

export function frameFromBox(box: BoundingBox): CanonicalFrame {
  const [xMin, xMax, yMin, yMax] = corners(box);
  return Object.freeze({ xMin, xMax, yMin, yMax, width: xMax - xMin, height: yMax - yMin });
}

/** Box of the root drawing area in the stripped document. */
export function selectBackgroundBox(boxes: BoxMap, rootId?: string): BoundingBox {
  if (rootId !== undefined) {
    const box = boxes.get(rootId);
    if (box) return box;
    throw new ReconciliationError(`Renderer reported no box for the root element "${rootId}"`, { rootId });
  }
  const first = boxes.values().next();
  if (first.done) {
    throw new ReconciliationError('Renderer reported no boxes for the stripped document');
  }
  return first.value;
}

export function reconcile(input: ReconcileInput): Reconciliation {
  const background = selectBackgroundBox(input.strippedBoxes, input.rootId);
  const [xMin, xMax, yMin, yMax] = corners(background);
  const pdfBox: BoundingBox = { x: xMin, y: yMin, width: xMax - xMin, height: yMax - yMin };

  const points: Point[] = cornerPoints(pdfBox);
  for (const id of input.consumedIds) {
    if (input.ignoredIds.has(id)) continue;
    const box = input.originalBoxes.get(id);
    if (!box) continue;
    const [left, right, top, bottom] = corners(box);
    points.push({ x: left, y: bottom }, { x: right, y: top });
  }
  points.push(...(input.anchorPoints ?? []));

  const union = boundingBoxOfPoints(points);
  if (!union) {
    throw new ReconciliationError('Empty point set');
  }
  return { frame: frameFromBox(union), pdfBox };
}
