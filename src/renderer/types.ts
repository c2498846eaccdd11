/**
 * Renderer collaborator contract
 *
 * The converter never draws anything itself: it asks a renderer for
 * per-element boxes and for the background artifact.
 */

import type { BoundingBox } from '../geometry/index.js';

export type ExportFormat = 'pdf' | 'eps';

export interface RenderedArtifact {
  path: string;
  format: ExportFormat;
}

export interface Renderer {
  /** Axis-aligned box of every element with an id, root first */
  queryBoxes(svgPath: string): Promise<Map<string, BoundingBox>>;

  /** Export the drawing area of `svgPath` to `outPath` */
  render(svgPath: string, outPath: string, format: ExportFormat): Promise<RenderedArtifact>;
}
