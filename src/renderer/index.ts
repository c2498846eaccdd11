/**
 * Renderer module
 *
 * Collaborator that reports per-element boxes and exports the background.
 */

export { InkscapeRenderer, parseQueryAllOutput } from './inkscape-renderer.js';
export type { InkscapeRendererOptions } from './inkscape-renderer.js';
export type { ExportFormat, RenderedArtifact, Renderer } from './types.js';
