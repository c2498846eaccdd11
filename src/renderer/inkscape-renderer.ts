/**
 * Inkscape renderer
 *
 * Drives the Inkscape 1.x command line:
 *   inkscape --query-all file.svg            → "id,x,y,width,height" per line
 *   inkscape --export-area-drawing ... file.svg
 *
 * A missing executable or a non-zero exit status is a RendererFailureError.
 */

import { execFile } from 'node:child_process';
import type { BoundingBox } from '../geometry/index.js';
import { RendererFailureError } from '../errors/index.js';
import { DPI } from '../extractor/index.js';
import type { ExportFormat, RenderedArtifact, Renderer } from './types.js';

export interface InkscapeRendererOptions {
  /** Default: `inkscape` from $PATH */
  executable?: string;
  /** Default: 96, Inkscape's user units per inch */
  dpi?: number;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/** Parse `--query-all` output into an id → box map, preserving order. */
export function parseQueryAllOutput(output: string): Map<string, BoundingBox> {
  const boxes = new Map<string, BoundingBox>();
  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '') continue;
    const [id, ...rest] = line.split(',');
    const values = rest.map(Number);
    if (id === '' || values.length !== 4 || values.some((v) => !Number.isFinite(v))) {
      throw new RendererFailureError(`Unexpected --query-all output line: "${line}"`);
    }
    const [x, y, width, height] = values;
    boxes.set(id, { x, y, width, height });
  }
  return boxes;
}

export class InkscapeRenderer implements Renderer {
  private readonly executable: string;
  private readonly dpi: number;

  constructor(options: InkscapeRendererOptions = {}) {
    this.executable = options.executable ?? 'inkscape';
    this.dpi = options.dpi ?? DPI;
  }

  async queryBoxes(svgPath: string): Promise<Map<string, BoundingBox>> {
    const stdout = await this.run(['--query-all', svgPath]);
    return parseQueryAllOutput(stdout);
  }

  async render(svgPath: string, outPath: string, format: ExportFormat): Promise<RenderedArtifact> {
    await this.run([
      '--export-area-drawing',
      '--export-ignore-filters',
      `--export-dpi=${this.dpi}`,
      `--export-type=${format}`,
      `--export-filename=${outPath}`,
      svgPath,
    ]);
    return { path: outPath, format };
  }

  private run(args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      execFile(this.executable, args, { encoding: 'utf8', maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
        if (!error) {
          resolve(stdout);
          return;
        }
        const code: unknown = error.code;
        if (code === 'ENOENT') {
          reject(
            new RendererFailureError(`Renderer executable not found: ${this.executable}`, undefined, {
              executable: this.executable,
            })
          );
          return;
        }
        const exitCode = typeof code === 'number' ? code : undefined;
        reject(
          new RendererFailureError(
            `\`${this.executable} ${args.join(' ')}\` failed${stderr ? `: ${stderr.trim()}` : ''}`,
            exitCode,
            { executable: this.executable, args }
          )
        );
      });
    });
  }
}
