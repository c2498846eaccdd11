/**
 * SVG → background + LaTeX overlay conversion pipeline
 *
 *   extract → query boxes (original, stripped) → render stripped → reconcile → emit
 *
 * Every conversion works in its own temporary directory. Artifacts are copied
 * next to the input (or into `outDir`) only after the markup has been emitted,
 * so a failed conversion leaves no partial output behind.
 */

import { access, copyFile, mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { MissingInputFileError, RendererFailureError } from '../errors/index.js';
import { DocumentExtractor, describeSize, serializeSvg } from '../extractor/index.js';
import type { ExtractedDocument } from '../extractor/index.js';
import { emitPicture } from '../emitter/index.js';
import { reconcile } from '../reconciler/index.js';
import type { CanonicalFrame } from '../reconciler/index.js';
import type { ExportFormat, Renderer } from '../renderer/index.js';
import { StyleResolver } from '../style/index.js';
import type { FontTables, UnmappedStyleValue } from '../style/index.js';
import type { OutputMethod } from '../config/index.js';
import { ProgressReporter } from '../cli/progress.js';

export interface ConverterOptions {
  renderer: Renderer;
  fonts: FontTables;
  reporter?: ProgressReporter;
  /** Parent of the per-conversion working directories. Default: os.tmpdir() */
  tmpRoot?: string;
}

export interface ConvertOptions {
  /** Default: latex-pdf */
  method?: OutputMethod;
  /** Default: the input file's directory */
  outDir?: string;
}

export interface ConversionResult {
  input: string;
  method: OutputMethod;
  /** Background (latex-*) or whole-drawing (pdf, eps) export */
  artifactPath: string;
  /** LaTeX overlay, latex-* methods only */
  markupPath?: string;
  labelCount: number;
  warnings: UnmappedStyleValue[];
  frame?: CanonicalFrame;
  durationMs: number;
}

function exportFormat(method: OutputMethod): ExportFormat {
  return method.endsWith('eps') ? 'eps' : 'pdf';
}

interface OutputPlan {
  method: OutputMethod;
  format: ExportFormat;
  outDir: string;
  base: string;
  artifactName: string;
  /** latex-* methods only */
  markupName?: string;
}

function planOutputs(inputPath: string, options: ConvertOptions): OutputPlan {
  const method = options.method ?? 'latex-pdf';
  const format = exportFormat(method);
  const base = path.basename(inputPath, path.extname(inputPath));
  return {
    method,
    format,
    outDir: options.outDir ?? path.dirname(inputPath),
    base,
    artifactName: `${base}.${format}`,
    markupName: method.startsWith('latex-') ? `${base}.${format}_tex` : undefined,
  };
}

export class SvgConverter {
  private readonly renderer: Renderer;
  private readonly extractor: DocumentExtractor;
  private readonly reporter: ProgressReporter;
  private readonly tmpRoot: string;

  constructor(options: ConverterOptions) {
    this.renderer = options.renderer;
    this.extractor = new DocumentExtractor(new StyleResolver(options.fonts));
    this.reporter = options.reporter ?? new ProgressReporter();
    this.tmpRoot = options.tmpRoot ?? os.tmpdir();
  }

  /** Files `convert` would write for these options. Touches nothing on disk. */
  outputPaths(inputPath: string, options: ConvertOptions = {}): string[] {
    const plan = planOutputs(inputPath, options);
    const names = plan.markupName === undefined ? [plan.artifactName] : [plan.artifactName, plan.markupName];
    return names.map((name) => path.join(plan.outDir, name));
  }

  /** Read and extract a document without rendering anything. */
  async extract(inputPath: string): Promise<ExtractedDocument> {
    await this.assertInput(inputPath);
    const source = await readFile(inputPath, 'utf-8');
    const extracted = this.extractor.extract(source, inputPath);
    this.reporter.logInfo(`${path.basename(inputPath)}: ${describeSize(extracted.size)}`);
    for (const warning of extracted.warnings) {
      this.reporter.warn(warning.elementId ? `${warning.message} (in #${warning.elementId})` : warning.message);
    }
    return extracted;
  }

  async convert(inputPath: string, options: ConvertOptions = {}): Promise<ConversionResult> {
    const start = Date.now();
    const { method, format, outDir, base, artifactName, markupName } = planOutputs(inputPath, options);
    await this.assertInput(inputPath);

    const workDir = await mkdtemp(path.join(this.tmpRoot, 'svgpicture-'));
    try {
      const workArtifact = path.join(workDir, artifactName);

      if (markupName === undefined) {
        await this.renderTo(inputPath, workArtifact, format);
        const artifactPath = await this.publish(workArtifact, outDir);
        return { input: inputPath, method, artifactPath, labelCount: 0, warnings: [], durationMs: Date.now() - start };
      }

      const extracted = await this.extract(inputPath);
      const strippedPath = path.join(workDir, `${base}.svg`);
      await writeFile(strippedPath, serializeSvg(extracted.residual), 'utf-8');

      const originalBoxes = await this.renderer.queryBoxes(inputPath);
      const strippedBoxes = await this.renderer.queryBoxes(strippedPath);
      await this.renderTo(strippedPath, workArtifact, format);

      const { frame, pdfBox } = reconcile({
        originalBoxes,
        strippedBoxes,
        consumedIds: extracted.consumedIds,
        ignoredIds: extracted.ignoredIds,
        anchorPoints: extracted.anchorPoints,
        rootId: extracted.rootId,
      });
      const markup = emitPicture({ frame, pdfBox, labels: extracted.labels, background: artifactName });
      const workMarkup = path.join(workDir, markupName);
      await writeFile(workMarkup, markup, 'utf-8');

      const artifactPath = await this.publish(workArtifact, outDir);
      const markupPath = await this.publish(workMarkup, outDir);
      return {
        input: inputPath,
        method,
        artifactPath,
        markupPath,
        labelCount: extracted.labels.length,
        warnings: extracted.warnings,
        frame,
        durationMs: Date.now() - start,
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  // ─── Private helpers ───────────────────────────────────────────────────────

  private async assertInput(inputPath: string): Promise<void> {
    try {
      await access(inputPath);
    } catch {
      throw new MissingInputFileError(inputPath);
    }
  }

  private async renderTo(svgPath: string, outPath: string, format: ExportFormat): Promise<void> {
    const artifact = await this.renderer.render(svgPath, outPath, format);
    try {
      await access(artifact.path);
    } catch {
      throw new RendererFailureError(`Renderer reported success but wrote no ${format} to ${artifact.path}`);
    }
  }

  private async publish(workFile: string, outDir: string): Promise<string> {
    await mkdir(outDir, { recursive: true });
    const target = path.join(outDir, path.basename(workFile));
    await copyFile(workFile, target);
    return target;
  }
}
