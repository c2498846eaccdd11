/**
 * Converter Tests
 *
 * SvgConverter against an in-process renderer that records its calls and
 * writes placeholder artifacts into real temporary directories, plus the
 * BatchConverter worker pool.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import os from 'os';
import fs from 'fs';
import path from 'path';
import { readFile, writeFile } from 'fs/promises';
import { SvgConverter } from './converter.js';
import type { ConversionResult } from './converter.js';
import { BatchConverter } from './batch-converter.js';
import { ProgressReporter } from '../cli/progress.js';
import { defaultFontTables } from '../config/index.js';
import type { BoundingBox } from '../geometry/index.js';
import type { ExportFormat, RenderedArtifact, Renderer } from '../renderer/index.js';
import {
  MissingInputFileError,
  OutputConflictError,
  RendererFailureError,
  SvgPictureError,
  UnsupportedColorFormatError,
} from '../errors/index.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

const FIGURE = `<svg xmlns="http://www.w3.org/2000/svg" id="svg1" width="96" height="96">
  <rect id="box" x="0" y="0" width="50" height="50"/>
  <g id="layer" transform="translate(5,5)">
    <text id="label1" style="fill:#ff0000;font-size:12px"><tspan x="10" y="20">Hello</tspan></text>
  </g>
</svg>`;

const ORIGINAL_BOXES: Array<[string, BoundingBox]> = [
  ['svg1', { x: 0, y: 0, width: 96, height: 96 }],
  ['label1', { x: 15, y: 13, width: 30, height: 12 }],
];

const STRIPPED_BOXES: Array<[string, BoundingBox]> = [
  ['svg1', { x: 0, y: 0, width: 50, height: 50 }],
  ['box', { x: 0, y: 0, width: 50, height: 50 }],
];

class FakeRenderer implements Renderer {
  readonly queries: string[] = [];
  readonly renders: Array<{ svgPath: string; source: string; format: ExportFormat }> = [];

  constructor(
    private readonly originalPath: string,
    private readonly options: { writeArtifact?: boolean; failRender?: boolean } = {}
  ) {}

  async queryBoxes(svgPath: string): Promise<Map<string, BoundingBox>> {
    this.queries.push(svgPath);
    return new Map(svgPath === this.originalPath ? ORIGINAL_BOXES : STRIPPED_BOXES);
  }

  async render(svgPath: string, outPath: string, format: ExportFormat): Promise<RenderedArtifact> {
    if (this.options.failRender) {
      throw new RendererFailureError('export failed', 1);
    }
    this.renders.push({ svgPath, source: await readFile(svgPath, 'utf-8'), format });
    if (this.options.writeArtifact ?? true) {
      await writeFile(outPath, `%FAKE ${format}\n`);
    }
    return { path: outPath, format };
  }
}

function quietReporter(): ProgressReporter {
  const reporter = new ProgressReporter(true);
  vi.spyOn(reporter, 'warn').mockImplementation(() => {});
  vi.spyOn(reporter, 'logInfo').mockImplementation(() => {});
  return reporter;
}

// ─── SvgConverter ─────────────────────────────────────────────────────────────

describe('SvgConverter', () => {
  let dir: string;
  let tmpRoot: string;
  let input: string;
  let reporter: ProgressReporter;

  function makeConverter(renderer: Renderer): SvgConverter {
    return new SvgConverter({ renderer, fonts: defaultFontTables(), reporter, tmpRoot });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'svgpicture-test-'));
    tmpRoot = path.join(dir, 'work');
    fs.mkdirSync(tmpRoot);
    input = path.join(dir, 'figure.svg');
    fs.writeFileSync(input, FIGURE);
    reporter = quietReporter();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('writes the background and the picture markup beside the input', async () => {
    const result = await makeConverter(new FakeRenderer(input)).convert(input);

    expect(result.method).toBe('latex-pdf');
    expect(result.artifactPath).toBe(path.join(dir, 'figure.pdf'));
    expect(result.markupPath).toBe(path.join(dir, 'figure.pdf_tex'));
    expect(result.labelCount).toBe(1);
    expect(result.frame).toEqual({ xMin: 0, xMax: 50, yMin: 0, yMax: 50, width: 50, height: 50 });
    expect(fs.readFileSync(result.artifactPath, 'utf-8')).toBe('%FAKE pdf\n');

    const markup = fs.readFileSync(path.join(dir, 'figure.pdf_tex'), 'utf-8').split('\n');
    const start = markup.indexOf('\\begin{picture}(1, 1)%');
    expect(markup.slice(start + 1, start + 3)).toEqual([
      '\\put(0, 0){\\includegraphics[width=1\\unitlength]{figure.pdf}}%',
      '\\put(0.3, 0.5){\\rmfamily\\normalsize\\color[RGB]{255,0,0}\\makebox(0,0)[bl]{\\smash{Hello}}}%',
    ]);
  });

  it('queries both documents and renders the stripped one', async () => {
    const renderer = new FakeRenderer(input);
    await makeConverter(renderer).convert(input);

    expect(renderer.queries).toHaveLength(2);
    expect(renderer.queries[0]).toBe(input);
    expect(renderer.renders).toHaveLength(1);
    expect(renderer.renders[0].svgPath).toBe(renderer.queries[1]);
    expect(renderer.renders[0].source).not.toContain('<text');
    expect(renderer.renders[0].source).toContain('id="box"');
  });

  it('produces eps artifacts for latex-eps', async () => {
    const result = await makeConverter(new FakeRenderer(input)).convert(input, { method: 'latex-eps' });
    expect(result.artifactPath).toBe(path.join(dir, 'figure.eps'));
    expect(result.markupPath).toBe(path.join(dir, 'figure.eps_tex'));
    expect(fs.readFileSync(path.join(dir, 'figure.eps_tex'), 'utf-8')).toContain('{figure.eps}}%');
  });

  it('exports the whole drawing for plain methods', async () => {
    const renderer = new FakeRenderer(input);
    const result = await makeConverter(renderer).convert(input, { method: 'pdf' });

    expect(renderer.queries).toEqual([]);
    expect(renderer.renders.map((r) => r.svgPath)).toEqual([input]);
    expect(result.markupPath).toBeUndefined();
    expect(result.labelCount).toBe(0);
    expect(fs.existsSync(path.join(dir, 'figure.pdf'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'figure.pdf_tex'))).toBe(false);
  });

  it('writes into outDir, creating it', async () => {
    const outDir = path.join(dir, 'build', 'figures');
    const result = await makeConverter(new FakeRenderer(input)).convert(input, { outDir });
    expect(result.markupPath).toBe(path.join(outDir, 'figure.pdf_tex'));
    expect(fs.readdirSync(outDir).sort()).toEqual(['figure.pdf', 'figure.pdf_tex']);
  });

  it('produces byte-identical output on a second run', async () => {
    const converter = makeConverter(new FakeRenderer(input));
    await converter.convert(input);
    const first = fs.readFileSync(path.join(dir, 'figure.pdf_tex'));
    await converter.convert(input);
    expect(fs.readFileSync(path.join(dir, 'figure.pdf_tex')).equals(first)).toBe(true);
  });

  it('removes its working directory', async () => {
    await makeConverter(new FakeRenderer(input)).convert(input);
    expect(fs.readdirSync(tmpRoot)).toEqual([]);
  });

  it('fails on a missing input without calling the renderer', async () => {
    const renderer = new FakeRenderer(input);
    const missing = path.join(dir, 'nope.svg');
    await expect(makeConverter(renderer).convert(missing)).rejects.toBeInstanceOf(MissingInputFileError);
    expect(renderer.queries).toEqual([]);
  });

  it('writes nothing when the document is rejected', async () => {
    fs.writeFileSync(input, FIGURE.replace('#ff0000', 'red'));
    await expect(makeConverter(new FakeRenderer(input)).convert(input)).rejects.toBeInstanceOf(
      UnsupportedColorFormatError
    );
    expect(fs.readdirSync(dir).sort()).toEqual(['figure.svg', 'work']);
    expect(fs.readdirSync(tmpRoot)).toEqual([]);
  });

  it('writes nothing when the renderer fails', async () => {
    await expect(
      makeConverter(new FakeRenderer(input, { failRender: true })).convert(input)
    ).rejects.toBeInstanceOf(RendererFailureError);
    expect(fs.readdirSync(dir).sort()).toEqual(['figure.svg', 'work']);
    expect(fs.readdirSync(tmpRoot)).toEqual([]);
  });

  it('fails when the renderer reports success without an artifact', async () => {
    await expect(
      makeConverter(new FakeRenderer(input, { writeArtifact: false })).convert(input)
    ).rejects.toThrow('Renderer reported success but wrote no pdf');
  });

  it('reports unmapped style values as warnings', async () => {
    fs.writeFileSync(input, FIGURE.replace('font-size:12px', 'font-size:12px;font-family:Comic Sans'));
    const result = await makeConverter(new FakeRenderer(input)).convert(input);
    expect(result.warnings.map((w) => w.message)).toEqual(['Could not match font-family "Comic Sans"']);
    expect(reporter.warn).toHaveBeenCalledWith('Could not match font-family "Comic Sans" (in #label1)');
  });

  it('lists the files it would write', () => {
    const converter = makeConverter(new FakeRenderer(input));
    expect(converter.outputPaths(input)).toEqual([path.join(dir, 'figure.pdf'), path.join(dir, 'figure.pdf_tex')]);
    expect(converter.outputPaths(input, { method: 'eps', outDir: 'out' })).toEqual([path.join('out', 'figure.eps')]);
  });

  it('extracts without rendering', async () => {
    const renderer = new FakeRenderer(input);
    const extracted = await makeConverter(renderer).extract(input);
    expect(extracted.labels).toHaveLength(1);
    expect(renderer.queries).toEqual([]);
    expect(renderer.renders).toEqual([]);
    expect(reporter.logInfo).toHaveBeenCalledWith('figure.svg: 96.00 x 96.00 px, 1.00 x 1.00 in, 72.00 x 72.00 bp');
  });
});

// ─── BatchConverter ───────────────────────────────────────────────────────────

describe('BatchConverter', () => {
  let reporter: ProgressReporter;
  let converter: SvgConverter;

  function fakeResult(input: string): ConversionResult {
    return {
      input,
      method: 'latex-pdf',
      artifactPath: input.replace('.svg', '.pdf'),
      markupPath: input.replace('.svg', '.pdf_tex'),
      labelCount: 0,
      warnings: [],
      durationMs: 0,
    };
  }

  beforeEach(() => {
    reporter = new ProgressReporter();
    vi.spyOn(reporter, 'startTask').mockImplementation(() => {});
    vi.spyOn(reporter, 'completeTask').mockImplementation(() => {});
    vi.spyOn(reporter, 'failTask').mockImplementation(() => {});
    converter = new SvgConverter({ renderer: new FakeRenderer('unused'), fonts: defaultFontTables(), reporter });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns results in input order', async () => {
    vi.spyOn(converter, 'convert').mockImplementation(async (input) => {
      await new Promise((resolve) => setTimeout(resolve, input === 'a.svg' ? 20 : 1));
      return fakeResult(input);
    });
    const results = await new BatchConverter(converter, reporter, 3).processBatch([
      { input: 'a.svg' },
      { input: 'b.svg' },
      { input: 'c.svg' },
    ]);
    expect(results.map((r) => r.input)).toEqual(['a.svg', 'b.svg', 'c.svg']);
    expect(results.every((r) => r.success)).toBe(true);
  });

  it('collects failures without stopping other jobs', async () => {
    vi.spyOn(converter, 'convert').mockImplementation(async (input) => {
      if (input === 'b.svg') throw new MissingInputFileError('b.svg');
      return fakeResult(input);
    });
    const results = await new BatchConverter(converter, reporter, 1).processBatch([
      { input: 'a.svg' },
      { input: 'b.svg' },
      { input: 'c.svg' },
    ]);
    expect(results.map((r) => r.success)).toEqual([true, false, true]);
    expect(results[1].error).toBeInstanceOf(MissingInputFileError);
    expect(reporter.failTask).toHaveBeenCalledWith('Convert b.svg', new Error('Input file not found: b.svg'));
  });

  it('wraps non-library errors', async () => {
    vi.spyOn(converter, 'convert').mockRejectedValue(new Error('disk full'));
    const [result] = await new BatchConverter(converter, reporter, 2).processBatch([{ input: 'a.svg' }]);
    expect(result.error).toBeInstanceOf(SvgPictureError);
    expect(result.error?.code).toBe('UNKNOWN_ERROR');
    expect(result.error?.message).toBe('disk full');
  });

  it('passes method and outDir through to the converter', async () => {
    const convert = vi.spyOn(converter, 'convert').mockImplementation(async (input) => fakeResult(input));
    await new BatchConverter(converter, reporter).processBatch([{ input: 'a.svg', method: 'latex-eps', outDir: 'out' }]);
    expect(convert).toHaveBeenCalledWith('a.svg', { method: 'latex-eps', outDir: 'out' });
  });

  it('runs no more than concurrency jobs at a time', async () => {
    let running = 0;
    let peak = 0;
    vi.spyOn(converter, 'convert').mockImplementation(async (input) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return fakeResult(input);
    });
    const jobs = ['a', 'b', 'c', 'd', 'e'].map((name) => ({ input: `${name}.svg` }));
    const results = await new BatchConverter(converter, reporter, 2).processBatch(jobs);
    expect(results).toHaveLength(5);
    expect(peak).toBe(2);
  });

  it('fails jobs whose outputs collide without converting them', async () => {
    const convert = vi.spyOn(converter, 'convert').mockImplementation(async (input) => fakeResult(input));
    const first = path.join('a', 'fig.svg');
    const second = path.join('b', 'fig.svg');
    const results = await new BatchConverter(converter, reporter, 2).processBatch([
      { input: first, outDir: 'out' },
      { input: second, outDir: 'out' },
      { input: path.join('a', 'other.svg'), outDir: 'out' },
    ]);

    expect(results.map((r) => r.success)).toEqual([false, false, true]);
    expect(results[0].error).toBeInstanceOf(OutputConflictError);
    expect(results[1].error?.message).toBe(
      `Output ${path.resolve('out', 'fig.pdf')} would be written by several inputs: ${first}, ${second}`
    );
    expect(convert).toHaveBeenCalledTimes(1);
    expect(convert).toHaveBeenCalledWith(path.join('a', 'other.svg'), { method: undefined, outDir: 'out' });
  });

  it('treats a plain export and an overlay background of one drawing as a collision', async () => {
    const convert = vi.spyOn(converter, 'convert').mockImplementation(async (input) => fakeResult(input));
    const results = await new BatchConverter(converter, reporter).processBatch([
      { input: 'fig.svg', method: 'pdf' },
      { input: 'fig.svg', method: 'latex-pdf' },
    ]);
    expect(results.map((r) => r.error?.code)).toEqual(['OUTPUT_CONFLICT', 'OUTPUT_CONFLICT']);
    expect(convert).not.toHaveBeenCalled();
  });

  it('lets distinct methods of one drawing run side by side', async () => {
    vi.spyOn(converter, 'convert').mockImplementation(async (input) => fakeResult(input));
    const results = await new BatchConverter(converter, reporter).processBatch([
      { input: 'fig.svg', method: 'latex-pdf' },
      { input: 'fig.svg', method: 'latex-eps' },
    ]);
    expect(results.every((r) => r.success)).toBe(true);
  });

  it('returns an empty list for no jobs', async () => {
    expect(await new BatchConverter(converter, reporter).processBatch([])).toEqual([]);
  });
});
