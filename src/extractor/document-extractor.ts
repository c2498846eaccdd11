/**
 * Document Text Extractor
 *
 * Turns every <text> element and every textext object of an SVG document
 * into a Label, and produces the geometry-only residual document that the
 * renderer draws as the background.
 *
 * Extraction runs in two phases: labels and the paths of the nodes to
 * drop are collected from one parse of the source, then a second parse is
 * pruned by those paths.
 */

import { accumulateTransform } from '../geometry/index.js';
import type { Point } from '../geometry/index.js';
import { ParseError } from '../errors/index.js';
import { createOpaqueLabel, createStyledLabel } from '../labels/index.js';
import type { Label, OpaqueLabel, StyledLabel } from '../labels/index.js';
import { mergeStyles, parseStyleString } from '../style/index.js';
import type { StyleMap, StyleResolver, UnmappedStyleValue } from '../style/index.js';
import { documentSize } from './document-size.js';
import type { DocumentSize } from './document-size.js';
import { decodeEscapes } from './escapes.js';
import {
  TEXTEXT_NS,
  childElements,
  descendants,
  elementPath,
  isSvgElement,
  parseSvg,
  resolvePath,
} from './svg-dom.js';

/** Presentation attributes that act as low-priority style declarations */
const PRESENTATION_ATTRIBUTES = ['fill', 'font-family', 'font-size', 'font-style', 'font-weight', 'text-anchor'];

/** Containers whose content is never painted directly */
const UNPAINTED_CONTAINERS = ['defs', 'pattern'];

export interface ExtractedDocument {
  labels: Label[];
  /** ids of text elements converted to labels and removed from `residual` */
  consumedIds: Set<string>;
  /** ids of elements inside <defs>/<pattern>, left out of bounding-box aggregation */
  ignoredIds: Set<string>;
  /** Label anchors of converted elements without an id, which no box query can report */
  anchorPoints: Point[];
  /** The source document without its text, for the background render */
  residual: Document;
  /** id of the root <svg>, when it has one */
  rootId?: string;
  size: DocumentSize;
  warnings: UnmappedStyleValue[];
}

/** Running state of the fold over a text element's runs */
interface RunAccumulator {
  texts: string[];
  /** Placement of the first run */
  anchor?: { position: Point; rotation: number };
  /** Label resolved from the latest run's style */
  label?: StyledLabel;
  warnings: UnmappedStyleValue[];
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function ownStyle(el: Element): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const name of PRESENTATION_ATTRIBUTES) {
    const value = el.getAttribute(name);
    if (value) attrs[name] = value.trim();
  }
  return mergeStyles(attrs, parseStyleString(el.getAttribute('style') ?? ''));
}

/** First number of an `x`/`y` attribute, which may hold a list. */
function coordinate(el: Element, name: 'x' | 'y'): number | undefined {
  const raw = el.getAttribute(name);
  if (!raw || raw.trim() === '') return undefined;
  const first = raw.trim().split(/[\s,]+/)[0];
  const value = Number(first);
  if (!Number.isFinite(value)) {
    throw new ParseError(`Bad ${name} coordinate "${raw}"`, raw, { id: el.getAttribute('id') });
  }
  return value;
}

export class DocumentExtractor {
  constructor(private readonly resolver: StyleResolver) {}

  extract(source: string, fileName?: string): ExtractedDocument {
    const doc = parseSvg(source, fileName);
    const root = doc.documentElement;
    const all = descendants(root);

    const ignoredIds = new Set<string>();
    for (const container of all.filter((el) => UNPAINTED_CONTAINERS.some((name) => isSvgElement(el, name)))) {
      for (const el of descendants(container)) {
        const id = el.getAttribute('id');
        if (id) ignoredIds.add(id);
      }
    }

    const labels: Label[] = [];
    const consumedIds = new Set<string>();
    const anchorPoints: Point[] = [];
    const warnings: UnmappedStyleValue[] = [];
    const dropped: Element[] = [];

    for (const textEl of all.filter((el) => isSvgElement(el, 'text'))) {
      const result = this.extractText(textEl);
      const id = textEl.getAttribute('id');
      if (result.label.text !== '') {
        labels.push(result.label);
        if (!id) anchorPoints.push(result.label.position);
      }
      warnings.push(...result.warnings);
      if (id) consumedIds.add(id);
      dropped.push(textEl);
    }

    for (const el of all.filter((e) => e.hasAttributeNS(TEXTEXT_NS, 'text'))) {
      if (dropped.some((d) => d === el || descendants(d).includes(el))) continue;
      const label = this.extractTextext(el);
      labels.push(label);
      const id = el.getAttribute('id');
      if (id) consumedIds.add(id);
      else anchorPoints.push(label.position);
      dropped.push(el);
    }

    const rootId = root.getAttribute('id');
    return {
      labels,
      consumedIds,
      ignoredIds,
      anchorPoints,
      residual: this.buildResidual(source, fileName, dropped.map(elementPath)),
      rootId: rootId || undefined,
      size: documentSize(root),
      warnings,
    };
  }

  /**
   * One label per <text>: runs are its <tspan> children, or the element
   * itself when it has none. Text is joined from every run; placement comes
   * from the first run, style from the last.
   */
  private extractText(textEl: Element): { label: StyledLabel; warnings: UnmappedStyleValue[] } {
    const elementStyle = ownStyle(textEl);
    const tspans = childElements(textEl).filter((el) => isSvgElement(el, 'tspan'));
    const runs = tspans.length > 0 ? tspans : [textEl];
    const elementId = textEl.getAttribute('id') || undefined;

    const acc = runs.reduce<RunAccumulator>(
      (state, run) => {
        const style: StyleMap = run === textEl ? elementStyle : mergeStyles(elementStyle, ownStyle(run));
        const transform = accumulateTransform(run);
        const local = {
          x: coordinate(run, 'x') ?? coordinate(textEl, 'x') ?? 0,
          y: coordinate(run, 'y') ?? coordinate(textEl, 'y') ?? 0,
        };
        const position = transform.applyToPoint(local);
        // \rotatebox turns counter-clockwise; SVG's y-down rotation is clockwise
        const angle = round3(transform.getRotationDegrees());
        const rotation = angle === 0 ? 0 : -angle;

        const resolved = this.resolver.resolve(style, createStyledLabel(position));
        const text = (run.textContent ?? '').trim();
        return {
          texts: text === '' ? state.texts : [...state.texts, text],
          anchor: state.anchor ?? { position, rotation },
          label: resolved.label,
          warnings: [...state.warnings, ...resolved.warnings.map((w) => ({ ...w, elementId }))],
        };
      },
      { texts: [], warnings: [] }
    );

    const base = acc.label ?? createStyledLabel({ x: 0, y: 0 });
    const anchor = acc.anchor ?? { position: base.position, rotation: 0 };
    return {
      label: { ...base, text: acc.texts.join(' '), position: anchor.position, rotation: anchor.rotation },
      warnings: acc.warnings,
    };
  }

  /**
   * textext objects carry their LaTeX source; the label sits at the
   * lower-left of the placed glyphs (<use> elements), or at the origin.
   */
  private extractTextext(el: Element): OpaqueLabel {
    const markup = decodeEscapes(el.getAttributeNS(TEXTEXT_NS, 'text') ?? '');
    const transform = accumulateTransform(el);
    const glyphs = descendants(el).filter((d) => isSvgElement(d, 'use'));
    if (glyphs.length === 0) {
      return createOpaqueLabel({ x: 0, y: 0 }, markup);
    }
    let minX = Infinity;
    let maxY = -Infinity;
    for (const glyph of glyphs) {
      const p = transform.applyToPoint({ x: coordinate(glyph, 'x') ?? 0, y: coordinate(glyph, 'y') ?? 0 });
      minX = Math.min(minX, p.x);
      maxY = Math.max(maxY, p.y);
    }
    return createOpaqueLabel({ x: minX, y: maxY }, markup);
  }

  /** Fresh parse of `source` with the nodes at `paths` removed. */
  private buildResidual(source: string, fileName: string | undefined, paths: number[][]): Document {
    const residual = parseSvg(source, fileName);
    const targets = paths
      .map((path) => resolvePath(residual.documentElement, path))
      .filter((el): el is Element => el !== null);
    for (const el of targets) {
      el.parentNode?.removeChild(el);
    }
    return residual;
  }
}
