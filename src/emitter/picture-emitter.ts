/**
 * Markup Emitter
 *
 * Serializes labels into a LaTeX `picture` environment whose unit length is
 * the width of the canonical frame, with the background artifact placed
 * underneath. Include the result with `\def\svgwidth{...}\input{x.pdf_tex}`.
 *
 * SVG puts the origin at the top left with y downward; `picture` puts it at
 * the bottom left with y upward.
 */

import type { BoundingBox, Point } from '../geometry/index.js';
import { ReconciliationError } from '../errors/index.js';
import { SVG_UNITS_TO_BIG_POINTS } from '../extractor/index.js';
import { WEIGHT_BOLD } from '../labels/index.js';
import type { Alignment, Label, OpaqueLabel, StyledLabel } from '../labels/index.js';
import type { CanonicalFrame } from '../reconciler/index.js';

const PICTURE_PREAMBLE = `% Picture generated by svgpicture
\\makeatletter
\\providecommand\\color[2][]{%
  \\errmessage{(svgpicture) Color is used for the text in Inkscape,
    but the package 'color.sty' is not loaded}%
  \\renewcommand\\color[2][]{}}%
\\providecommand\\transparent[1]{%
  \\errmessage{
    (svgpicture) Transparency is used for the text in Inkscape,
    but the package 'transparent.sty' is not loaded}%
  \\renewcommand\\transparent[1]{}}%
\\setlength{\\unitlength}{\\svgwidth}%
\\global\\let\\svgwidth\\undefined%
\\makeatother
`;

const ALIGN_BOX: Record<Alignment, string> = {
  left: '\\makebox(0,0)[bl]',
  center: '\\makebox(0,0)[b]',
  right: '\\makebox(0,0)[br]',
};

const UNIT_WIDTH_TOLERANCE = 1e-9;

export interface PictureInput {
  frame: CanonicalFrame;
  /** Region covered by the background artifact */
  pdfBox: BoundingBox;
  labels: readonly Label[];
  /** Artifact file name as \includegraphics should find it */
  background?: string;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/** Frame-relative, y-up, unit-width coordinates rounded to 3 decimals */
export function normalizePoint(p: Point, frame: CanonicalFrame): Point {
  return {
    x: round3((p.x - frame.xMin) / frame.width),
    y: round3((frame.height + frame.yMin - p.y) / frame.width),
  };
}

export function styledPayload(label: StyledLabel): string {
  let font = `\\${label.fontFamily}family`;
  if (label.fontWeight >= WEIGHT_BOLD) font += '\\bfseries';
  if (label.fontStyle === 'italic') font += '\\itshape';
  else if (label.fontStyle === 'oblique') font += '\\slshape';
  if (label.fontSize !== undefined) font += label.fontSize;

  const [r, g, b] = label.color;
  const color = r !== 0 || g !== 0 || b !== 0 ? `\\color[RGB]{${r},${g},${b}}` : '';

  const body = `${font}${color}${ALIGN_BOX[label.align]}{\\smash{${label.text}}}`;
  return label.rotation !== 0 ? `\\rotatebox{${label.rotation}}{${body}}` : body;
}

export function opaquePayload(label: OpaqueLabel): string {
  return `\\scalebox{${SVG_UNITS_TO_BIG_POINTS}}{\\makebox(0,0)[bl]{%\n${label.markup}%\n}}`;
}

export function labelPayload(label: Label): string {
  switch (label.kind) {
    case 'styled':
      return styledPayload(label);
    case 'opaque':
      return opaquePayload(label);
  }
}

export function emitPicture(input: PictureInput): string {
  const { frame, pdfBox } = input;

  const unitWidth = (frame.xMax - frame.xMin) / frame.width;
  if (!Number.isFinite(unitWidth) || Math.abs(unitWidth - 1) > UNIT_WIDTH_TOLERANCE) {
    throw new ReconciliationError(`Normalized frame width is ${unitWidth}, expected 1`, { frame });
  }

  const commands: string[] = [];
  if (input.background !== undefined) {
    // \put anchors the image at its lower-left corner
    const corner = normalizePoint({ x: pdfBox.x, y: pdfBox.y + pdfBox.height }, frame);
    const scale = pdfBox.width / frame.width;
    commands.push(
      `\\put(${corner.x}, ${corner.y}){\\includegraphics[width=${scale}\\unitlength]{${input.background}}}%`
    );
  }
  for (const label of input.labels) {
    const p = normalizePoint(label.position, frame);
    commands.push(`\\put(${p.x}, ${p.y}){${labelPayload(label)}}%`);
  }

  const width = round3(unitWidth);
  const height = round3(frame.height / frame.width);
  return (
    '\\begingroup%\n' +
    PICTURE_PREAMBLE +
    `\\begin{picture}(${width}, ${height})%\n` +
    commands.join('\n') +
    '\n' +
    '\\end{picture}%\n' +
    '\\endgroup%\n'
  );
}
