/**
 * `transform` attribute parsing and ancestor accumulation.
 *
 * Only a single call per attribute is understood:
 *   matrix(a b c d e f) | translate(tx [ty]) | scale(sx [sy]) | rotate(angle [cx cy])
 * Arguments may be separated by commas, whitespace or both.
 */

import { AffineTransform, compose } from './affine-transform.js';
import { ParseError } from '../errors/index.js';
import { parentElement } from '../extractor/svg-dom.js';

const TRANSFORM_RE = /^\s*([A-Za-z]+)\s*\(([^()]*)\)\s*$/;
const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type TransformFactory = (args: number[]) => AffineTransform;

const FUNCTIONS: Record<string, { arity: number[]; build: TransformFactory }> = {
  matrix: {
    arity: [6],
    build: ([a, b, c, d, e, f]) => AffineTransform.matrix(a, b, c, d, e, f),
  },
  translate: {
    arity: [1, 2],
    build: ([tx, ty]) => AffineTransform.identity().translate(tx, ty ?? 0),
  },
  scale: {
    arity: [1, 2],
    build: ([sx, sy]) => AffineTransform.identity().scale(sx, sy ?? sx),
  },
  rotate: {
    arity: [1, 3],
    build: ([angle, cx, cy]) => AffineTransform.identity().rotateDegrees(angle, cx ?? 0, cy ?? 0),
  },
};

export function parseTransform(attribute: string): AffineTransform {
  const match = TRANSFORM_RE.exec(attribute);
  if (!match) {
    throw new ParseError(`Malformed transform "${attribute}"`, attribute);
  }
  const [, name, rawArgs] = match;

  if (!Object.prototype.hasOwnProperty.call(FUNCTIONS, name)) {
    throw new ParseError(`Unsupported transform function "${attribute}"`, attribute);
  }
  const fn = FUNCTIONS[name];

  const tokens = rawArgs.split(/[\s,]+/).filter((t) => t.length > 0);
  const args: number[] = [];
  for (const token of tokens) {
    if (!NUMBER_RE.test(token)) {
      throw new ParseError(`Bad number "${token}" in transform "${attribute}"`, attribute);
    }
    args.push(Number(token));
  }

  if (!fn.arity.includes(args.length)) {
    throw new ParseError(
      `${name}() takes ${fn.arity.join(' or ')} arguments, got ${args.length} in "${attribute}"`,
      attribute
    );
  }
  return fn.build(args);
}

/**
 * Transform from `element`'s local coordinates to the document root,
 * composing every `transform` attribute from the element up to the root.
 */
export function accumulateTransform(element: Element): AffineTransform {
  let accumulated = AffineTransform.identity();
  for (let el: Element | null = element; el !== null; el = parentElement(el)) {
    const attribute = el.getAttribute('transform');
    if (attribute) {
      accumulated = compose(parseTransform(attribute), accumulated);
    }
  }
  return accumulated;
}
