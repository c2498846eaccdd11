/**
 * Thin helpers over the @xmldom/xmldom tree.
 *
 * xmldom implements the DOM Level 2 core only (no `parentElement`,
 * `children` or `closest`), so element navigation goes through
 * `parentNode` / `childNodes` with a node-type guard.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { ParseError } from '../errors/index.js';

export const SVG_NS = 'http://www.w3.org/2000/svg';
export const XLINK_NS = 'http://www.w3.org/1999/xlink';
export const TEXTEXT_NS = 'http://www.iki.fi/pav/software/textext/';

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function parentElement(el: Element): Element | null {
  const parent = el.parentNode;
  return parent !== null && isElement(parent) ? parent : null;
}

export function childElements(el: Element): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < el.childNodes.length; i++) {
    const child = el.childNodes[i];
    if (isElement(child)) out.push(child);
  }
  return out;
}

/** Every element below `el`, depth first, in document order. */
export function descendants(el: Element): Element[] {
  const out: Element[] = [];
  for (const child of childElements(el)) {
    out.push(child, ...descendants(child));
  }
  return out;
}

export function isSvgElement(el: Element, localName: string): boolean {
  return el.namespaceURI === SVG_NS && el.localName === localName;
}

/**
 * Position of `el` below the document element, as element-child indices.
 * Stable between two parses of the same source text.
 */
export function elementPath(el: Element): number[] {
  const path: number[] = [];
  let node = el;
  let parent = parentElement(node);
  while (parent !== null) {
    path.unshift(childElements(parent).indexOf(node));
    node = parent;
    parent = parentElement(node);
  }
  return path;
}

export function resolvePath(root: Element, path: number[]): Element | null {
  let node: Element | undefined = root;
  for (const index of path) {
    node = childElements(node)[index];
    if (node === undefined) return null;
  }
  return node;
}

/** Parse SVG source text; XML errors raise ParseError. */
export function parseSvg(source: string, fileName = '<svg>'): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => {
        problems.push(msg);
      },
      fatalError: (msg: string) => {
        problems.push(msg);
      },
    },
  });
  let doc: Document;
  try {
    doc = parser.parseFromString(source, 'image/svg+xml');
  } catch (err) {
    throw new ParseError(`Invalid SVG document ${fileName}: ${err instanceof Error ? err.message : String(err)}`, undefined, {
      file: fileName,
    });
  }
  const root = doc.documentElement;
  if (problems.length > 0 || root === null || root.localName !== 'svg') {
    throw new ParseError(`Invalid SVG document ${fileName}: ${problems[0] ?? 'no root <svg> element'}`, undefined, {
      file: fileName,
    });
  }
  return doc;
}

export function serializeSvg(doc: Document): string {
  return new XMLSerializer().serializeToString(doc);
}
