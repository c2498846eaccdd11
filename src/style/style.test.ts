/**
 * Style Tests
 *
 * Style-string parsing, color / weight decoding and label resolution
 * against font lookup tables.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { parseStyleString, mergeStyles, parseColor, parseFontWeight } from './style-parser.js';
import { StyleResolver } from './style-resolver.js';
import { createStyledLabel } from '../labels/index.js';
import type { StyledLabel } from '../labels/index.js';
import { defaultFontTables } from '../config/index.js';
import { InvalidWeightError, UnsupportedColorFormatError } from '../errors/index.js';

// ─── parseStyleString ─────────────────────────────────────────────────────────

describe('parseStyleString', () => {
  it('splits declarations and trims keys and values', () => {
    expect(parseStyleString(' fill : #ff0000 ;font-size:12px')).toEqual({ fill: '#ff0000', 'font-size': '12px' });
  });

  it('splits each declaration on its first colon', () => {
    expect(parseStyleString('font-family:a:b')).toEqual({ 'font-family': 'a:b' });
  });

  it('lets later duplicates win', () => {
    expect(parseStyleString('fill:#000000;fill:#ffffff')).toEqual({ fill: '#ffffff' });
  });

  it('ignores empty declarations', () => {
    expect(parseStyleString(';;')).toEqual({});
    expect(parseStyleString('')).toEqual({});
  });
});

describe('mergeStyles', () => {
  it('overrides parent keys with child keys', () => {
    expect(mergeStyles({ fill: '#000000', 'font-size': '9px' }, { fill: '#00ff00' })).toEqual({
      fill: '#00ff00',
      'font-size': '9px',
    });
  });
});

// ─── Value decoders ───────────────────────────────────────────────────────────

describe('parseColor', () => {
  it('decodes #rrggbb in either case', () => {
    expect(parseColor('#ff0000')).toEqual([255, 0, 0]);
    expect(parseColor('#0A0b0C')).toEqual([10, 11, 12]);
  });

  it.each(['red', '#f00', 'rgb(255,0,0)', '#ff00000', 'none'])('rejects %s', (value) => {
    expect(() => parseColor(value)).toThrow(UnsupportedColorFormatError);
  });
});

describe('parseFontWeight', () => {
  it('maps keywords and integers', () => {
    expect(parseFontWeight('bold')).toBe(700);
    expect(parseFontWeight('normal')).toBe(500);
    expect(parseFontWeight('300')).toBe(300);
  });

  it('rejects anything else', () => {
    expect(() => parseFontWeight('heavy')).toThrow(InvalidWeightError);
    expect(() => parseFontWeight('4.5')).toThrow('Invalid font-weight "4.5"');
  });
});

// ─── StyleResolver ────────────────────────────────────────────────────────────

describe('StyleResolver', () => {
  let resolver: StyleResolver;
  let base: StyledLabel;

  beforeEach(() => {
    resolver = new StyleResolver(defaultFontTables());
    base = createStyledLabel({ x: 1, y: 2 }, 'hi');
  });

  it('applies every recognized property', () => {
    const { label, warnings } = resolver.resolve(
      {
        fill: '#ff0000',
        'font-weight': 'bold',
        'font-style': 'italic',
        'text-anchor': 'middle',
        'font-family': 'CMU Sans Serif',
        'font-size': '12px',
      },
      base
    );
    expect(warnings).toEqual([]);
    expect(label.color).toEqual([255, 0, 0]);
    expect(label.fontWeight).toBe(700);
    expect(label.fontStyle).toBe('italic');
    expect(label.align).toBe('center');
    expect(label.fontFamily).toBe('sf');
    expect(label.fontSize).toBe('\\normalsize');
  });

  it('leaves the input label untouched', () => {
    resolver.resolve({ fill: '#00ff00' }, base);
    expect(base.color).toEqual([0, 0, 0]);
  });

  it('warns on an unknown font family and keeps the previous family', () => {
    const { label, warnings } = resolver.resolve({ 'font-family': 'Comic Sans' }, base);
    expect(label.fontFamily).toBe('rm');
    expect(warnings).toEqual([
      { property: 'font-family', value: 'Comic Sans', message: 'Could not match font-family "Comic Sans"' },
    ]);
  });

  it('warns on an unknown font size and leaves the size unset', () => {
    const { label, warnings } = resolver.resolve({ 'font-size': '17px' }, base);
    expect(label.fontSize).toBeUndefined();
    expect(warnings.map((w) => w.message)).toEqual(['Could not match font-size "17px"']);
  });

  it('ignores unrecognized font-style and text-anchor values', () => {
    const { label } = resolver.resolve({ 'font-style': 'backslanted', 'text-anchor': 'justify' }, base);
    expect(label.fontStyle).toBe('normal');
    expect(label.align).toBe('left');
  });

  it('does not match inherited object keys as table entries', () => {
    const { warnings } = resolver.resolve({ 'font-family': 'toString' }, base);
    expect(warnings).toHaveLength(1);
  });

  it('propagates fatal decoding errors', () => {
    expect(() => resolver.resolve({ fill: 'blue' }, base)).toThrow('Unsupported fill color "blue"');
    expect(() => resolver.resolve({ 'font-weight': 'extra' }, base)).toThrow(InvalidWeightError);
  });

  it('honours custom tables', () => {
    const custom = new StyleResolver({ fontFamilies: { Inconsolata: 'tt' }, fontSizes: { '20px': '\\Huge' } });
    const { label } = custom.resolve({ 'font-family': 'Inconsolata', 'font-size': '20px' }, base);
    expect(label.fontFamily).toBe('tt');
    expect(label.fontSize).toBe('\\Huge');
  });
});
