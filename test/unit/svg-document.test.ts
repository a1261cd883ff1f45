/**
 * Unit tests for SVG document reading.
 *
 * The basic-shape conversions are tested against plain attribute maps; the
 * document-level behaviour (root attributes, document order, skipped
 * containers) goes through happy-dom's DOMParser.
 */

import { describe, it, expect } from 'vitest';
import { parsePointsList, readSvgDocument, shapeToPathData } from '../../src/svg-document';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function node(localName: string, attributes: Record<string, string>) {
  return {
    localName,
    parentElement: null,
    getAttribute: (name: string): string | null => attributes[name] ?? null,
  };
}

// ---------------------------------------------------------------------------
// Shape conversion
// ---------------------------------------------------------------------------

describe('shapeToPathData', () => {
  it('passes path data through', () => {
    expect(shapeToPathData(node('path', { d: 'M 0 0 L 1 1' }))).toBe('M 0 0 L 1 1');
  });

  it('rejects a path without data', () => {
    expect(shapeToPathData(node('path', { d: '   ' }))).toBeNull();
    expect(shapeToPathData(node('path', {}))).toBeNull();
  });

  it('converts a rect to a closed outline', () => {
    expect(shapeToPathData(node('rect', { x: '1', y: '2', width: '10', height: '5' }))).toBe(
      'M 1 2 L 11 2 L 11 7 L 1 7 Z'
    );
  });

  it('rounds rect corners with arcs, reusing rx for a missing ry', () => {
    const d = shapeToPathData(node('rect', { width: '10', height: '10', rx: '2' }));
    expect(d).toBe(
      'M 2 0 L 8 0 A 2 2 0 0 1 10 2 L 10 8 A 2 2 0 0 1 8 10 ' +
        'L 2 10 A 2 2 0 0 1 0 8 L 0 2 A 2 2 0 0 1 2 0 Z'
    );
  });

  it('rejects a rect without area', () => {
    expect(shapeToPathData(node('rect', { width: '0', height: '10' }))).toBeNull();
  });

  it('converts a circle to two half-arcs', () => {
    expect(shapeToPathData(node('circle', { cx: '5', cy: '5', r: '2' }))).toBe(
      'M 3 5 A 2 2 0 1 0 7 5 A 2 2 0 1 0 3 5 Z'
    );
  });

  it('converts an ellipse with separate radii', () => {
    expect(shapeToPathData(node('ellipse', { cx: '0', cy: '0', rx: '4', ry: '1' }))).toBe(
      'M -4 0 A 4 1 0 1 0 4 0 A 4 1 0 1 0 -4 0 Z'
    );
  });

  it('converts a line', () => {
    expect(shapeToPathData(node('line', { x1: '0', y1: '1', x2: '3', y2: '4' }))).toBe('M 0 1 L 3 4');
  });

  it('closes polygons but not polylines', () => {
    expect(shapeToPathData(node('polygon', { points: '0,0 4,0 4,4' }))).toBe('M 0 0 L 4 0 L 4 4 Z');
    expect(shapeToPathData(node('polyline', { points: '0,0 4,0 4,4' }))).toBe('M 0 0 L 4 0 L 4 4');
  });

  it('ignores unsupported elements', () => {
    expect(shapeToPathData(node('text', {}))).toBeNull();
  });
});

describe('parsePointsList', () => {
  it('reads pairs and drops a trailing odd coordinate', () => {
    expect(parsePointsList(' 1,2 3 4, 5 ')).toEqual([1, 2, 3, 4]);
  });

  it('stops at the first malformed pair', () => {
    expect(parsePointsList('1,2 x,4 5,6')).toEqual([1, 2]);
  });
});

// ---------------------------------------------------------------------------
// Document reading
// ---------------------------------------------------------------------------

describe('readSvgDocument', () => {
  const svg = `<svg xmlns="http://www.w3.org/2000/svg" width="120px" height="80" viewBox="0 0 60 40">
  <defs><rect id="hidden" width="5" height="5"/></defs>
  <circle id="dot" cx="5" cy="5" r="2" fill="red" style="stroke: blue"/>
  <path id="zig" d="M 0 0 L 10 10" transform="translate(1, 2)" stroke-width="3"/>
  <rect width="4" height="4"/>
</svg>`;

  it('reads the declared size and viewBox', async () => {
    const data = await readSvgDocument(svg);
    expect(data.declared).toEqual({ width: '120px', height: '80', viewBox: '0 0 60 40' });
  });

  it('returns rendered shapes in document order', async () => {
    const data = await readSvgDocument(svg);
    expect(data.shapes.map((s) => [s.tagName, s.id])).toEqual([
      ['circle', 'dot'],
      ['path', 'zig'],
      ['rect', null],
    ]);
  });

  it('keeps attributes, inline style and transform of each shape', async () => {
    const [dot, zig] = (await readSvgDocument(svg)).shapes;
    expect(dot.attributes).toEqual({ fill: 'red' });
    expect(dot.inlineStyle).toBe('stroke: blue');
    expect(zig.transform).toBe('translate(1, 2)');
    expect(zig.attributes).toEqual({ 'stroke-width': '3' });
  });

  it('throws when there is no svg element', async () => {
    await expect(readSvgDocument('<root><child/></root>')).rejects.toThrow(
      'No <svg> element found in document.'
    );
  });
});
