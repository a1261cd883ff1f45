/**
 * Unit tests for path data parsing and curve evaluation.
 *
 * Tests command coverage (absolute, relative, implicit repeats), subpath
 * splitting, malformed data, smooth-curve reflection, and arc geometry.
 */

import { describe, it, expect } from 'vitest';
import {
  ArcSegment,
  CubicSegment,
  LineSegment,
  QuadraticSegment,
  parsePathData,
  parsePathSegments,
  tokenizePath,
  type CurveSegment,
} from '../../src/path-segments';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function endpoints(segments: readonly CurveSegment[]) {
  return segments.map((s) => [s.start, s.end]);
}

function cubicAt(segments: readonly CurveSegment[], index: number): CubicSegment {
  const segment = segments[index];
  if (!(segment instanceof CubicSegment)) throw new Error(`segment ${index} is not cubic`);
  return segment;
}

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

describe('tokenizePath', () => {
  it('splits packed numbers', () => {
    expect(tokenizePath('M10-4.5.5')).toEqual(['M', '10', '-4.5', '.5']);
  });

  it('reads exponents and commas', () => {
    expect(tokenizePath('L 1e2,3')).toEqual(['L', '1e2', '3']);
  });
});

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

describe('parsePathSegments', () => {
  it('closes a square with Z', () => {
    const segments = parsePathSegments('M 0 0 L 10 0 L 10 10 Z');
    expect(segments).toHaveLength(3);
    expect(segments.every((s) => s instanceof LineSegment)).toBe(true);
    expect(endpoints(segments)).toEqual([
      [{ x: 0, y: 0 }, { x: 10, y: 0 }],
      [{ x: 10, y: 0 }, { x: 10, y: 10 }],
      [{ x: 10, y: 10 }, { x: 0, y: 0 }],
    ]);
  });

  it('resolves relative commands against the current point', () => {
    const segments = parsePathSegments('m 1 1 l 2 0 l 0 2 z');
    expect(endpoints(segments)).toEqual([
      [{ x: 1, y: 1 }, { x: 3, y: 1 }],
      [{ x: 3, y: 1 }, { x: 3, y: 3 }],
      [{ x: 3, y: 3 }, { x: 1, y: 1 }],
    ]);
  });

  it('treats coordinates after M as implicit line-tos', () => {
    const segments = parsePathSegments('M 0 0 10 0 10 10');
    expect(endpoints(segments)).toEqual([
      [{ x: 0, y: 0 }, { x: 10, y: 0 }],
      [{ x: 10, y: 0 }, { x: 10, y: 10 }],
    ]);
  });

  it('handles horizontal and vertical lines', () => {
    const segments = parsePathSegments('M 0 0 H 5 V 5 h -5');
    expect(segments.map((s) => s.end)).toEqual([
      { x: 5, y: 0 },
      { x: 5, y: 5 },
      { x: 0, y: 5 },
    ]);
  });

  it('adds no closing segment when Z is already at the start', () => {
    expect(parsePathSegments('M 0 0 L 5 0 L 0 0 Z')).toHaveLength(2);
  });

  it('stops at a command with missing arguments', () => {
    const segments = parsePathSegments('M 0 0 L 10 0 L 5');
    expect(endpoints(segments)).toEqual([[{ x: 0, y: 0 }, { x: 10, y: 0 }]]);
  });

  it('stops at an unknown command', () => {
    expect(parsePathSegments('M 0 0 L 1 0 X 4 4 L 2 0')).toHaveLength(1);
  });

  it('returns nothing for empty data', () => {
    expect(parsePathSegments('')).toEqual([]);
  });

  it('reflects the previous control point for S after C', () => {
    const segments = parsePathSegments('M 0 0 C 0 10 10 10 10 0 S 20 -10 20 0');
    expect(cubicAt(segments, 1).control1).toEqual({ x: 10, y: -10 });
    expect(cubicAt(segments, 1).end).toEqual({ x: 20, y: 0 });
  });

  it('uses the current point as first control for S without a preceding curve', () => {
    const segments = parsePathSegments('M 0 0 S 10 10 20 0');
    expect(cubicAt(segments, 0).control1).toEqual({ x: 0, y: 0 });
  });

  it('builds quadratic segments for Q and T', () => {
    const segments = parsePathSegments('M 0 0 Q 5 5 10 0 T 20 0');
    expect(segments).toHaveLength(2);
    expect(segments[0]).toBeInstanceOf(QuadraticSegment);
    const second = segments[1];
    if (!(second instanceof QuadraticSegment)) throw new Error('expected quadratic');
    expect(second.control).toEqual({ x: 15, y: -5 });
  });
});

describe('parsePathData', () => {
  it('starts a new subpath where a segment does not continue the previous one', () => {
    const subpaths = parsePathData('M 0 0 L 1 0 M 5 5 L 6 5');
    expect(subpaths).toHaveLength(2);
    expect(subpaths[1][0].start).toEqual({ x: 5, y: 5 });
  });

  it('keeps a closed subpath together', () => {
    expect(parsePathData('M 0 0 L 10 0 L 10 10 Z')).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// Curve evaluation
// ---------------------------------------------------------------------------

describe('segment evaluation', () => {
  it('hits line endpoints exactly', () => {
    const line = new LineSegment({ x: 0.1, y: 0.7 }, { x: 0.3, y: 0.9 });
    expect(line.pointAt(0)).toEqual({ x: 0.1, y: 0.7 });
    expect(line.pointAt(1)).toEqual({ x: 0.3, y: 0.9 });
    expect(line.length()).toBeCloseTo(Math.SQRT2 * 0.2, 12);
  });

  it('evaluates a cubic at its midpoint', () => {
    const cubic = new CubicSegment({ x: 0, y: 0 }, { x: 0, y: 10 }, { x: 10, y: 10 }, { x: 10, y: 0 });
    expect(cubic.pointAt(0.5)).toEqual({ x: 5, y: 7.5 });
  });

  it('traces a semicircular arc', () => {
    const [arc] = parsePathSegments('M 0 0 A 5 5 0 0 1 10 0');
    expect(arc).toBeInstanceOf(ArcSegment);
    const mid = arc.pointAt(0.5);
    expect(mid.x).toBeCloseTo(5, 9);
    expect(mid.y).toBeCloseTo(-5, 9);
    expect(arc.pointAt(1)).toEqual({ x: 10, y: 0 });
    expect(arc.length()).toBeCloseTo(5 * Math.PI, 2);
  });

  it('turns an arc with a zero radius into a line', () => {
    const [segment] = parsePathSegments('M 0 0 A 0 5 0 0 1 10 0');
    expect(segment).toBeInstanceOf(LineSegment);
  });

  it('drops an arc that ends where it starts', () => {
    expect(parsePathSegments('M 0 0 A 5 5 0 0 1 0 0')).toEqual([]);
  });
});
