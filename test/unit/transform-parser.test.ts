/**
 * Unit tests for transform-list parsing and composition.
 *
 * Covers each supported function, argument defaults, unsupported and
 * malformed functions, and the fold direction for multi-function lists.
 */

import { describe, it, expect } from 'vitest';
import { IDENTITY, applyToPoint } from '../../src/matrix';
import {
  composeTransform,
  parseNumberList,
  parseTransform,
  tokenizeTransform,
} from '../../src/transform-parser';
import type { Point2 } from '../../src/types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function map(transform: string, point: Point2): Point2 {
  return applyToPoint(parseTransform(transform), point);
}

function expectPointClose(actual: Point2, expected: Point2): void {
  expect(actual.x).toBeCloseTo(expected.x, 9);
  expect(actual.y).toBeCloseTo(expected.y, 9);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('parseNumberList', () => {
  it('reads comma and whitespace separated numbers', () => {
    expect(parseNumberList('1,2 -3.5e1  .5')).toEqual([1, 2, -35, 0.5]);
  });

  it('returns an empty list for text without numbers', () => {
    expect(parseNumberList(' , ')).toEqual([]);
  });
});

describe('parseTransform', () => {
  it('returns the identity for empty or missing input', () => {
    expect(parseTransform('')).toEqual(IDENTITY);
    expect(parseTransform(null)).toEqual(IDENTITY);
    expect(parseTransform(undefined)).toEqual(IDENTITY);
  });

  it('translates by both offsets', () => {
    expect(map('translate(5,10)', { x: 0, y: 0 })).toEqual({ x: 5, y: 10 });
  });

  it('defaults the translate y offset to 0', () => {
    expect(map('translate(5)', { x: 0, y: 0 })).toEqual({ x: 5, y: 0 });
  });

  it('scales uniformly with one argument', () => {
    expect(map('scale(2)', { x: 1, y: 1 })).toEqual({ x: 2, y: 2 });
  });

  it('scales per axis with two arguments', () => {
    expect(map('scale(2,3)', { x: 1, y: 1 })).toEqual({ x: 2, y: 3 });
  });

  it('rotates about the origin', () => {
    expectPointClose(map('rotate(90)', { x: 1, y: 0 }), { x: 0, y: 1 });
  });

  it('keeps the rotation center fixed', () => {
    expectPointClose(map('rotate(90,1,1)', { x: 1, y: 1 }), { x: 1, y: 1 });
  });

  it('rotates around an explicit center', () => {
    expectPointClose(map('rotate(90, 10, 10)', { x: 20, y: 10 }), { x: 10, y: 20 });
  });

  it('ignores a lone center coordinate', () => {
    expect(tokenizeTransform('rotate(45, 5)')).toEqual([{ kind: 'rotate', angle: 45 }]);
  });

  it('treats matrix(1,0,0,1,5,5) like translate(5,5)', () => {
    expect(parseTransform('matrix(1,0,0,1,5,5)')).toEqual(parseTransform('translate(5,5)'));
  });

  it('accepts exponents and leading-dot fractions', () => {
    expect(map('translate(1e1, .5)', { x: 0, y: 0 })).toEqual({ x: 10, y: 0.5 });
  });
});

describe('unsupported and malformed functions', () => {
  it('skips skewX and skewY', () => {
    expect(tokenizeTransform('skewX(30) translate(1,2) skewY(10)')).toEqual([
      { kind: 'translate', tx: 1, ty: 2 },
    ]);
  });

  it('skips a matrix with fewer than six values', () => {
    expect(parseTransform('matrix(1,2,3)')).toEqual(IDENTITY);
  });

  it('ignores text that is not a function call', () => {
    expect(parseTransform('garbage')).toEqual(IDENTITY);
  });

  it('is case-insensitive on function names', () => {
    expect(tokenizeTransform('TRANSLATE(3)')).toEqual([{ kind: 'translate', tx: 3, ty: 0 }]);
  });
});

describe('fold direction', () => {
  it('keeps functions in textual order', () => {
    expect(tokenizeTransform('translate(10,0) scale(2)')).toEqual([
      { kind: 'translate', tx: 10, ty: 0 },
      { kind: 'scale', sx: 2, sy: 2 },
    ]);
  });

  it('applies the last-listed function outermost', () => {
    // translate first: (1,0) -> (11,0), then scale: -> (22,0)
    expect(map('translate(10,0) scale(2)', { x: 1, y: 0 })).toEqual({ x: 22, y: 0 });
    // scale first: (1,0) -> (2,0), then translate: -> (12,0)
    expect(map('scale(2) translate(10,0)', { x: 1, y: 0 })).toEqual({ x: 12, y: 0 });
  });

  it('composes an empty op list to the identity', () => {
    expect(composeTransform([])).toEqual(IDENTITY);
  });
});
