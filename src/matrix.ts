/**
 * 3×3 affine matrix helpers. Matrices are plain frozen tuples; every
 * function returns a new value.
 */

import type { Matrix3, Point2 } from './types';

export const IDENTITY: Matrix3 = [
  [1, 0, 0],
  [0, 1, 0],
  [0, 0, 1],
];

/** Build from SVG `matrix(a, b, c, d, e, f)` values. */
export function fromValues(a: number, b: number, c: number, d: number, e: number, f: number): Matrix3 {
  return [
    [a, c, e],
    [b, d, f],
    [0, 0, 1],
  ];
}

export function translation(tx: number, ty: number): Matrix3 {
  return fromValues(1, 0, 0, 1, tx, ty);
}

export function scaling(sx: number, sy: number): Matrix3 {
  return fromValues(sx, 0, 0, sy, 0, 0);
}

/** Rotation about the origin; `degrees` is positive from +x towards +y. */
export function rotation(degrees: number): Matrix3 {
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return fromValues(cos, sin, -sin, cos, 0, 0);
}

/** Row-by-column product `a × b` (b is applied first). */
export function multiply(a: Matrix3, b: Matrix3): Matrix3 {
  const row = (i: number) =>
    [
      a[i][0] * b[0][0] + a[i][1] * b[1][0] + a[i][2] * b[2][0],
      a[i][0] * b[0][1] + a[i][1] * b[1][1] + a[i][2] * b[2][1],
      a[i][0] * b[0][2] + a[i][1] * b[1][2] + a[i][2] * b[2][2],
    ] as const;
  return [row(0), row(1), row(2)];
}

export function applyToPoint(m: Matrix3, p: Point2): Point2 {
  return {
    x: m[0][0] * p.x + m[0][1] * p.y + m[0][2],
    y: m[1][0] * p.x + m[1][1] * p.y + m[1][2],
  };
}

export function isIdentity(m: Matrix3): boolean {
  for (let i = 0; i < 3; i++) {
    for (let j = 0; j < 3; j++) {
      if (m[i][j] !== IDENTITY[i][j]) return false;
    }
  }
  return true;
}
