/**
 * Curve evaluation for SVG path data.
 *
 * `parsePathData()` reads a path `d` attribute into continuous subpaths of
 * `CurveSegment`s (line, quadratic, cubic, elliptical arc). Each segment
 * answers the two questions the flattener asks: how long it is and where
 * it is at parameter t ∈ [0, 1]. Segments are evaluated in untransformed
 * document coordinates.
 *
 * Supports M, L, H, V, C, S, Q, T, A, Z, absolute and relative, with
 * implicit command repetition. Parsing stops at the first command whose
 * arguments cannot be read; segments read before it are kept.
 */

import type { Point2 } from './types';

// ---------------------------------------------------------------------------
// Segment capability
// ---------------------------------------------------------------------------

export interface CurveSegment {
  readonly start: Point2;
  readonly end: Point2;
  /** Arc length in document units. */
  length(): number;
  /** Point at parameter t; t = 0 is `start` and t = 1 is `end`, exactly. */
  pointAt(t: number): Point2;
}

/** A run of segments where each one starts where the previous one ends. */
export type Subpath = readonly CurveSegment[];

/** Chords used to estimate the length of curved segments. */
const LENGTH_CHORDS = 64;

function lerp(a: number, b: number, t: number): number {
  // (1 - t)·a + t·b hits both endpoints exactly.
  return (1 - t) * a + t * b;
}

export function samePoint(a: Point2, b: Point2): boolean {
  return a.x === b.x && a.y === b.y;
}

function chordLength(segment: CurveSegment, chords = LENGTH_CHORDS): number {
  let total = 0;
  let prev = segment.pointAt(0);
  for (let i = 1; i <= chords; i++) {
    const next = segment.pointAt(i / chords);
    total += Math.hypot(next.x - prev.x, next.y - prev.y);
    prev = next;
  }
  return total;
}

export class LineSegment implements CurveSegment {
  constructor(
    readonly start: Point2,
    readonly end: Point2
  ) {}

  length(): number {
    return Math.hypot(this.end.x - this.start.x, this.end.y - this.start.y);
  }

  pointAt(t: number): Point2 {
    return { x: lerp(this.start.x, this.end.x, t), y: lerp(this.start.y, this.end.y, t) };
  }
}

export class QuadraticSegment implements CurveSegment {
  private cachedLength: number | null = null;

  constructor(
    readonly start: Point2,
    readonly control: Point2,
    readonly end: Point2
  ) {}

  length(): number {
    this.cachedLength ??= chordLength(this);
    return this.cachedLength;
  }

  pointAt(t: number): Point2 {
    const invT = 1 - t;
    const a = invT * invT;
    const b = 2 * invT * t;
    const c = t * t;
    return {
      x: a * this.start.x + b * this.control.x + c * this.end.x,
      y: a * this.start.y + b * this.control.y + c * this.end.y,
    };
  }
}

export class CubicSegment implements CurveSegment {
  private cachedLength: number | null = null;

  constructor(
    readonly start: Point2,
    readonly control1: Point2,
    readonly control2: Point2,
    readonly end: Point2
  ) {}

  length(): number {
    this.cachedLength ??= chordLength(this);
    return this.cachedLength;
  }

  pointAt(t: number): Point2 {
    const invT = 1 - t;
    const invT2 = invT * invT;
    const t2 = t * t;
    const a = invT2 * invT;
    const b = 3 * invT2 * t;
    const c = 3 * invT * t2;
    const d = t2 * t;
    return {
      x: a * this.start.x + b * this.control1.x + c * this.control2.x + d * this.end.x,
      y: a * this.start.y + b * this.control1.y + c * this.control2.y + d * this.end.y,
    };
  }
}

/**
 * Elliptical arc in center parameterisation, converted from the SVG
 * endpoint form (SVG 1.1 implementation notes, F.6.5).
 */
export class ArcSegment implements CurveSegment {
  private readonly cx: number;
  private readonly cy: number;
  private readonly rx: number;
  private readonly ry: number;
  private readonly cosPhi: number;
  private readonly sinPhi: number;
  private readonly theta1: number;
  private readonly dtheta: number;
  private cachedLength: number | null = null;

  constructor(
    readonly start: Point2,
    radiusX: number,
    radiusY: number,
    xRotationDeg: number,
    largeArc: boolean,
    sweep: boolean,
    readonly end: Point2
  ) {
    let rx = Math.abs(radiusX);
    let ry = Math.abs(radiusY);
    const phi = (xRotationDeg * Math.PI) / 180;
    this.cosPhi = Math.cos(phi);
    this.sinPhi = Math.sin(phi);

    const dx2 = (start.x - end.x) / 2;
    const dy2 = (start.y - end.y) / 2;
    const x1p = this.cosPhi * dx2 + this.sinPhi * dy2;
    const y1p = -this.sinPhi * dx2 + this.cosPhi * dy2;

    // Scale radii up when the endpoints cannot be joined otherwise.
    const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry);
    if (lambda > 1) {
      const sqrtLambda = Math.sqrt(lambda);
      rx *= sqrtLambda;
      ry *= sqrtLambda;
    }

    const rxSq = rx * rx;
    const rySq = ry * ry;
    const x1pSq = x1p * x1p;
    const y1pSq = y1p * y1p;
    const denom = rxSq * y1pSq + rySq * x1pSq;
    let sq = denom === 0 ? 0 : Math.sqrt(Math.max(0, (rxSq * rySq - rxSq * y1pSq - rySq * x1pSq) / denom));
    if (largeArc === sweep) sq = -sq;

    const cxp = (sq * (rx * y1p)) / ry;
    const cyp = (sq * -(ry * x1p)) / rx;

    this.cx = this.cosPhi * cxp - this.sinPhi * cyp + (start.x + end.x) / 2;
    this.cy = this.sinPhi * cxp + this.cosPhi * cyp + (start.y + end.y) / 2;
    this.rx = rx;
    this.ry = ry;

    this.theta1 = vectorAngle(1, 0, (x1p - cxp) / rx, (y1p - cyp) / ry);
    let dtheta = vectorAngle((x1p - cxp) / rx, (y1p - cyp) / ry, (-x1p - cxp) / rx, (-y1p - cyp) / ry);
    if (!sweep && dtheta > 0) dtheta -= 2 * Math.PI;
    if (sweep && dtheta < 0) dtheta += 2 * Math.PI;
    this.dtheta = dtheta;
  }

  length(): number {
    this.cachedLength ??= chordLength(this);
    return this.cachedLength;
  }

  pointAt(t: number): Point2 {
    if (t <= 0) return this.start;
    if (t >= 1) return this.end;
    const angle = this.theta1 + t * this.dtheta;
    const cosT = Math.cos(angle);
    const sinT = Math.sin(angle);
    return {
      x: this.cosPhi * this.rx * cosT - this.sinPhi * this.ry * sinT + this.cx,
      y: this.sinPhi * this.rx * cosT + this.cosPhi * this.ry * sinT + this.cy,
    };
  }
}

/** Signed angle from u to v. */
function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
  const sign = ux * vy - uy * vx < 0 ? -1 : 1;
  const dot = ux * vx + uy * vy;
  const len = Math.hypot(ux, uy) * Math.hypot(vx, vy);
  return sign * Math.acos(Math.max(-1, Math.min(1, dot / len)));
}

// ---------------------------------------------------------------------------
// Path data parser
// ---------------------------------------------------------------------------

/** Number of arguments each command consumes per repetition. */
const ARG_COUNTS: Readonly<Partial<Record<string, number>>> = {
  M: 2, L: 2, H: 1, V: 1, C: 6, S: 4, Q: 4, T: 2, A: 7, Z: 0,
};

/**
 * Split path data into command letters and numbers.
 * Handles signs, decimals, exponents and packed forms like `1.5.5` or `10-4`.
 */
export function tokenizePath(d: string): string[] {
  const tokens: string[] = [];
  const regex = /([a-zA-Z])|([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/g;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(d)) !== null) {
    tokens.push(match[0]);
  }
  return tokens;
}

const isCommand = (token: string) => /^[a-zA-Z]$/.test(token);

/** Every segment of the path, in drawing order. */
export function parsePathSegments(d: string): CurveSegment[] {
  const segments: CurveSegment[] = [];
  const tokens = tokenizePath(d);
  let i = 0;
  let x = 0, y = 0;
  let startX = 0, startY = 0;
  // Last control point, for the S/T reflections.
  let lastCpX = 0, lastCpY = 0;
  let lastCmd = '';

  /** Read `count` numbers, or `null` when the data runs out early. */
  const readArgs = (count: number): number[] | null => {
    const args: number[] = [];
    while (args.length < count) {
      if (i >= tokens.length || isCommand(tokens[i])) return null;
      args.push(Number.parseFloat(tokens[i]));
      i++;
    }
    return args;
  };

  while (i < tokens.length) {
    const token = tokens[i];
    let cmd: string;

    if (isCommand(token)) {
      cmd = token;
      i++;
    } else {
      // Implicit repeat; after M/m the repeats are L/l.
      cmd = lastCmd === 'M' ? 'L' : lastCmd === 'm' ? 'l' : lastCmd;
      if (cmd === '' || cmd === 'Z' || cmd === 'z') break;
    }

    const CMD = cmd.toUpperCase();
    const argCount = ARG_COUNTS[CMD];
    if (argCount === undefined) break;
    const args = readArgs(argCount);
    if (!args) break;

    const rel = cmd !== CMD;
    const ox = rel ? x : 0;
    const oy = rel ? y : 0;
    const from: Point2 = { x, y };
    const prevCmd = lastCmd.toUpperCase();

    switch (CMD) {
      case 'M':
        x = args[0] + ox;
        y = args[1] + oy;
        startX = x;
        startY = y;
        lastCpX = x; lastCpY = y;
        break;

      case 'L':
        x = args[0] + ox;
        y = args[1] + oy;
        segments.push(new LineSegment(from, { x, y }));
        lastCpX = x; lastCpY = y;
        break;

      case 'H':
        x = args[0] + ox;
        segments.push(new LineSegment(from, { x, y }));
        lastCpX = x; lastCpY = y;
        break;

      case 'V':
        y = args[0] + oy;
        segments.push(new LineSegment(from, { x, y }));
        lastCpX = x; lastCpY = y;
        break;

      case 'C':
      case 'S': {
        const cp1: Point2 = CMD === 'C'
          ? { x: args[0] + ox, y: args[1] + oy }
          : prevCmd === 'C' || prevCmd === 'S' ? { x: 2 * x - lastCpX, y: 2 * y - lastCpY } : from;
        const rest = CMD === 'C' ? args.slice(2) : args;
        const cp2: Point2 = { x: rest[0] + ox, y: rest[1] + oy };
        x = rest[2] + ox;
        y = rest[3] + oy;
        segments.push(new CubicSegment(from, cp1, cp2, { x, y }));
        lastCpX = cp2.x; lastCpY = cp2.y;
        break;
      }

      case 'Q':
      case 'T': {
        const cp: Point2 = CMD === 'Q'
          ? { x: args[0] + ox, y: args[1] + oy }
          : prevCmd === 'Q' || prevCmd === 'T' ? { x: 2 * x - lastCpX, y: 2 * y - lastCpY } : from;
        const rest = CMD === 'Q' ? args.slice(2) : args;
        x = rest[0] + ox;
        y = rest[1] + oy;
        segments.push(new QuadraticSegment(from, cp, { x, y }));
        lastCpX = cp.x; lastCpY = cp.y;
        break;
      }

      case 'A': {
        const [rx, ry, rotationDeg, largeArc, sweep] = args;
        x = args[5] + ox;
        y = args[6] + oy;
        const to: Point2 = { x, y };
        if (!samePoint(from, to)) {
          segments.push(
            rx === 0 || ry === 0
              ? new LineSegment(from, to)
              : new ArcSegment(from, rx, ry, rotationDeg, largeArc !== 0, sweep !== 0, to)
          );
        }
        lastCpX = x; lastCpY = y;
        break;
      }

      case 'Z':
        if (x !== startX || y !== startY) {
          segments.push(new LineSegment(from, { x: startX, y: startY }));
        }
        x = startX;
        y = startY;
        lastCpX = x; lastCpY = y;
        break;
    }

    lastCmd = cmd;
  }

  return segments;
}

/**
 * Group segments into continuous subpaths: a new subpath starts wherever a
 * segment does not begin exactly at the previous segment's end.
 */
export function splitContinuous(segments: readonly CurveSegment[]): Subpath[] {
  const subpaths: CurveSegment[][] = [];
  let current: CurveSegment[] = [];
  for (const segment of segments) {
    const prev = current[current.length - 1];
    if (prev && !samePoint(prev.end, segment.start)) {
      subpaths.push(current);
      current = [];
    }
    current.push(segment);
  }
  if (current.length > 0) subpaths.push(current);
  return subpaths;
}

export function parsePathData(d: string): Subpath[] {
  return splitContinuous(parsePathSegments(d));
}
