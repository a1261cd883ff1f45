/**
 * Transform-list parsing: `"translate(10) rotate(45, 5, 5) scale(2)"` →
 * one composed `Matrix3`.
 *
 * Parsing is two steps. `tokenizeTransform()` turns the text into a typed
 * `TransformOp[]`, dropping functions it does not support (skewX, skewY,
 * misspellings) and anything between calls it cannot read. `composeTransform()`
 * then folds the ops into a single matrix.
 *
 * ## Fold direction
 *
 * Ops are folded in textual order with the op matrix on the LEFT:
 *
 *   running = op_n × (… × (op_2 × op_1))
 *
 * so the last-listed function is applied to the point last (outermost).
 * SVG renderers apply the leftmost function outermost instead. For a single
 * function both readings agree.
 */

import { IDENTITY, fromValues, multiply, rotation, scaling, translation } from './matrix';
import type { Matrix3, TransformOp } from './types';

/** `name(args)`; args may not contain a closing parenthesis. */
const CALL_PATTERN = /(\w+)\s*\(([^)]*)\)/g;

/** Optional sign, optional fraction, optional exponent. */
const NUMBER_PATTERN = /[-+]?\d*\.?\d+(?:[eE][-+]?\d+)?/g;

/** Every number in `text`, in order. Unreadable characters are skipped. */
export function parseNumberList(text: string): number[] {
  const values: number[] = [];
  for (const match of text.matchAll(NUMBER_PATTERN)) {
    const value = Number.parseFloat(match[0]);
    if (Number.isFinite(value)) values.push(value);
  }
  return values;
}

/** Map one function call onto an op, or `null` for unsupported calls. */
function toOp(name: string, values: number[]): TransformOp | null {
  switch (name.toLowerCase()) {
    case 'translate':
      return { kind: 'translate', tx: values[0] ?? 0, ty: values[1] ?? 0 };

    case 'scale': {
      const sx = values[0] ?? 1;
      return { kind: 'scale', sx, sy: values[1] ?? sx };
    }

    case 'rotate': {
      const angle = values[0] ?? 0;
      // A center needs both coordinates; a lone second value is ignored.
      if (values.length > 2) {
        return { kind: 'rotate', angle, center: { x: values[1], y: values[2] } };
      }
      return { kind: 'rotate', angle };
    }

    case 'matrix': {
      if (values.length < 6) return null;
      const [a, b, c, d, e, f] = values;
      return { kind: 'matrix', a, b, c, d, e, f };
    }

    default:
      return null;
  }
}

/** Read a transform list into ops, in textual order. */
export function tokenizeTransform(source?: string | null): TransformOp[] {
  if (!source) return [];
  const ops: TransformOp[] = [];
  for (const match of source.matchAll(CALL_PATTERN)) {
    const op = toOp(match[1], parseNumberList(match[2]));
    if (op) ops.push(op);
  }
  return ops;
}

export function opToMatrix(op: TransformOp): Matrix3 {
  switch (op.kind) {
    case 'translate':
      return translation(op.tx, op.ty);
    case 'scale':
      return scaling(op.sx, op.sy);
    case 'rotate': {
      if (!op.center) return rotation(op.angle);
      const { x, y } = op.center;
      return multiply(multiply(translation(x, y), rotation(op.angle)), translation(-x, -y));
    }
    case 'matrix':
      return fromValues(op.a, op.b, op.c, op.d, op.e, op.f);
  }
}

/** Fold ops left-to-right, each op multiplied onto the left of the result. */
export function composeTransform(ops: readonly TransformOp[]): Matrix3 {
  return ops.reduce<Matrix3>((running, op) => multiply(opToMatrix(op), running), IDENTITY);
}

export function parseTransform(source?: string | null): Matrix3 {
  return composeTransform(tokenizeTransform(source));
}
