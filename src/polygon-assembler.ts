/**
 * Turns one source path into a `DocumentElement`: every continuous subpath
 * becomes one closed ring, sampled by the flattener and mapped through the
 * path's composed transform. Subpath order is kept; rings are never merged.
 */

import { applyToPoint, isIdentity } from './matrix';
import { flattenSubpath } from './path-flattener';
import type { Subpath } from './path-segments';
import type { DocumentElement, Matrix3, Ring, StyleAttrs } from './types';

export interface SourcePath {
  readonly id: string;
  readonly subpaths: readonly Subpath[];
  readonly style: StyleAttrs;
  /** Composed transform of the element (`parseTransform()` output). */
  readonly transform: Matrix3;
}

function transformRing(ring: Ring, m: Matrix3): Ring {
  if (isIdentity(m)) return ring;
  return ring.map((p) => applyToPoint(m, p));
}

export function assemblePolygon(source: SourcePath, segUnit: number): DocumentElement {
  const polygon = source.subpaths
    .map((subpath) => flattenSubpath(subpath, segUnit))
    .filter((ring) => ring.length > 0)
    .map((ring) => transformRing(ring, source.transform));

  return { id: source.id, polygon, style: source.style };
}
