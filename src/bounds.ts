/**
 * Axis-aligned bounds over assembled geometry.
 */

import { ARTWORK_CONFIG } from './config';
import type { Extent, Polygon } from './types';

/** Extent used when there is no geometry to measure. */
export const DEFAULT_EXTENT: Extent = { ...ARTWORK_CONFIG.defaultExtent };

/** Bounds of every point of every ring, or `null` when there are no points. */
export function polygonBounds(polygons: readonly Polygon[]): Extent | null {
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const polygon of polygons) {
    for (const ring of polygon) {
      for (const { x, y } of ring) {
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
      }
    }
  }
  if (minX === Infinity || minY === Infinity) return null;
  return { minX, minY, maxX, maxY };
}

export function computeBounds(polygons: readonly Polygon[]): Extent {
  return polygonBounds(polygons) ?? DEFAULT_EXTENT;
}

/** Smallest extent covering every non-null entry, or `null` if there is none. */
export function unionExtents(extents: readonly (Extent | null)[]): Extent | null {
  let union: Extent | null = null;
  for (const extent of extents) {
    if (!extent) continue;
    union = union
      ? {
          minX: Math.min(union.minX, extent.minX),
          minY: Math.min(union.minY, extent.minY),
          maxX: Math.max(union.maxX, extent.maxX),
          maxY: Math.max(union.maxY, extent.maxY),
        }
      : extent;
  }
  return union;
}
