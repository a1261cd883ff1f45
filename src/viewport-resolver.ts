/**
 * Logical extent of a document.
 *
 * Resolution order, first usable source wins:
 *
 * 1. `viewBox` with exactly four numbers → that rectangle.
 * 2. `width` and `height` both > 0 → `(0, 0, width, height)`.
 * 3. Union of the per-path bounds; `DEFAULT_EXTENT` when there are none.
 *
 * Malformed numbers never throw: a bad dimension reads as 0 and a bad
 * viewBox as absent, which moves resolution on to the next source.
 */

import { DEFAULT_EXTENT, unionExtents } from './bounds';
import type { Extent } from './types';

/** Root-element attributes that bear on the extent. */
export interface DeclaredViewport {
  readonly width?: string | null;
  readonly height?: string | null;
  readonly viewBox?: string | null;
}

const UNIT_SUFFIX = /(px|pt|pc|mm|cm|in|em|ex|%)$/i;

/** `"100px"` → 100. Absent, empty or malformed → 0. */
export function parseDimension(value?: string | null): number {
  if (!value) return 0;
  const numeric = value.trim().replace(UNIT_SUFFIX, '').trim();
  if (!numeric) return 0;
  const parsed = Number(numeric);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * `"minX minY width height"` (comma and/or whitespace separated) → extent.
 * Anything other than exactly four numbers, or a negative size, → `null`.
 */
export function parseViewBox(value?: string | null): Extent | null {
  if (!value) return null;
  const parts = value.replace(/,/g, ' ').trim().split(/\s+/);
  if (parts.length !== 4) return null;

  const numbers = parts.map(Number);
  if (!numbers.every(Number.isFinite)) return null;
  const [minX, minY, width, height] = numbers;
  if (width < 0 || height < 0) return null;

  return { minX, minY, maxX: minX + width, maxY: minY + height };
}

export function resolveExtent(
  declared: DeclaredViewport,
  pathBounds: readonly (Extent | null)[]
): Extent {
  const fromViewBox = parseViewBox(declared.viewBox);
  if (fromViewBox) return fromViewBox;

  const width = parseDimension(declared.width);
  const height = parseDimension(declared.height);
  if (width > 0 && height > 0) {
    return { minX: 0, minY: 0, maxX: width, maxY: height };
  }

  return unionExtents(pathBounds) ?? DEFAULT_EXTENT;
}
