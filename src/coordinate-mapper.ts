/**
 * Viewport-to-world mapping.
 *
 * Given the document extent and the drawing surface's current size, picks
 * a window size with the extent's aspect ratio and a world rectangle that
 * frames the extent plus a margin. The surface's vertical axis points up,
 * so the world rectangle is the extent flipped about y = 0: drawing code
 * negates every y before moving the pen.
 */

import { ARTWORK_CONFIG } from './config';
import type { Extent, Size } from './types';

/** World coordinates of the window's lower-left and upper-right corners. */
export interface WorldRect {
  readonly llx: number;
  readonly lly: number;
  readonly urx: number;
  readonly ury: number;
}

export interface CoordinateMapping {
  readonly window: Size;
  readonly world: WorldRect;
  /** Width / height of the epsilon-guarded extent. */
  readonly aspect: number;
}

export interface MappingOptions {
  /** Fraction of the extent added on each side. */
  margin?: number;
  /** Floor for extent width and height. */
  epsilon?: number;
}

/**
 * Window size for an aspect ratio: the smaller surface side is kept and
 * the other side follows the ratio.
 */
export function fitWindow(aspect: number, surface: Size): Size {
  const side = Math.min(surface.width, surface.height);
  return aspect > 1
    ? { width: side * aspect, height: side }
    : { width: side, height: side / aspect };
}

export function mapCoordinates(
  extent: Extent,
  surface: Size,
  options: MappingOptions = {}
): CoordinateMapping {
  const margin = options.margin ?? ARTWORK_CONFIG.margin;
  const epsilon = options.epsilon ?? ARTWORK_CONFIG.extentEpsilon;

  const width = Math.max(extent.maxX - extent.minX, epsilon);
  const height = Math.max(extent.maxY - extent.minY, epsilon);
  const aspect = width / height;

  const dx = width * margin;
  const dy = height * margin;

  return {
    window: fitWindow(aspect, surface),
    world: {
      llx: extent.minX - dx,
      lly: -(extent.maxY + dy),
      urx: extent.maxX + dx,
      ury: -(extent.minY - dy),
    },
    aspect,
  };
}
