/**
 * Replays a flattened artwork document on a pen renderer.
 *
 * Sets up the window and world rectangle once, traces every element ring by
 * ring (filling between `beginFill` / `endFill` unless the fill is `none`),
 * then drops the batch size to 1, clears markers, lifts the pen and flushes.
 * Document y grows downwards and the surface's grows upwards, so every y is
 * negated on the way out.
 */

import { ARTWORK_CONFIG } from './config';
import { mapCoordinates, type CoordinateMapping } from './coordinate-mapper';
import type { Renderer } from './pen-renderer';
import type { ArtworkDocument, DocumentElement, Point2, Size } from './types';

export interface DrawOptions {
  /** Current surface size; the window is fitted inside it. */
  surface?: Size;
  batchSize?: number;
  /** Stamp a marker at the pen after every move. */
  showMarkers?: boolean;
  margin?: number;
  /** Pen size for elements without a usable `stroke-width`. */
  defaultPenSize?: number;
}

/** `stroke-width` → pen size; missing, malformed or negative → fallback. */
export function resolvePenSize(strokeWidth: string | undefined, fallback: number): number {
  if (strokeWidth === undefined) return fallback;
  const parsed = Number.parseFloat(strokeWidth);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Move the pen to `point` (document coordinates) with the pen down or up as
 * asked, then restore the pen state it had before.
 */
function headTo(renderer: Renderer, point: Point2, draw: boolean, showMarkers: boolean): void {
  const wasDown = renderer.isDown();
  if (draw) renderer.penDown();
  else renderer.penUp();

  if (showMarkers) renderer.clearStamps();
  renderer.moveTo(point.x, -point.y);
  if (showMarkers) renderer.stamp();

  if (wasDown) renderer.penDown();
  else renderer.penUp();
}

export function drawElement(
  renderer: Renderer,
  element: DocumentElement,
  showMarkers: boolean,
  defaultPenSize: number
): void {
  const first = element.polygon[0]?.[0];
  if (!first) return;

  const fill = element.style.fill ?? 'none';
  const filled = fill !== 'none';

  renderer.setPenSize(resolvePenSize(element.style.strokeWidth, defaultPenSize));
  renderer.setColor(element.style.stroke ?? 'black', filled ? fill : 'black');

  headTo(renderer, first, false, showMarkers);
  if (filled) renderer.beginFill();

  element.polygon.forEach((ring, index) => {
    if (ring.length === 0) return;
    headTo(renderer, ring[0], false, showMarkers);
    for (const point of ring.slice(1)) {
      headTo(renderer, point, true, showMarkers);
    }
    renderer.penUp();
    if (index !== 0) headTo(renderer, first, false, showMarkers);
  });

  if (filled) renderer.endFill();
}

export function drawArtwork(
  renderer: Renderer,
  artwork: ArtworkDocument,
  options: DrawOptions = {}
): CoordinateMapping {
  const showMarkers = options.showMarkers ?? ARTWORK_CONFIG.showMarkers;
  const defaultPenSize = options.defaultPenSize ?? ARTWORK_CONFIG.defaultPenSize;

  const mapping = mapCoordinates(artwork.extent, options.surface ?? ARTWORK_CONFIG.surface, {
    margin: options.margin,
  });

  renderer.setWindowSize(mapping.window);
  renderer.setWorldCoordinates(mapping.world);
  renderer.setBatchSize(options.batchSize ?? ARTWORK_CONFIG.batchSize);

  for (const element of artwork.elements) {
    drawElement(renderer, element, showMarkers, defaultPenSize);
  }

  renderer.setBatchSize(1);
  renderer.clearStamps();
  renderer.penUp();
  renderer.flush();

  return mapping;
}
