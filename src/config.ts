/**
 * Defaults for the artwork flattening pipeline.
 *
 * Every value here can be overridden per call through the options objects
 * accepted by `loadArtwork()`, `mapCoordinates()` and `drawArtwork()`. The
 * CLI in `scripts/render-artwork.ts` exposes the ones a user is likely to
 * tune (chord length, batch size, window size, markers).
 */
export const ARTWORK_CONFIG = {
  /** Source file read by the CLI when no path is given. */
  defaultInput: 'artwork.svg',

  /**
   * Target chord length (`seg_unit`) in document units.
   *
   * A curve segment of length L is sampled at max(2, ceil(L / segUnit))
   * evenly spaced parameter values. Smaller values trace curves more
   * closely and emit proportionally more pen moves.
   */
  segUnit: 8,

  /**
   * Margin added on every side of the extent, as a fraction of the
   * extent's width (left/right) and height (top/bottom).
   */
  margin: 0.02,

  /**
   * Floor applied to extent width and height before the aspect ratio is
   * taken, so a zero-area document still maps to finite world bounds.
   */
  extentEpsilon: 1e-6,

  /** Extent used when neither a declared size nor any geometry is available. */
  defaultExtent: { minX: 0, minY: 0, maxX: 1000, maxY: 1000 },

  /**
   * Number of pen operations the renderer buffers before committing a
   * frame. 1 commits after every operation.
   */
  batchSize: 10,

  /** Pen width used when an element has no usable `stroke-width`. */
  defaultPenSize: 0.5,

  /** Drawing-surface size the window is fitted against. */
  surface: { width: 800, height: 600 },

  /** Stamp a marker at the pen position after every move. */
  showMarkers: true,
} as const;
