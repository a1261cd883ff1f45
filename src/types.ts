/**
 * Shared value types for the artwork pipeline.
 *
 * Everything here is immutable once built: a document is parsed, flattened
 * and assembled in one pass and then only read.
 */

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

export interface Point2 {
  readonly x: number;
  readonly y: number;
}

/** One row of an affine matrix. */
export type MatrixRow = readonly [number, number, number];

/**
 * 3×3 affine transform, rows `[[a, c, e], [b, d, f], [0, 0, 1]]` using the
 * SVG `matrix(a, b, c, d, e, f)` naming.
 */
export type Matrix3 = readonly [MatrixRow, MatrixRow, MatrixRow];

/** A single parsed transform-list function. */
export type TransformOp =
  | { readonly kind: 'translate'; readonly tx: number; readonly ty: number }
  | { readonly kind: 'scale'; readonly sx: number; readonly sy: number }
  | { readonly kind: 'rotate'; readonly angle: number; readonly center?: Point2 }
  | {
      readonly kind: 'matrix';
      readonly a: number;
      readonly b: number;
      readonly c: number;
      readonly d: number;
      readonly e: number;
      readonly f: number;
    };

/** Closed polyline: the last point equals the first. */
export type Ring = readonly Point2[];

/** Every ring produced from one source path, in subpath order. */
export type Polygon = readonly Ring[];

/** Axis-aligned logical rectangle. `maxX >= minX`, `maxY >= minY`. */
export interface Extent {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

// ---------------------------------------------------------------------------
// Styling & document
// ---------------------------------------------------------------------------

/**
 * Resolved presentation attributes of one element.
 * Values are kept as the document wrote them (colour names, hex, numbers).
 */
export interface StyleAttrs {
  readonly fill?: string;
  readonly stroke?: string;
  readonly strokeWidth?: string;
  /** Every other property, keyed by its attribute / CSS name. */
  readonly extra: Readonly<Record<string, string>>;
}

export interface DocumentElement {
  /** Source `id` attribute, or `path-<index>` in document order. */
  readonly id: string;
  readonly polygon: Polygon;
  readonly style: StyleAttrs;
}

/** Flattened document, ready to hand to `drawArtwork()`. */
export interface ArtworkDocument {
  /** Elements in document order; later elements paint over earlier ones. */
  readonly elements: readonly DocumentElement[];
  readonly extent: Extent;
  /** Parsed `width`/`height` attributes (0 where absent or malformed). */
  readonly declaredSize: Size;
}
