/**
 * Public API.
 */

export { ARTWORK_CONFIG } from './config';
export type {
  ArtworkDocument,
  DocumentElement,
  Extent,
  Matrix3,
  Point2,
  Polygon,
  Ring,
  Size,
  StyleAttrs,
  TransformOp,
} from './types';

export { IDENTITY, applyToPoint, multiply } from './matrix';
export { composeTransform, parseTransform, tokenizeTransform } from './transform-parser';
export { parsePathData, type CurveSegment, type Subpath } from './path-segments';
export { flattenSegment, flattenSubpath, sampleCount } from './path-flattener';
export { mergeStyle, parseInlineStyle } from './style-attrs';
export { assemblePolygon, type SourcePath } from './polygon-assembler';
export { computeBounds, polygonBounds, unionExtents } from './bounds';
export { parseDimension, parseViewBox, resolveExtent, type DeclaredViewport } from './viewport-resolver';
export {
  fitWindow,
  mapCoordinates,
  type CoordinateMapping,
  type MappingOptions,
  type WorldRect,
} from './coordinate-mapper';
export { readSvgDocument, type SvgDocumentData, type SvgShape } from './svg-document';
export { buildArtwork, loadArtwork, loadArtworkFile, type LoadOptions } from './artwork-loader';
export { PenRendererBase, type PenState, type Renderer } from './pen-renderer';
export { SvgPenRenderer } from './svg-pen-renderer';
export { drawArtwork, drawElement, resolvePenSize, type DrawOptions } from './draw-artwork';
