/**
 * Artwork loading pipeline:
 *
 *   SVG text → shapes → per-shape style + transform → flattened rings
 *            → document extent
 *
 * `buildArtwork()` is the synchronous core and works on already-read
 * shapes; `loadArtwork()` and `loadArtworkFile()` add the DOM parsing and
 * file reading in front of it.
 */

import { readFile } from 'node:fs/promises';
import { polygonBounds } from './bounds';
import { ARTWORK_CONFIG } from './config';
import { assemblePolygon, type SourcePath } from './polygon-assembler';
import { parsePathData } from './path-segments';
import { mergeStyle } from './style-attrs';
import { readSvgDocument, type SvgDocumentData, type SvgShape } from './svg-document';
import { parseTransform } from './transform-parser';
import type { ArtworkDocument, DocumentElement } from './types';
import { parseDimension, resolveExtent } from './viewport-resolver';

export interface LoadOptions {
  /** Target chord length for curve sampling. */
  segUnit?: number;
  /** Log skipped shapes to the console. */
  verbose?: boolean;
}

export function toSourcePath(shape: SvgShape, index: number): SourcePath {
  return {
    id: shape.id ?? `path-${index}`,
    subpaths: parsePathData(shape.pathData),
    style: mergeStyle(shape.attributes, shape.inlineStyle),
    transform: parseTransform(shape.transform),
  };
}

export function buildArtwork(data: SvgDocumentData, options: LoadOptions = {}): ArtworkDocument {
  const segUnit = options.segUnit ?? ARTWORK_CONFIG.segUnit;
  const elements: DocumentElement[] = [];

  data.shapes.forEach((shape, index) => {
    const element = assemblePolygon(toSourcePath(shape, index), segUnit);
    if (element.polygon.length === 0) {
      if (options.verbose) {
        console.warn(`[ArtworkLoader] Skipping <${shape.tagName}> "${element.id}": no drawable geometry.`);
      }
      return;
    }
    elements.push(element);
  });

  const extent = resolveExtent(
    data.declared,
    elements.map((element) => polygonBounds([element.polygon]))
  );

  return {
    elements,
    extent,
    declaredSize: {
      width: parseDimension(data.declared.width),
      height: parseDimension(data.declared.height),
    },
  };
}

export async function loadArtwork(svgText: string, options: LoadOptions = {}): Promise<ArtworkDocument> {
  return buildArtwork(await readSvgDocument(svgText), options);
}

export async function loadArtworkFile(path: string, options: LoadOptions = {}): Promise<ArtworkDocument> {
  const svgText = await readFile(path, 'utf8');
  const artwork = await loadArtwork(svgText, options);
  if (options.verbose) {
    console.log(`[ArtworkLoader] ${path}: ${artwork.elements.length} element(s) flattened.`);
  }
  return artwork;
}
