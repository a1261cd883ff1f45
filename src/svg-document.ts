/**
 * SVG text → root attributes + renderable shapes as path data.
 *
 * The document is parsed with happy-dom's DOMParser. `<path>` elements are
 * taken as written; the basic shapes (`rect`, `circle`, `ellipse`, `line`,
 * `polyline`, `polygon`) are rewritten as equivalent path data so the rest
 * of the pipeline only deals with one kind of geometry. Shapes are returned
 * in document order. Anything inside a non-rendered container (`defs`,
 * `clipPath`, `mask`, …) is skipped.
 */

import { Window } from 'happy-dom';
import { PRESENTATION_ATTRIBUTES } from './style-attrs';
import type { DeclaredViewport } from './viewport-resolver';

export interface SvgShape {
  /** Element name, e.g. `path` or `rect`. */
  readonly tagName: string;
  /** Source `id` attribute, if any. */
  readonly id: string | null;
  readonly pathData: string;
  /** Discrete presentation attributes present on the element. */
  readonly attributes: Readonly<Record<string, string>>;
  readonly inlineStyle: string | null;
  readonly transform: string | null;
}

export interface SvgDocumentData {
  readonly declared: DeclaredViewport;
  readonly shapes: readonly SvgShape[];
}

/** The slice of a DOM element this module reads. */
interface SourceNode {
  readonly localName: string;
  readonly parentElement: SourceNode | null;
  getAttribute(name: string): string | null;
}

const SHAPE_SELECTOR = 'path, rect, circle, ellipse, line, polyline, polygon';

const NON_RENDERED_CONTAINERS = new Set([
  'defs',
  'clippath',
  'mask',
  'symbol',
  'marker',
  'pattern',
]);

// ---------------------------------------------------------------------------
// Document reading
// ---------------------------------------------------------------------------

/**
 * Parse SVG text. Throws when the text has no `<svg>` element; every other
 * problem (bad numbers, unsupported elements) degrades to skipped geometry.
 */
export async function readSvgDocument(svgText: string): Promise<SvgDocumentData> {
  const window = new Window();
  try {
    const parser = new window.DOMParser();
    const doc = parser.parseFromString(svgText, 'image/svg+xml');
    const svg = doc.querySelector('svg');
    if (!svg) {
      throw new Error('No <svg> element found in document.');
    }

    const declared: DeclaredViewport = {
      width: svg.getAttribute('width'),
      height: svg.getAttribute('height'),
      viewBox: svg.getAttribute('viewBox') ?? svg.getAttribute('viewbox'),
    };

    const shapes: SvgShape[] = [];
    svg.querySelectorAll(SHAPE_SELECTOR).forEach((element) => {
      if (isInsideNonRendered(element)) return;
      const pathData = shapeToPathData(element);
      if (pathData === null) return;
      shapes.push({
        tagName: element.localName,
        id: element.getAttribute('id'),
        pathData,
        attributes: readPresentationAttributes(element),
        inlineStyle: element.getAttribute('style'),
        transform: element.getAttribute('transform'),
      });
    });

    return { declared, shapes };
  } finally {
    await window.happyDOM.close();
  }
}

function isInsideNonRendered(element: SourceNode): boolean {
  for (let node = element.parentElement; node; node = node.parentElement) {
    if (NON_RENDERED_CONTAINERS.has(node.localName.toLowerCase())) return true;
  }
  return false;
}

function readPresentationAttributes(element: SourceNode): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const name of PRESENTATION_ATTRIBUTES) {
    const value = element.getAttribute(name);
    if (value !== null) attributes[name] = value.trim();
  }
  return attributes;
}

// ---------------------------------------------------------------------------
// Basic shapes → path data
// ---------------------------------------------------------------------------

function num(element: SourceNode, name: string): number {
  const value = Number.parseFloat(element.getAttribute(name) ?? '');
  return Number.isFinite(value) ? value : 0;
}

/** Path data for an element, or `null` when it has no usable geometry. */
export function shapeToPathData(element: SourceNode): string | null {
  switch (element.localName) {
    case 'path': {
      const d = element.getAttribute('d');
      return d && d.trim() ? d : null;
    }

    case 'rect':
      return rectToPath(num(element, 'x'), num(element, 'y'), num(element, 'width'), num(element, 'height'),
        element.getAttribute('rx'), element.getAttribute('ry'));

    case 'circle': {
      const r = num(element, 'r');
      return ellipseToPath(num(element, 'cx'), num(element, 'cy'), r, r);
    }

    case 'ellipse':
      return ellipseToPath(num(element, 'cx'), num(element, 'cy'), num(element, 'rx'), num(element, 'ry'));

    case 'line':
      return `M ${num(element, 'x1')} ${num(element, 'y1')} L ${num(element, 'x2')} ${num(element, 'y2')}`;

    case 'polyline':
    case 'polygon': {
      const coords = parsePointsList(element.getAttribute('points') ?? '');
      if (coords.length < 4) return null;
      let d = `M ${coords[0]} ${coords[1]}`;
      for (let i = 2; i < coords.length; i += 2) {
        d += ` L ${coords[i]} ${coords[i + 1]}`;
      }
      return element.localName === 'polygon' ? `${d} Z` : d;
    }

    default:
      return null;
  }
}

/** Parse a points attribute (`"x1,y1 x2,y2 …"`) into a flat coordinate list. */
export function parsePointsList(points: string): number[] {
  const coords: number[] = [];
  const values = points.trim().split(/[\s,]+/);
  for (let i = 0; i < values.length - 1; i += 2) {
    const x = Number.parseFloat(values[i]);
    const y = Number.parseFloat(values[i + 1]);
    if (!Number.isFinite(x) || !Number.isFinite(y)) break;
    coords.push(x, y);
  }
  return coords;
}

function rectToPath(
  x: number, y: number, w: number, h: number,
  rxAttr: string | null, ryAttr: string | null
): string | null {
  if (!(w > 0) || !(h > 0)) return null;

  // A missing radius takes the other one; both are clamped to half the side.
  const rxIn = rxAttr === null ? NaN : Number.parseFloat(rxAttr);
  const ryIn = ryAttr === null ? NaN : Number.parseFloat(ryAttr);
  let rx = Number.isFinite(rxIn) ? rxIn : Number.isFinite(ryIn) ? ryIn : 0;
  let ry = Number.isFinite(ryIn) ? ryIn : rx;
  rx = Math.min(Math.max(rx, 0), w / 2);
  ry = Math.min(Math.max(ry, 0), h / 2);

  if (rx === 0 || ry === 0) {
    return `M ${x} ${y} L ${x + w} ${y} L ${x + w} ${y + h} L ${x} ${y + h} Z`;
  }

  return [
    `M ${x + rx} ${y}`,
    `L ${x + w - rx} ${y}`,
    `A ${rx} ${ry} 0 0 1 ${x + w} ${y + ry}`,
    `L ${x + w} ${y + h - ry}`,
    `A ${rx} ${ry} 0 0 1 ${x + w - rx} ${y + h}`,
    `L ${x + rx} ${y + h}`,
    `A ${rx} ${ry} 0 0 1 ${x} ${y + h - ry}`,
    `L ${x} ${y + ry}`,
    `A ${rx} ${ry} 0 0 1 ${x + rx} ${y}`,
    'Z',
  ].join(' ');
}

/** Two half-arcs starting and ending at the leftmost point. */
function ellipseToPath(cx: number, cy: number, rx: number, ry: number): string | null {
  if (!(rx > 0) || !(ry > 0)) return null;
  return (
    `M ${cx - rx} ${cy} ` +
    `A ${rx} ${ry} 0 1 0 ${cx + rx} ${cy} ` +
    `A ${rx} ${ry} 0 1 0 ${cx - rx} ${cy} Z`
  );
}
