/**
 * PenRendererBase implementation that records the drawing as SVG markup.
 *
 * World coordinates are mapped onto a `windowSize` pixel canvas through the
 * world rectangle (y up in world, y down in pixels). Consecutive pen-down
 * moves with the same stroke join into one `<polyline>`. A fill reserves
 * its slot at `beginFill()` so the painted region sits beneath the outline
 * traced after it. Stamps draw a small arrow marker above everything else
 * until cleared.
 *
 * Items are only visible in `committedMarkup()` once their frame has been
 * committed; `toSvg()` flushes first.
 */

import { PenRendererBase, type PenState } from './pen-renderer';
import type { Point2 } from './types';

interface OpenRun {
  points: Point2[];
  stroke: string;
  penSize: number;
}

/** Marker outline in pixels, pointing along +x. */
const MARKER_SHAPE: readonly Point2[] = [
  { x: 0, y: 0 },
  { x: -9, y: 4.5 },
  { x: -7, y: 0 },
  { x: -9, y: -4.5 },
];

function fmt(value: number): string {
  return String(Math.round(value * 1000) / 1000);
}

function escapeAttr(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;');
}

export class SvgPenRenderer extends PenRendererBase {
  /** Drawn items in paint order; `null` marks a fill slot still open. */
  private items: (string | null)[] = [];
  private committedCount = 0;
  private openFillSlot: number | null = null;
  private run: OpenRun | null = null;
  private stamps: string[] = [];

  // -----------------------------------------------------------------------
  // Mapping
  // -----------------------------------------------------------------------

  /** World position → pixel position on the window. */
  toPixel(point: Point2): Point2 {
    const { llx, lly, urx, ury } = this.world;
    const { width, height } = this.windowSize;
    return {
      x: ((point.x - llx) / (urx - llx)) * width,
      y: ((ury - point.y) / (ury - lly)) * height,
    };
  }

  private pointList(points: readonly Point2[]): string {
    return points
      .map((p) => {
        const px = this.toPixel(p);
        return `${fmt(px.x)},${fmt(px.y)}`;
      })
      .join(' ');
  }

  // -----------------------------------------------------------------------
  // Output hooks
  // -----------------------------------------------------------------------

  protected onLine(from: Point2, to: Point2, pen: PenState): void {
    const run = this.run;
    const last = run?.points[run.points.length - 1];
    if (
      run && last &&
      last.x === from.x && last.y === from.y &&
      run.stroke === pen.strokeColor && run.penSize === pen.penSize
    ) {
      run.points.push(to);
      return;
    }
    this.closeRun();
    this.run = { points: [from, to], stroke: pen.strokeColor, penSize: pen.penSize };
  }

  protected onBeginFill(): void {
    this.closeRun();
    this.openFillSlot = this.items.length;
    this.items.push(null);
  }

  protected onFill(points: readonly Point2[], pen: PenState): void {
    const slot = this.openFillSlot;
    this.openFillSlot = null;
    if (slot === null || points.length < 3) return;
    this.items[slot] =
      `<polygon points="${this.pointList(points)}" fill="${escapeAttr(pen.fillColor)}" stroke="none"/>`;
  }

  protected onStamp(pen: PenState): void {
    const at = this.toPixel(pen.position);
    // Pixel y points down, so the heading turns the other way.
    const angle = (-pen.heading * Math.PI) / 180;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    const outline = MARKER_SHAPE.map(
      (p) => `${fmt(at.x + p.x * cos - p.y * sin)},${fmt(at.y + p.x * sin + p.y * cos)}`
    ).join(' ');
    this.stamps.push(
      `<polygon class="marker" points="${outline}" fill="${escapeAttr(pen.fillColor)}" stroke="${escapeAttr(pen.strokeColor)}"/>`
    );
  }

  protected onClearStamps(): void {
    this.stamps = [];
  }

  protected onCommit(): void {
    this.closeRun();
    this.committedCount = this.items.length;
  }

  private closeRun(): void {
    const run = this.run;
    if (!run) return;
    this.run = null;
    this.items.push(
      `<polyline points="${this.pointList(run.points)}" fill="none" stroke="${escapeAttr(run.stroke)}" ` +
      `stroke-width="${fmt(run.penSize)}" stroke-linecap="round" stroke-linejoin="round"/>`
    );
  }

  // -----------------------------------------------------------------------
  // Output
  // -----------------------------------------------------------------------

  /** Markup of everything committed so far, stamps excluded. */
  committedMarkup(): string[] {
    return this.items
      .slice(0, this.committedCount)
      .filter((item): item is string => item !== null);
  }

  /** Markers currently stamped on the surface. */
  stampMarkup(): string[] {
    return [...this.stamps];
  }

  /** Flush and serialise the whole surface as an SVG document. */
  toSvg(): string {
    this.flush();
    const { width, height } = this.windowSize;
    const body = [...this.committedMarkup(), ...this.stamps].map((item) => `  ${item}`);
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(width)}" height="${fmt(height)}" ` +
        `viewBox="0 0 ${fmt(width)} ${fmt(height)}">`,
      `  <rect width="100%" height="100%" fill="white"/>`,
      ...body,
      '</svg>',
      '',
    ].join('\n');
  }
}
