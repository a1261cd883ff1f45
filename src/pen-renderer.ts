/**
 * Pen-plotter style rendering surface.
 *
 * `Renderer` is the capability the draw code talks to: a pen that moves in
 * world coordinates, draws while it is down, can fill the region it
 * travelled around, and can stamp a marker at its position.
 *
 * `PenRendererBase` owns all pen state (position, heading, up/down,
 * colours, open fill, batch counter) for one surface instance and reduces
 * the calls to a handful of output hooks that subclasses implement:
 * `onLine()`, `onBeginFill()`, `onFill()`, `onStamp()`, `onClearStamps()`
 * and `onCommit()`.
 *
 * ## Batching
 *
 * Pen operations (moves, stamps, fill begin/end) are buffered and committed
 * as one frame every `batchSize` operations, or on `flush()`.
 */

import type { WorldRect } from './coordinate-mapper';
import type { Point2, Size } from './types';

export interface Renderer {
  setWindowSize(size: Size): void;
  setWorldCoordinates(world: WorldRect): void;
  /** Pen operations per committed frame; values below 1 mean 1. */
  setBatchSize(operations: number): void;
  setPenSize(width: number): void;
  setColor(stroke: string, fill: string): void;
  penUp(): void;
  penDown(): void;
  isDown(): boolean;
  /** Move to a world position, drawing a line when the pen is down. */
  moveTo(x: number, y: number): void;
  stamp(): void;
  clearStamps(): void;
  beginFill(): void;
  endFill(): void;
  /** Commit everything buffered since the last frame. */
  flush(): void;
}

/** Snapshot of the pen, handed to the output hooks. */
export interface PenState {
  readonly position: Point2;
  /** Degrees, counter-clockwise from +x, as the pen last travelled. */
  readonly heading: number;
  readonly down: boolean;
  readonly strokeColor: string;
  readonly fillColor: string;
  readonly penSize: number;
}

export abstract class PenRendererBase implements Renderer {
  protected windowSize: Size = { width: 0, height: 0 };
  protected world: WorldRect = { llx: 0, lly: 0, urx: 1, ury: 1 };

  private pen: PenState = {
    position: { x: 0, y: 0 },
    heading: 0,
    down: true,
    strokeColor: 'black',
    fillColor: 'black',
    penSize: 1,
  };

  /** Positions visited since `beginFill()`, or `null` outside a fill. */
  private fillPath: Point2[] | null = null;
  private batchSize = 1;
  private pendingOps = 0;
  private frames = 0;

  // -----------------------------------------------------------------------
  // Output hooks
  // -----------------------------------------------------------------------

  protected abstract onLine(from: Point2, to: Point2, pen: PenState): void;
  protected abstract onBeginFill(pen: PenState): void;
  protected abstract onFill(points: readonly Point2[], pen: PenState): void;
  protected abstract onStamp(pen: PenState): void;
  protected abstract onClearStamps(): void;
  protected abstract onCommit(): void;

  // -----------------------------------------------------------------------
  // Surface setup
  // -----------------------------------------------------------------------

  setWindowSize(size: Size): void {
    this.windowSize = size;
  }

  setWorldCoordinates(world: WorldRect): void {
    this.world = world;
  }

  setBatchSize(operations: number): void {
    this.batchSize = Math.max(1, Math.floor(operations) || 1);
    if (this.pendingOps >= this.batchSize) this.commit();
  }

  // -----------------------------------------------------------------------
  // Pen
  // -----------------------------------------------------------------------

  get state(): PenState {
    return this.pen;
  }

  /** Frames committed so far. */
  get frameCount(): number {
    return this.frames;
  }

  setPenSize(width: number): void {
    this.pen = { ...this.pen, penSize: width };
  }

  setColor(stroke: string, fill: string): void {
    this.pen = { ...this.pen, strokeColor: stroke, fillColor: fill };
  }

  penUp(): void {
    this.pen = { ...this.pen, down: false };
  }

  penDown(): void {
    this.pen = { ...this.pen, down: true };
  }

  isDown(): boolean {
    return this.pen.down;
  }

  moveTo(x: number, y: number): void {
    const from = this.pen.position;
    const to: Point2 = { x, y };
    const heading = from.x === x && from.y === y
      ? this.pen.heading
      : (Math.atan2(y - from.y, x - from.x) * 180) / Math.PI;

    this.pen = { ...this.pen, position: to, heading };
    if (this.pen.down) this.onLine(from, to, this.pen);
    this.fillPath?.push(to);
    this.countOp();
  }

  stamp(): void {
    this.onStamp(this.pen);
    this.countOp();
  }

  clearStamps(): void {
    this.onClearStamps();
  }

  beginFill(): void {
    this.fillPath = [this.pen.position];
    this.onBeginFill(this.pen);
    this.countOp();
  }

  endFill(): void {
    if (!this.fillPath) return;
    const points = this.fillPath;
    this.fillPath = null;
    this.onFill(points, this.pen);
    this.countOp();
  }

  flush(): void {
    if (this.pendingOps > 0) this.commit();
  }

  private countOp(): void {
    this.pendingOps++;
    if (this.pendingOps >= this.batchSize) this.commit();
  }

  private commit(): void {
    this.pendingOps = 0;
    this.frames++;
    this.onCommit();
  }
}
