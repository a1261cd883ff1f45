/**
 * Curve flattening at a bounded chord length.
 *
 * Each segment is sampled at max(2, ceil(length / segUnit)) evenly spaced
 * parameter values including both endpoints, so even a zero-length
 * segment contributes its two (equal) endpoints.
 */

import { samePoint, type CurveSegment } from './path-segments';
import type { Point2, Ring } from './types';

/** Number of samples for a segment of the given length. */
export function sampleCount(length: number, segUnit: number): number {
  if (!Number.isFinite(length) || length <= 0 || !(segUnit > 0)) return 2;
  return Math.max(2, Math.ceil(length / segUnit));
}

/** Length of a segment, or 0 when it cannot be measured. */
function measure(segment: CurveSegment): number {
  try {
    const length = segment.length();
    return Number.isFinite(length) ? length : 0;
  } catch {
    return 0;
  }
}

export function flattenSegment(segment: CurveSegment, segUnit: number): Point2[] {
  const count = sampleCount(measure(segment), segUnit);
  const points: Point2[] = [];
  for (let i = 0; i < count; i++) {
    points.push(segment.pointAt(i / (count - 1)));
  }
  return points;
}

/**
 * Sample every segment of one continuous subpath and close the result.
 *
 * A segment's first sample is skipped when it repeats the previous
 * segment's last sample exactly. The ring is closed by appending its first
 * point unless it already ends there.
 */
export function flattenSubpath(segments: readonly CurveSegment[], segUnit: number): Ring {
  const points: Point2[] = [];
  for (const segment of segments) {
    const samples = flattenSegment(segment, segUnit);
    const last = points[points.length - 1];
    const startAt = last && samePoint(last, samples[0]) ? 1 : 0;
    for (let i = startAt; i < samples.length; i++) points.push(samples[i]);
  }
  if (points.length === 0) return points;

  const first = points[0];
  if (!samePoint(first, points[points.length - 1])) {
    points.push({ x: first.x, y: first.y });
  }
  return points;
}
