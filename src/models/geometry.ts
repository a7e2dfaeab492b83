/**
 * Geometric feature library.
 *
 * Pure functions over landmarks: angles, signed axis offsets, levelness and
 * distance to a reference line. Nothing here keeps state between calls.
 *
 * Every feature is returned as a Measurement so that a low-confidence
 * landmark or an undefined angle can be told apart from a real value.
 */

import type { Landmark, VerticalAxis } from '../types';

export type InsufficientReason = 'low_confidence' | 'degenerate' | 'missing';

export type Measurement<T = number> =
  | { ok: true; value: T }
  | { ok: false; reason: InsufficientReason };

export interface FeatureOptions {
  /** Landmarks below this visibility yield 'low_confidence' (default 0.5) */
  visibilityThreshold?: number;
  /** Direction in which Y grows (default 'down', image coordinates) */
  verticalAxis?: VerticalAxis;
}

export const DEFAULT_VISIBILITY_THRESHOLD = 0.5;

// Segments shorter than this are treated as zero length
const EPSILON = 1e-9;

const RAD_TO_DEG = 180 / Math.PI;

export function measured<T>(value: T): Measurement<T> {
  return { ok: true, value };
}

export function insufficient(reason: InsufficientReason): Measurement<never> {
  return { ok: false, reason };
}

/**
 * Apply `fn` to the value of every measurement, or pass the first
 * insufficient reason through.
 */
export function combine<A, B, R>(
  a: Measurement<A>,
  b: Measurement<B>,
  fn: (a: A, b: B) => Measurement<R>
): Measurement<R> {
  if (!a.ok) return a;
  if (!b.ok) return b;
  return fn(a.value, b.value);
}

export function mapMeasurement<T, R>(
  m: Measurement<T>,
  fn: (value: T) => R
): Measurement<R> {
  return m.ok ? measured(fn(m.value)) : m;
}

function usable(points: Landmark[], options: FeatureOptions): boolean {
  const threshold = options.visibilityThreshold ?? DEFAULT_VISIBILITY_THRESHOLD;
  return points.every((p) => p.visibility >= threshold);
}

/**
 * Angle at vertex `b` formed by the rays b→a and b→c, in degrees [0, 180].
 *
 * Degenerate when either ray has zero length.
 */
export function angle(
  a: Landmark,
  b: Landmark,
  c: Landmark,
  options: FeatureOptions = {}
): Measurement {
  if (!usable([a, b, c], options)) return insufficient('low_confidence');

  const v1 = { x: a.x - b.x, y: a.y - b.y };
  const v2 = { x: c.x - b.x, y: c.y - b.y };
  const mag1 = Math.hypot(v1.x, v1.y);
  const mag2 = Math.hypot(v2.x, v2.y);

  if (mag1 < EPSILON || mag2 < EPSILON) return insufficient('degenerate');

  const dot = v1.x * v2.x + v1.y * v2.y;
  // Clamp to [-1, 1] against floating point drift
  const cosAngle = Math.min(Math.max(dot / (mag1 * mag2), -1), 1);
  return measured(Math.acos(cosAngle) * RAD_TO_DEG);
}

/**
 * Signed height of `p` above `q`. Positive means `p` is higher on screen
 * regardless of the coordinate convention.
 */
export function verticalOffset(
  p: Landmark,
  q: Landmark,
  options: FeatureOptions = {}
): Measurement {
  if (!usable([p, q], options)) return insufficient('low_confidence');

  return measured(
    (options.verticalAxis ?? 'down') === 'down' ? q.y - p.y : p.y - q.y
  );
}

/**
 * Signed horizontal offset `p.x - q.x`.
 */
export function horizontalOffset(
  p: Landmark,
  q: Landmark,
  options: FeatureOptions = {}
): Measurement {
  if (!usable([p, q], options)) return insufficient('low_confidence');
  return measured(p.x - q.x);
}

/**
 * Deviation of the line p–q from horizontal, in degrees [0, 90].
 * Independent of point order and of the vertical axis direction.
 */
export function lineTilt(
  p: Landmark,
  q: Landmark,
  options: FeatureOptions = {}
): Measurement {
  if (!usable([p, q], options)) return insufficient('low_confidence');

  const dx = Math.abs(q.x - p.x);
  const dy = Math.abs(q.y - p.y);
  if (dx < EPSILON && dy < EPSILON) return insufficient('degenerate');

  return measured(Math.atan2(dy, dx) * RAD_TO_DEG);
}

/**
 * Level test on an already measured tilt. Strict: a tilt equal to the
 * tolerance is not level.
 */
export function tiltIsLevel(tiltDegrees: number, toleranceDegrees: number): boolean {
  return tiltDegrees < toleranceDegrees;
}

/**
 * True when the line p–q deviates from horizontal by less than the tolerance.
 */
export function isLevel(
  p: Landmark,
  q: Landmark,
  toleranceDegrees: number,
  options: FeatureOptions = {}
): Measurement<boolean> {
  return mapMeasurement(lineTilt(p, q, options), (tilt) =>
    tiltIsLevel(tilt, toleranceDegrees)
  );
}

export function distance(
  p: Landmark,
  q: Landmark,
  options: FeatureOptions = {}
): Measurement {
  if (!usable([p, q], options)) return insufficient('low_confidence');
  return measured(Math.hypot(p.x - q.x, p.y - q.y));
}

/**
 * A reference line through two landmarks, e.g. shoulder→hip for the torso.
 */
export interface ReferenceLine {
  start: Landmark;
  end: Landmark;
}

/**
 * Perpendicular distance from `joint` to the infinite line through the
 * reference segment. Degenerate when the segment has zero length.
 */
export function distanceToLine(
  joint: Landmark,
  line: ReferenceLine,
  options: FeatureOptions = {}
): Measurement {
  if (!usable([joint, line.start, line.end], options)) {
    return insufficient('low_confidence');
  }

  const dx = line.end.x - line.start.x;
  const dy = line.end.y - line.start.y;
  const length = Math.hypot(dx, dy);
  if (length < EPSILON) return insufficient('degenerate');

  const cross = dx * (joint.y - line.start.y) - dy * (joint.x - line.start.x);
  return measured(Math.abs(cross) / length);
}

/**
 * Proximity test on an already measured distance (inclusive)
 */
export function withinDistance(value: number, maxDistance: number): boolean {
  return value <= maxDistance;
}

/**
 * True when `joint` lies within `maxDistance` of the reference line.
 * Used for "elbow stays close to the body".
 */
export function nearBody(
  joint: Landmark,
  referenceLine: ReferenceLine,
  maxDistance: number,
  options: FeatureOptions = {}
): Measurement<boolean> {
  return mapMeasurement(distanceToLine(joint, referenceLine, options), (d) =>
    withinDistance(d, maxDistance)
  );
}

/**
 * Midpoint of two landmarks. Its visibility is the weaker of the two, so a
 * derived joint is never more trusted than its sources.
 */
export function midpoint(p: Landmark, q: Landmark): Landmark {
  const mid: Landmark = {
    x: (p.x + q.x) / 2,
    y: (p.y + q.y) / 2,
    visibility: Math.min(p.visibility, q.visibility),
  };
  if (p.z !== undefined && q.z !== undefined) {
    mid.z = (p.z + q.z) / 2;
  }
  return mid;
}

