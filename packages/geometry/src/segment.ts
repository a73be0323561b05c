/**
 * Segment vs. box intersection (slab method)
 *
 * A segment is a three Line3: origin = start, direction = end - start,
 * so t in [0, 1] covers the segment.
 */

import { Box3, Line3, Vector3 } from "three";

/** Direction components below this magnitude are treated as parallel */
export const PARALLEL_TOLERANCE = 1e-6;

const _origin = new Vector3();
const _direction = new Vector3();

/**
 * Test a finite segment against a box.
 *
 * @param points - When given, receives the entry point and, if distinct,
 *                 the exit point that lie on the segment.
 * @returns True if any part of the segment overlaps the box.
 */
export function intersectSegment(box: Box3, segment: Line3, points?: Vector3[]): boolean {
  _origin.copy(segment.start);
  segment.delta(_direction);

  let tNear = -Infinity;
  let tFar = Infinity;

  for (let axis = 0; axis < 3; axis++) {
    const o = _origin.getComponent(axis);
    const d = _direction.getComponent(axis);
    const lo = box.min.getComponent(axis);
    const hi = box.max.getComponent(axis);

    if (Math.abs(d) < PARALLEL_TOLERANCE) {
      // Parallel to this slab: origin must already be inside it
      if (o < lo || o > hi) return false;
      continue;
    }

    let t1 = (lo - o) / d;
    let t2 = (hi - o) / d;
    if (t1 > t2) {
      const tmp = t1;
      t1 = t2;
      t2 = tmp;
    }

    tNear = Math.max(tNear, t1);
    tFar = Math.min(tFar, t2);
    if (tNear > tFar) return false;
  }

  if (points) {
    const nearOnSegment = tNear >= 0 && tNear <= 1;
    if (nearOnSegment) {
      points.push(segment.at(tNear, new Vector3()));
    }
    if (tFar >= 0 && tFar <= 1) {
      if (Math.abs(tFar - tNear) > PARALLEL_TOLERANCE || !nearOnSegment) {
        points.push(segment.at(tFar, new Vector3()));
      }
    }
  }

  return tNear <= tFar && !(tFar < 0 || tNear > 1);
}
