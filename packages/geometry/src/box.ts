/**
 * Axis-aligned box helpers on top of three's Box3.
 */

import { Box3, Vector3 } from "three";

/**
 * Build a box from min/max components.
 */
export function createBox(
  minX: number,
  minY: number,
  minZ: number,
  maxX: number,
  maxY: number,
  maxZ: number
): Box3 {
  return new Box3(new Vector3(minX, minY, minZ), new Vector3(maxX, maxY, maxZ));
}

/**
 * Build a box from its center and half-size.
 */
export function boxFromCenterExtents(center: Vector3, extents: Vector3): Box3 {
  return new Box3(center.clone().sub(extents), center.clone().add(extents));
}

/** Half of the box size on every axis. */
export function getExtents(box: Box3, target = new Vector3()): Vector3 {
  return box.getSize(target).multiplyScalar(0.5);
}

/**
 * True when every component is finite and min <= max on every axis.
 * An empty Box3 (min = +Infinity) is not well formed.
 */
export function isWellFormedBox(box: Box3): boolean {
  const { min, max } = box;
  return (
    Number.isFinite(min.x) && Number.isFinite(min.y) && Number.isFinite(min.z) &&
    Number.isFinite(max.x) && Number.isFinite(max.y) && Number.isFinite(max.z) &&
    min.x <= max.x && min.y <= max.y && min.z <= max.z
  );
}

/**
 * Exact per-axis containment of `inner` in `outer`.
 * Rejection uses strict comparisons, so a box touching the outer boundary
 * still counts as contained.
 */
export function boxContainsBox(outer: Box3, inner: Box3): boolean {
  const a = outer.min;
  const b = outer.max;
  const c = inner.min;
  const d = inner.max;

  if (c.x < a.x || d.x > b.x ||
      c.y < a.y || d.y > b.y ||
      c.z < a.z || d.z > b.z) {
    return false;
  }
  return true;
}
