/**
 * 4x4 transform builders.
 *
 * three stores Matrix4 column-major; `elements[col * 4 + row]`.
 * Every builder mutates and returns the matrix it is given.
 */

import { Matrix4, Vector3 } from "three";

export function identity(m: Matrix4 = new Matrix4()): Matrix4 {
  return m.identity();
}

/**
 * Add `v` to the translation column (pre-multiplies by a translation).
 */
export function translate(m: Matrix4, v: Vector3): Matrix4 {
  const e = m.elements;
  e[12] += v.x;
  e[13] += v.y;
  e[14] += v.z;
  return m;
}

/**
 * Scale rows 0..2 by the components of `s` (pre-multiplies by a scale).
 */
export function scale(m: Matrix4, s: Vector3): Matrix4 {
  const e = m.elements;
  for (let col = 0; col < 4; col++) {
    e[col * 4 + 0] *= s.x;
    e[col * 4 + 1] *= s.y;
    e[col * 4 + 2] *= s.z;
  }
  return m;
}

/**
 * Right-handed field-of-view perspective projection.
 * @param fovY - Vertical field of view in radians
 */
export function perspectiveFovRH(
  m: Matrix4,
  fovY: number,
  aspect: number,
  near: number,
  far: number
): Matrix4 {
  const h = 1 / Math.tan(fovY * 0.5);
  const w = h / aspect;
  const depth = far / (near - far);

  return m.set(
    w, 0, 0, 0,
    0, h, 0, 0,
    0, 0, depth, near * depth,
    0, 0, -1, 0
  );
}

/**
 * Invert in place. A singular matrix becomes all zeros (three's behavior).
 */
export function inverse(m: Matrix4): Matrix4 {
  return m.invert();
}

/**
 * a * b as a new matrix.
 */
export function multiply(a: Matrix4, b: Matrix4): Matrix4 {
  return new Matrix4().multiplyMatrices(a, b);
}
