/**
 * Box vs. view volume classification.
 *
 * Each of the 8 box corners is pushed through a view-projection matrix and
 * tested against the 6 clip planes of homogeneous clip space. Flags are
 * AND-ed and OR-ed across corners: no flag at all means Inside, a flag
 * shared by every corner means Outside, anything else is Clipped.
 */

import { Box3, Matrix4, Vector4 } from "three";

export enum ClipStatus {
  Outside = 0,
  Inside = 1,
  Clipped = 2
}

const CLIP_LEFT = 1 << 0;
const CLIP_RIGHT = 1 << 1;
const CLIP_BOTTOM = 1 << 2;
const CLIP_TOP = 1 << 3;
const CLIP_NEAR = 1 << 4;
const CLIP_FAR = 1 << 5;

const _corner = new Vector4();

/**
 * Classify a box against the view volume of `viewProjection`.
 */
export function clipStatus(box: Box3, viewProjection: Matrix4): ClipStatus {
  const { min, max } = box;
  let andFlags = 0xffff;
  let orFlags = 0;

  for (let i = 0; i < 8; i++) {
    _corner.set(
      i & 1 ? min.x : max.x,
      i & 2 ? min.y : max.y,
      i & 4 ? min.z : max.z,
      1
    ).applyMatrix4(viewProjection);

    const { x, y, z, w } = _corner;
    let clip = 0;

    if (x < -w) clip |= CLIP_LEFT;
    else if (x > w) clip |= CLIP_RIGHT;
    if (y < -w) clip |= CLIP_BOTTOM;
    else if (y > w) clip |= CLIP_TOP;
    if (z < -w) clip |= CLIP_FAR;
    else if (z > w) clip |= CLIP_NEAR;

    andFlags &= clip;
    orFlags |= clip;
  }

  if (orFlags === 0) return ClipStatus.Inside;
  if (andFlags !== 0) return ClipStatus.Outside;
  return ClipStatus.Clipped;
}
