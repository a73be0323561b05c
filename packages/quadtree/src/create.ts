/**
 * Checked construction for untrusted input (box and depth coming from
 * outside the library). Returns a Result instead of throwing.
 */

import type { Box3 } from "three";
import { createLogger } from "@quadgrid/core";
import { isWellFormedBox } from "@quadgrid/geometry";
import { QuadTree } from "./QuadTree";
import { type QuadTreeConfig, checkDepth, resolveQuadTreeConfig } from "./config";
import { QuadTreeContractError, type Result } from "./errors";

const log = createLogger("QuadTree");

function reject<V>(error: QuadTreeContractError): Result<V> {
  log.warn(`rejected: ${error.message}`);
  return { ok: false, error };
}

export function tryCreateQuadTree<T>(
  box: Box3,
  depth: number,
  config: Partial<QuadTreeConfig> = {}
): Result<QuadTree<T>> {
  let resolved: QuadTreeConfig;
  try {
    resolved = resolveQuadTreeConfig(config);
  } catch (err) {
    if (err instanceof QuadTreeContractError) return reject(err);
    throw err;
  }

  if (!isWellFormedBox(box)) {
    const { min, max } = box;
    return reject(new QuadTreeContractError(
      "INVALID_BOUNDS",
      `Root box must be finite with min <= max, got (${min.x}, ${min.y}, ${min.z})..(${max.x}, ${max.y}, ${max.z})`
    ));
  }

  const violation = checkDepth(depth, resolved);
  if (violation) return reject(violation);

  const tree = new QuadTree<T>(resolved);
  tree.initialize(box, depth);
  return { ok: true, value: tree };
}
