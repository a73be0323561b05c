/**
 * QuadTreeCollector - payload collection by frustum or segment
 *
 * Stateless traversals over any subtree. Both entry points clear the
 * output array first and append payloads in pre-order (node, then
 * children 0..3).
 */

import type { Line3, Matrix4 } from "three";
import { ClipStatus, clipStatus, intersectSegment } from "@quadgrid/geometry";
import type { ReadonlyQuadTreeNode } from "./types";

function pushElement<T>(node: ReadonlyQuadTreeNode<T>, collected: T[]): void {
  const slot = node.getElementSlot();
  if (slot.present) {
    collected.push(slot.value);
  }
}

function forEachChild<T>(
  node: ReadonlyQuadTreeNode<T>,
  fn: (child: ReadonlyQuadTreeNode<T>) => void
): void {
  if (!node.hasChildren()) return;
  for (let i = 0; i < 4; i++) {
    const child = node.getChildAt(i);
    if (child) fn(child);
  }
}

export class QuadTreeCollector {
  /**
   * Collect payloads of nodes whose box is not entirely outside the view
   * volume of `viewProjection`.
   * @returns `collected`, for chaining
   */
  static collectByFrustum<T>(
    node: ReadonlyQuadTreeNode<T>,
    viewProjection: Matrix4,
    collected: T[]
  ): T[] {
    collected.length = 0;
    QuadTreeCollector.recurseFrustum(node, viewProjection, collected);
    return collected;
  }

  /**
   * Collect payloads of nodes whose box the segment touches.
   * @returns `collected`, for chaining
   */
  static collectByLineIntersect<T>(
    node: ReadonlyQuadTreeNode<T>,
    segment: Line3,
    collected: T[]
  ): T[] {
    collected.length = 0;
    QuadTreeCollector.recurseLine(node, segment, collected);
    return collected;
  }

  private static recurseFrustum<T>(
    node: ReadonlyQuadTreeNode<T>,
    viewProjection: Matrix4,
    collected: T[]
  ): void {
    const status = clipStatus(node.getBbox(), viewProjection);

    if (status === ClipStatus.Outside) {
      return;
    }

    // Every descendant box lies inside this one, so it is Inside too
    if (status === ClipStatus.Inside) {
      QuadTreeCollector.collectAll(node, collected);
      return;
    }

    pushElement(node, collected);
    forEachChild(node, (child) => QuadTreeCollector.recurseFrustum(child, viewProjection, collected));
  }

  private static collectAll<T>(node: ReadonlyQuadTreeNode<T>, collected: T[]): void {
    pushElement(node, collected);
    forEachChild(node, (child) => QuadTreeCollector.collectAll(child, collected));
  }

  private static recurseLine<T>(node: ReadonlyQuadTreeNode<T>, segment: Line3, collected: T[]): void {
    if (!intersectSegment(node.getBbox(), segment)) {
      return;
    }
    pushElement(node, collected);
    forEachChild(node, (child) => QuadTreeCollector.recurseLine(child, segment, collected));
  }
}

