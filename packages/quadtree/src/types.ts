import type { Box3 } from "three";

/**
 * Payload slot of a node. Presence is explicit, so falsy payloads
 * (0, "", false) are stored like any other value.
 */
export type ElementSlot<T> =
  | { readonly present: false }
  | { readonly present: true; readonly value: T };

/**
 * Read-only view of a node: everything the collectors and containment
 * search need, without payload mutation.
 */
export interface ReadonlyQuadTreeNode<T> {
  getIndex(): number;
  getLevel(): number;
  getColumn(): number;
  getRow(): number;
  /** Owned by the tree; clone before modifying */
  getBbox(): Box3;
  getElement(): T | undefined;
  getElementSlot(): ElementSlot<T>;
  hasElement(): boolean;
  getChildAt(index: number): ReadonlyQuadTreeNode<T> | null;
  hasChildren(): boolean;
  findContainmentNodeRecursive(box: Box3): ReadonlyQuadTreeNode<T> | null;
}

/**
 * Read-only view of a tree. Type a tree as this to hand out nodes that
 * cannot be written through.
 */
export interface ReadonlyQuadTree<T> {
  /** Owned by the tree; clone before modifying */
  getRootBbox(): Box3;
  getTreeDepth(): number;
  getNumberNodes(): number;
  calculateNumberNodes(level: number): number;
  calculateNodeIndex(level: number, column: number, row: number): number;
  getRootNode(): ReadonlyQuadTreeNode<T>;
  getNodeByIndex(index: number): ReadonlyQuadTreeNode<T>;
  findContainmentNode(box: Box3): ReadonlyQuadTreeNode<T> | null;
}
