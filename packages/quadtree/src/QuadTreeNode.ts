/**
 * QuadTreeNode - one grid cell of a QuadTree level
 *
 * Nodes live in their tree's arena and refer to their children by arena
 * index. The box spans the full root extent on Y; only X (columns) and
 * Z (rows) are subdivided.
 */

import { Box3 } from "three";
import { boxContainsBox, isWellFormedBox } from "@quadgrid/geometry";
import type { QuadTree } from "./QuadTree";
import { QuadTreeContractError } from "./errors";
import type { ElementSlot, ReadonlyQuadTreeNode } from "./types";

const EMPTY_SLOT: ElementSlot<never> = { present: false };

export class QuadTreeNode<T> implements ReadonlyQuadTreeNode<T> {
  private readonly tree: QuadTree<T>;
  private readonly index: number;

  private level = 0;
  private column = 0;
  private row = 0;
  private readonly bbox = new Box3();

  // Either all four child indices or none
  private children: number[] | null = null;

  private element: ElementSlot<T> = EMPTY_SLOT;

  constructor(tree: QuadTree<T>, index: number) {
    this.tree = tree;
    this.index = index;
  }

  /**
   * Derive this node's box from the root box and wire its subtree.
   * Called by QuadTree.initialize(); recursion depth equals tree depth.
   * @internal
   */
  initialize(level: number, column: number, row: number): void {
    const depth = this.tree.getTreeDepth();
    const rootBox = this.tree.getRootBbox();
    const baseSize = this.tree.getBaseCellSize();

    this.level = level;
    this.column = column;
    this.row = row;

    // Top-down from a single base size: no error accumulated by halving
    const levelFactor = 2 ** (depth - 1 - level);
    const cellX = levelFactor * baseSize.x;
    const cellZ = levelFactor * baseSize.z;

    this.bbox.min.set(
      rootBox.min.x + column * cellX,
      rootBox.min.y,
      rootBox.min.z + row * cellZ
    );
    this.bbox.max.set(
      rootBox.min.x + (column + 1) * cellX,
      rootBox.max.y,
      rootBox.min.z + (row + 1) * cellZ
    );

    const childLevel = level + 1;
    if (childLevel >= depth) {
      this.children = null;
      return;
    }

    const children: number[] = [];
    this.children = children;
    for (let i = 0; i < 4; i++) {
      const childColumn = 2 * column + (i & 1);
      const childRow = 2 * row + ((i & 2) >> 1);
      const childIndex = this.tree.calculateNodeIndex(childLevel, childColumn, childRow);
      children.push(childIndex);
      this.tree.getNodeByIndex(childIndex).initialize(childLevel, childColumn, childRow);
    }
  }

  getIndex(): number {
    return this.index;
  }

  getLevel(): number {
    return this.level;
  }

  getColumn(): number {
    return this.column;
  }

  getRow(): number {
    return this.row;
  }

  /**
   * The node's cell. Shared with the tree: do not mutate it.
   */
  getBbox(): Box3 {
    return this.bbox;
  }

  /**
   * Smallest node in this subtree whose cell fully contains `box`.
   * Children are tried in order 0..3 and the first hit wins.
   * @returns null when this node itself does not contain the box, or when
   *          the box is empty, inverted or has a non-finite coordinate
   */
  findContainmentNodeRecursive(box: Box3): QuadTreeNode<T> | null {
    if (!isWellFormedBox(box)) {
      return null;
    }
    return this.searchContainment(box);
  }

  private searchContainment(box: Box3): QuadTreeNode<T> | null {
    if (!boxContainsBox(this.bbox, box)) {
      return null;
    }

    if (this.children) {
      for (const childIndex of this.children) {
        const found = this.tree.getNodeByIndex(childIndex).searchContainment(box);
        if (found) {
          return found;
        }
      }
    }

    return this;
  }

  setElement(element: T): void {
    this.element = { present: true, value: element };
  }

  clearElement(): void {
    this.element = EMPTY_SLOT;
  }

  getElement(): T | undefined {
    return this.element.present ? this.element.value : undefined;
  }

  getElementSlot(): ElementSlot<T> {
    return this.element;
  }

  hasElement(): boolean {
    return this.element.present;
  }

  /**
   * @param index - Quadrant 0..3: (2c, 2r), (2c+1, 2r), (2c, 2r+1), (2c+1, 2r+1)
   * @returns The child, or null for a leaf
   */
  getChildAt(index: number): QuadTreeNode<T> | null {
    if (!Number.isInteger(index) || index < 0 || index > 3) {
      throw new QuadTreeContractError("CHILD_INDEX_OUT_OF_RANGE", `Child index ${index} out of range 0..3`);
    }
    if (!this.children) return null;
    return this.tree.getNodeByIndex(this.children[index]);
  }

  hasChildren(): boolean {
    return this.children !== null;
  }

  /**
   * Post-order compaction. Every child subtree is optimized first; if none
   * of them holds a payload, all four child links are dropped together.
   * The detached nodes keep their arena slots.
   * @returns Whether this node or a retained descendant holds a payload
   */
  optimizeRecursive(): boolean {
    if (this.children) {
      let retained = false;
      for (const childIndex of this.children) {
        if (this.tree.getNodeByIndex(childIndex).optimizeRecursive()) {
          retained = true;
        }
      }
      if (!retained) {
        this.children = null;
      }
      return retained || this.element.present;
    }
    return this.element.present;
  }
}
