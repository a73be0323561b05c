/**
 * QuadTree - fixed-depth spatial partition of a bounded 3-D region
 *
 * Every cell of a complete quaternary subdivision is materialized up front
 * in one flat arena, level by level and row-major within a level:
 *
 *   index(level, column, row) = (4^level - 1) / 3 + row * 2^level + column
 *
 * Columns subdivide X, rows subdivide Z; Y is never split. Topology is
 * fixed once initialize() returns. Payloads are the only thing that
 * changes afterwards.
 *
 * Depth is capped by config.maxDepth (default 10, at most 16) because
 * depth d allocates (4^d - 1) / 3 nodes; pass `new QuadTree({ maxDepth })`
 * to go deeper, otherwise initialize() throws INVALID_DEPTH.
 *
 * Usage:
 * 1. initialize(rootBox, depth)
 * 2. findContainmentNode(box)?.setElement(value)
 * 3. QuadTreeCollector.collectByFrustum(tree.getRootNode(), viewProjection, out)
 */

import { Box3, Vector3 } from "three";
import { createLogger } from "@quadgrid/core";
import { isWellFormedBox } from "@quadgrid/geometry";
import { QuadTreeNode } from "./QuadTreeNode";
import { QuadTreeContractError, type Result } from "./errors";
import { type QuadTreeConfig, checkDepth, resolveQuadTreeConfig } from "./config";
import type { ReadonlyQuadTree } from "./types";

const log = createLogger("QuadTree");

export class QuadTree<T> implements ReadonlyQuadTree<T> {
  private readonly config: QuadTreeConfig;

  private nodes: QuadTreeNode<T>[] = [];
  private rootBox = new Box3();
  private depth = 0;

  // Leaf cell footprint on X and Z; Y carries the full root height
  private readonly baseCellSize = new Vector3();

  constructor(config: Partial<QuadTreeConfig> = {}) {
    this.config = resolveQuadTreeConfig(config);
  }

  /**
   * Build every node for `depth` levels under `box`, discarding any
   * previous state (payloads included).
   * @param depth - Number of levels, 1..config.maxDepth
   */
  initialize(box: Box3, depth: number): void {
    const violation = checkDepth(depth, this.config);
    if (violation) throw violation;

    this.depth = depth;
    this.rootBox = box.clone();

    const baseDimension = 2 ** (depth - 1);
    const size = this.rootBox.getSize(new Vector3());
    this.baseCellSize.set(size.x / baseDimension, size.y, size.z / baseDimension);

    const count = this.calculateNumberNodes(depth);
    const nodes: QuadTreeNode<T>[] = new Array(count);
    for (let i = 0; i < count; i++) {
      nodes[i] = new QuadTreeNode<T>(this, i);
    }
    this.nodes = nodes;
    nodes[0].initialize(0, 0, 0);

    log.debug(`initialized depth=${depth} nodes=${count}`);
  }

  /**
   * Drop all nodes and return to the uninitialized state.
   * Node references obtained earlier must not be used afterwards.
   */
  reset(): void {
    this.nodes = [];
    this.rootBox = new Box3();
    this.depth = 0;
    this.baseCellSize.set(0, 0, 0);
    log.debug("reset");
  }

  isInitialized(): boolean {
    return this.nodes.length > 0;
  }

  getConfig(): Readonly<QuadTreeConfig> {
    return this.config;
  }

  /**
   * Root extent as given to initialize(). Returned by reference: do not mutate.
   */
  getRootBbox(): Box3 {
    return this.rootBox;
  }

  getTreeDepth(): number {
    return this.depth;
  }

  /**
   * Leaf cell size on X and Z, full root height on Y.
   * Returned by reference: do not mutate.
   */
  getBaseCellSize(): Vector3 {
    return this.baseCellSize;
  }

  /**
   * Number of nodes in levels 0..level-1, which is also the arena offset
   * where `level` begins.
   */
  calculateNumberNodes(level: number): number {
    if (!Number.isInteger(level) || level < 0) {
      throw new QuadTreeContractError("INVALID_LEVEL", `Level must be a non-negative integer, got ${level}`);
    }
    return (4 ** level - 1) / 3;
  }

  /**
   * Arena index of the cell at (level, column, row).
   * @param column - 0 <= column < 2^level
   * @param row - 0 <= row < 2^level
   */
  calculateNodeIndex(level: number, column: number, row: number): number {
    const levelOffset = this.calculateNumberNodes(level);
    const side = 2 ** level;
    if (!Number.isInteger(column) || column < 0 || column >= side ||
        !Number.isInteger(row) || row < 0 || row >= side) {
      throw new QuadTreeContractError(
        "CELL_OUT_OF_RANGE",
        `Cell (${column}, ${row}) out of range for level ${level} (side ${side})`
      );
    }
    return levelOffset + row * side + column;
  }

  getNumberNodes(): number {
    return this.nodes.length;
  }

  getRootNode(): QuadTreeNode<T> {
    this.requireInitialized("getRootNode");
    return this.nodes[0];
  }

  getNodeByIndex(index: number): QuadTreeNode<T> {
    if (!Number.isInteger(index) || index < 0 || index >= this.nodes.length) {
      throw new QuadTreeContractError(
        "INDEX_OUT_OF_RANGE",
        `Node index ${index} out of bounds (${this.nodes.length} nodes)`
      );
    }
    return this.nodes[index];
  }

  /**
   * Smallest node whose cell fully contains `box`.
   * @returns null when the box is not inside the root box, or is not a
   *          well-formed box (empty, inverted, NaN)
   */
  findContainmentNode(box: Box3): QuadTreeNode<T> | null {
    return this.getRootNode().findContainmentNodeRecursive(box);
  }

  /**
   * Checked form of findContainmentNode() for query boxes from outside the
   * library: a malformed box is an INVALID_BOUNDS error instead of a miss.
   * The value is null when a well-formed box lies outside the root.
   */
  tryFindContainmentNode(box: Box3): Result<QuadTreeNode<T> | null> {
    if (!isWellFormedBox(box)) {
      const error = new QuadTreeContractError("INVALID_BOUNDS", "Query box must be finite with min <= max");
      log.warn(`rejected: ${error.message}`);
      return { ok: false, error };
    }
    return { ok: true, value: this.findContainmentNode(box) };
  }

  /**
   * Detach empty subtrees (see QuadTreeNode.optimizeRecursive).
   * @returns Whether any reachable node still holds a payload
   */
  optimize(): boolean {
    const occupied = this.getRootNode().optimizeRecursive();
    log.debug(`optimize occupied=${occupied}`);
    return occupied;
  }

  /**
   * Visit every arena slot in index order, reachable or not.
   */
  forEachNode(visitor: (node: QuadTreeNode<T>, index: number) => void): void {
    this.nodes.forEach(visitor);
  }

  private requireInitialized(operation: string): void {
    if (this.nodes.length === 0) {
      throw new QuadTreeContractError("NOT_INITIALIZED", `${operation}() called before initialize()`);
    }
  }
}
