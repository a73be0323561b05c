import { QuadTreeContractError } from "./errors";

export type QuadTreeConfig = {
  /** Deepest tree initialize() will build. Depth d allocates (4^d - 1) / 3 nodes. */
  maxDepth: number;
};

export const DEFAULT_QUADTREE_CONFIG: QuadTreeConfig = {
  maxDepth: 10
};

/** Columns and rows must stay addressable as 16-bit cell coordinates */
export const DEPTH_LIMIT = 16;

export function resolveQuadTreeConfig(config: Partial<QuadTreeConfig> = {}): QuadTreeConfig {
  const resolved: QuadTreeConfig = { ...DEFAULT_QUADTREE_CONFIG, ...config };
  const { maxDepth } = resolved;
  if (!Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > DEPTH_LIMIT) {
    throw new QuadTreeContractError(
      "INVALID_DEPTH",
      `maxDepth ${maxDepth} must be an integer in 1..${DEPTH_LIMIT}`
    );
  }
  return resolved;
}

/**
 * Check a requested tree depth against the configured ceiling.
 * @returns The violation, or null when the depth is usable
 */
export function checkDepth(depth: number, config: QuadTreeConfig): QuadTreeContractError | null {
  if (!Number.isInteger(depth) || depth < 1) {
    return new QuadTreeContractError("INVALID_DEPTH", `Tree depth must be a positive integer, got ${depth}`);
  }
  if (depth > config.maxDepth) {
    return new QuadTreeContractError(
      "INVALID_DEPTH",
      `Tree depth ${depth} exceeds configured maxDepth ${config.maxDepth}`
    );
  }
  return null;
}
