/**
 * Contract violations raised by the quadtree.
 *
 * These are programmer errors (bad depth, bad index, using a tree before
 * initialize()). A containment miss is not one of them: it is reported as
 * a null result.
 */

export type ContractViolation =
  | "INVALID_DEPTH"
  | "INVALID_LEVEL"
  | "CELL_OUT_OF_RANGE"
  | "INDEX_OUT_OF_RANGE"
  | "CHILD_INDEX_OUT_OF_RANGE"
  | "NOT_INITIALIZED"
  | "INVALID_BOUNDS";

export class QuadTreeContractError extends Error {
  readonly code: ContractViolation;

  constructor(code: ContractViolation, message: string) {
    super(message);
    this.name = "QuadTreeContractError";
    this.code = code;
  }
}

/** Outcome of a checked operation at an untrusted-input boundary */
export type Result<T, E = QuadTreeContractError> =
  | { ok: true; value: T }
  | { ok: false; error: E };
