import { createBox } from '@quadgrid/geometry';
import { QuadTreeContractError, type ContractViolation } from '@quadgrid/quadtree';

export const ROOT_BOX = createBox(-100, -50, -100, 100, 50, 100);

/**
 * Run `fn` and return the contract violation code it threw, if any.
 */
export function violationOf(fn: () => unknown): ContractViolation | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof QuadTreeContractError) return err.code;
    throw err;
  }
  return undefined;
}
